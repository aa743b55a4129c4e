export type ElementNode = {
  kind: "element";
  name: string;
  attributes: Record<string, string>;
  children: DocumentNode[];
};

export type TextNode = {
  kind: "text";
  content: string;
};

export type DocumentNode = ElementNode | TextNode;

// The root holds the top-level nodes; it is not an element itself.
export type DocumentTree = {
  children: DocumentNode[];
};

export type RankedEntry = { key: string; count: number };

export type RankedList = RankedEntry[];

export type AnalysisOptions = {
  top?: number;
  stopWords?: Iterable<string>;
  hiddenTags?: Iterable<string>;
};

export type AnalysisResult = {
  source: string;
  tags: RankedList;
  words: RankedList;
  tokenCount: number;
  visibleTextLength: number;
};

export type JsonReport = {
  source: string;
  tags: { tag: string; count: number }[];
  words: { rank: number; word: string; count: number }[];
  tokenCount: number;
};
