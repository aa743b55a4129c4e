import * as cheerio from "cheerio";
import { type AnyNode, isTag, isText } from "domhandler";
import { ParseError } from "../utils/errors";
import { DocumentNode, DocumentTree } from "./types";

function toDocumentNode(node: AnyNode): DocumentNode | null {
  if (isText(node)) return { kind: "text", content: node.data };
  if (isTag(node)) {
    return {
      kind: "element",
      name: node.name,
      attributes: { ...node.attribs },
      children: toDocumentNodes(node.children),
    };
  }
  // comments, doctypes and processing instructions carry no text or tags
  return null;
}

function toDocumentNodes(nodes: AnyNode[]) {
  const out: DocumentNode[] = [];
  for (const node of nodes) {
    const converted = toDocumentNode(node);
    if (converted) out.push(converted);
  }
  return out;
}

/**
 * Parse markup into a {@link DocumentTree}.
 *
 * htmlparser2 runs in HTML mode, so malformed markup is repaired leniently and
 * no implied html/head/body elements are added that the page did not contain.
 */
export function parseHtml(html: string): DocumentTree {
  let $: cheerio.CheerioAPI;
  try {
    $ = cheerio.load(html || "", { xml: { xmlMode: false, decodeEntities: true } });
  } catch (err) {
    throw new ParseError(`Failed to parse HTML: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }
  const root = $.root()[0];
  return { children: root ? toDocumentNodes(root.children) : [] };
}
