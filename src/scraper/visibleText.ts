import { decodeHTML } from "entities";
import { DocumentNode, DocumentTree } from "./types";

export const DEFAULT_HIDDEN_TAGS: ReadonlySet<string> = new Set(["script", "style", "noscript", "template"]);

export function toTagSet(names: Iterable<string>): ReadonlySet<string> {
  return new Set(Array.from(names, (n) => n.trim().toLowerCase()).filter(Boolean));
}

/**
 * Collect the text a reader would see, in document order.
 *
 * Elements named in `hiddenTags` are skipped together with everything below
 * them. Each text node is trimmed, dropped if empty, entity-decoded, and the
 * pieces are joined with single spaces. The tree is only read.
 */
export function extractVisibleText(tree: DocumentTree, hiddenTags: ReadonlySet<string> = DEFAULT_HIDDEN_TAGS) {
  const pieces: string[] = [];
  const stack: DocumentNode[] = [...tree.children].reverse();

  while (stack.length) {
    const node = stack.pop();
    if (!node) break;

    if (node.kind === "text") {
      const trimmed = node.content.trim();
      if (trimmed) pieces.push(decodeHTML(trimmed));
      continue;
    }

    if (hiddenTags.has(node.name.toLowerCase())) continue;
    for (let i = node.children.length - 1; i >= 0; i--) stack.push(node.children[i]);
  }

  return pieces.join(" ");
}
