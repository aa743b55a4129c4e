import { rankKeys } from "./frequency";
import { DocumentNode, DocumentTree, RankedList } from "./types";

/** Every element's lower-cased tag name, in pre-order, hidden elements included. */
export function tagNames(tree: DocumentTree) {
  const names: string[] = [];
  const stack: DocumentNode[] = [...tree.children].reverse();

  while (stack.length) {
    const node = stack.pop();
    if (!node || node.kind === "text") continue;
    names.push(node.name.toLowerCase());
    for (let i = node.children.length - 1; i >= 0; i--) stack.push(node.children[i]);
  }

  return names;
}

export function tagFrequencies(tree: DocumentTree): RankedList {
  return rankKeys(tagNames(tree));
}
