import type { SceneHost } from "./host.js";

export const ANCHOR_PATH_SEPARATOR = "/";

/**
 * Path of names from the nearest boundary ancestor (exclusive) down to
 * `node`. A boundary resolves to the empty path; `null` when no boundary sits
 * above the node.
 */
export function resolveAnchorPath<TNode extends object, TBehavior extends object>(
  host: SceneHost<TNode, TBehavior>,
  node: TNode,
  boundaries: ReadonlySet<TNode>,
): string | null {
  if (boundaries.size === 0) return null;
  const names: string[] = [];
  let current: TNode | null = node;
  while (current) {
    if (boundaries.has(current)) {
      return names.reverse().join(ANCHOR_PATH_SEPARATOR);
    }
    names.push(host.nodeName(current));
    current = host.parentOf(current);
  }
  return null;
}

export interface AnchoredDescendant<TNode> {
  node: TNode;
  path: string;
}

/** Every descendant of `boundary` with its anchor path, depth first. */
export function collectAnchoredDescendants<TNode extends object, TBehavior extends object>(
  host: SceneHost<TNode, TBehavior>,
  boundary: TNode,
): AnchoredDescendant<TNode>[] {
  const result: AnchoredDescendant<TNode>[] = [];
  const visit = (parent: TNode, parentPath: string) => {
    for (const child of host.childrenOf(parent)) {
      const name = host.nodeName(child);
      const path = parentPath.length === 0 ? name : `${parentPath}${ANCHOR_PATH_SEPARATOR}${name}`;
      result.push({ node: child, path });
      visit(child, path);
    }
  };
  visit(boundary, "");
  return result;
}
