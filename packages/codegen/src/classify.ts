import { resolveAnchorPath } from "./anchors.js";
import type { ReferenceTarget, SceneHost } from "./host.js";

export type LocalReference<TNode, TBehavior> =
  | { kind: "node"; node: TNode }
  | { kind: "behavior"; node: TNode; behavior: TBehavior }
  | { kind: "frame"; node: TNode };

export type ReferenceClass<TNode, TBehavior> =
  | LocalReference<TNode, TBehavior>
  | { kind: "anchor"; path: string; target: LocalReference<TNode, TBehavior> }
  | { kind: "unsupported"; description: string };

function toLocalReference<TNode extends object, TBehavior extends object>(
  host: SceneHost<TNode, TBehavior>,
  target: Exclude<ReferenceTarget<TNode, TBehavior>, { type: "unknown" }>,
): LocalReference<TNode, TBehavior> {
  switch (target.type) {
    case "node":
      return { kind: "node", node: target.node };
    case "frame":
      return { kind: "frame", node: target.node };
    case "behavior":
      return { kind: "behavior", node: host.ownerOf(target.behavior), behavior: target.behavior };
  }
}

/**
 * Decides how a reference field is rebuilt. Targets under an anchor boundary
 * are looked up by path instead of being constructed.
 */
export function classifyReference<TNode extends object, TBehavior extends object>(
  host: SceneHost<TNode, TBehavior>,
  target: ReferenceTarget<TNode, TBehavior>,
  boundaries: ReadonlySet<TNode>,
): ReferenceClass<TNode, TBehavior> {
  if (target.type === "unknown") {
    return { kind: "unsupported", description: target.description };
  }
  const local = toLocalReference(host, target);
  const path = resolveAnchorPath(host, local.node, boundaries);
  if (path !== null) {
    return { kind: "anchor", path, target: local };
  }
  return local;
}
