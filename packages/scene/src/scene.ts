import { SceneNode } from "./sceneNode.js";

export const PATH_SEPARATOR = "/";

/** Registry of the live nodes of one scene. */
export class Scene {
  private readonly live = new Set<SceneNode>();

  createNode(name: string, parent: SceneNode | null = null): SceneNode {
    const node = new SceneNode(name);
    this.live.add(node);
    if (parent) node.setParent(parent);
    return node;
  }

  /** Registers nodes built outside the scene, such as those returned by generated factories. */
  adopt(nodes: Iterable<SceneNode>): void {
    for (const node of nodes) {
      if (!node.isDestroyed) this.live.add(node);
    }
  }

  has(node: SceneNode): boolean {
    return this.live.has(node);
  }

  destroyNode(node: SceneNode): void {
    const doomed = [node, ...node.descendants()];
    node.destroy();
    for (const entry of doomed) {
      this.live.delete(entry);
    }
  }

  get nodeCount(): number {
    return this.live.size;
  }

  get roots(): SceneNode[] {
    return [...this.live].filter((node) => node.parent === null);
  }

  /** Resolves `Root/Child/Grandchild` by names, taking the first match at each level. */
  findByPath(path: string): SceneNode | null {
    const [rootName, ...rest] = path.split(PATH_SEPARATOR);
    let current = this.roots.find((node) => node.name === rootName) ?? null;
    for (const name of rest) {
      if (!current) return null;
      current = current.children.find((child) => child.name === name) ?? null;
    }
    return current;
  }
}
