import type { Behavior, BehaviorType } from "./behavior.js";
import { SceneError } from "./errors.js";
import { RectTransform, Transform } from "./transform.js";

export class SceneNode {
  name: string;
  private spatialTransform: Transform;
  private rect: RectTransform | null = null;
  private parentNode: SceneNode | null = null;
  private readonly childNodes: SceneNode[] = [];
  private readonly attached: Behavior[] = [];
  private destroyed = false;

  constructor(name: string) {
    this.name = name;
    this.spatialTransform = new Transform(this);
  }

  get transform(): Transform {
    return this.rect ?? this.spatialTransform;
  }

  get hasRectTransform(): boolean {
    return this.rect !== null;
  }

  get rectTransform(): RectTransform {
    if (!this.rect) {
      throw new SceneError("SC_ERR_NOT_RECT", `Node "${this.name}" has no rect transform.`);
    }
    return this.rect;
  }

  /** Swaps the spatial transform for a rect transform, keeping position, rotation and scale. */
  addRectTransform(): RectTransform {
    this.assertAlive();
    if (!this.rect) {
      this.rect = RectTransform.replacing(this.spatialTransform);
    }
    return this.rect;
  }

  get parent(): SceneNode | null {
    return this.parentNode;
  }

  get children(): readonly SceneNode[] {
    return this.childNodes;
  }

  get behaviors(): readonly Behavior[] {
    return this.attached;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  setParent(parent: SceneNode | null): void {
    this.assertAlive();
    if (parent === this.parentNode) return;
    for (let cursor = parent; cursor; cursor = cursor.parentNode) {
      if (cursor === this) {
        throw new SceneError("SC_ERR_PARENT_CYCLE", `Node "${this.name}" cannot become its own ancestor.`);
      }
    }
    this.detachFromParent();
    this.parentNode = parent;
    parent?.childNodes.push(this);
  }

  addBehavior<T extends Behavior>(type: BehaviorType<T>): T {
    this.assertAlive();
    const behavior = new type();
    behavior.attach(this, type);
    this.attached.push(behavior);
    return behavior;
  }

  getBehavior<T extends Behavior>(type: BehaviorType<T>): T | null {
    for (const behavior of this.attached) {
      if (behavior instanceof type) return behavior;
    }
    return null;
  }

  /** Every node below this one, depth first. */
  descendants(): SceneNode[] {
    const result: SceneNode[] = [];
    for (const child of this.childNodes) {
      result.push(child, ...child.descendants());
    }
    return result;
  }

  destroy(): void {
    if (this.destroyed) return;
    for (const child of [...this.childNodes]) {
      child.destroy();
    }
    this.detachFromParent();
    this.parentNode = null;
    this.attached.length = 0;
    this.destroyed = true;
  }

  private detachFromParent() {
    const siblings = this.parentNode?.childNodes;
    if (!siblings) return;
    const index = siblings.indexOf(this);
    if (index >= 0) siblings.splice(index, 1);
  }

  private assertAlive() {
    if (this.destroyed) {
      throw new SceneError("SC_ERR_DESTROYED_NODE", `Node "${this.name}" was destroyed.`);
    }
  }
}

/**
 * A pre-built hierarchy whose descendants are registered by path, so
 * generated code can bind to them instead of rebuilding them.
 */
export class AnchorContainer {
  readonly objects = new Map<string, SceneNode>();

  constructor(readonly root: SceneNode) {}

  require(path: string): SceneNode {
    const node = path.length === 0 ? this.root : this.objects.get(path);
    if (!node) {
      throw new SceneError("SC_ERR_UNKNOWN_ANCHOR", `No object is registered under "${path}".`);
    }
    return node;
  }
}
