/**
 * Capability interface a host graph implements so the generator can walk it.
 * The generator never names concrete host types: nodes and behaviors are
 * opaque objects compared by identity.
 */

export interface Vec2 {
  x: number;
  y: number;
}

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

export interface Rgba {
  r: number;
  g: number;
  b: number;
  a: number;
}

export type PrimitiveValue =
  | { kind: "boolean"; value: boolean }
  | { kind: "integer"; value: number }
  | { kind: "float"; value: number }
  | { kind: "string"; value: string }
  | { kind: "enum"; enumName: string; members: readonly string[]; index: number }
  | { kind: "vector2"; value: Vec2 }
  | { kind: "vector3"; value: Vec3 }
  | { kind: "color"; value: Rgba };

export type ReferenceTarget<TNode, TBehavior> =
  | { type: "node"; node: TNode }
  | { type: "behavior"; behavior: TBehavior }
  | { type: "frame"; node: TNode }
  | { type: "unknown"; description: string };

export interface ReferenceValue<TNode, TBehavior> {
  kind: "reference";
  target: ReferenceTarget<TNode, TBehavior> | null;
}

export interface UnsupportedValue {
  kind: "unsupported";
  typeName: string;
}

export type FieldValue<TNode, TBehavior> = PrimitiveValue | ReferenceValue<TNode, TBehavior> | UnsupportedValue;

export type FieldKind = FieldValue<unknown, unknown>["kind"];

export interface ReflectedField<TNode, TBehavior> {
  name: string;
  /** Dotted when the field lives inside another field. */
  path: string;
  read(): FieldValue<TNode, TBehavior>;
}

export interface SpatialFrame {
  kind: "spatial";
  position: Vec3;
  /** Euler angles in degrees. */
  rotation: Vec3;
  scale: Vec3;
}

export interface RectFrame {
  kind: "rect";
  anchorMin: Vec2;
  anchorMax: Vec2;
  pivot: Vec2;
  anchoredPosition: Vec2;
  sizeDelta: Vec2;
  rotation: Vec3;
  scale: Vec3;
}

export type Frame = SpatialFrame | RectFrame;

export interface DefaultTemplate<TBehavior> {
  instance: TBehavior;
  release(): void;
}

export interface SceneHost<TNode extends object, TBehavior extends object> {
  nodeName(node: TNode): string;
  parentOf(node: TNode): TNode | null;
  childrenOf(node: TNode): readonly TNode[];
  frameOf(node: TNode): Frame;
  behaviorsOf(node: TNode): readonly TBehavior[];
  ownerOf(behavior: TBehavior): TNode;
  behaviorTypeName(behavior: TBehavior): string;
  /** Fields in declaration order. */
  fieldsOf(behavior: TBehavior): Iterable<ReflectedField<TNode, TBehavior>>;
  /**
   * Builds a default-initialized instance of the behavior's type. Building it
   * may touch the host graph, so callers must release it.
   */
  createDefaultTemplate(behavior: TBehavior): DefaultTemplate<TBehavior>;
  valuesEqual(a: FieldValue<TNode, TBehavior>, b: FieldValue<TNode, TBehavior>): boolean;
}
