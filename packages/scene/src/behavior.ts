import { SceneError } from "./errors.js";
import { Color, Vector2, Vector3 } from "./math.js";
import type { SceneNode } from "./sceneNode.js";

interface ValueField<K extends string, V> {
  kind: K;
  name: string;
  default?: V;
}

export interface EnumField extends ValueField<"enum", string> {
  enumName: string;
  members: readonly string[];
}

export interface ReferenceField {
  kind: "reference";
  name: string;
}

/** Opaque value the generator cannot rebuild, such as a texture or sound. */
export interface AssetField {
  kind: "asset";
  name: string;
  typeName: string;
}

export interface GroupField {
  kind: "group";
  name: string;
  fields: readonly FieldDeclaration[];
}

export type FieldDeclaration =
  | ValueField<"boolean", boolean>
  | ValueField<"integer", number>
  | ValueField<"float", number>
  | ValueField<"string", string>
  | ValueField<"vector2", Vector2>
  | ValueField<"vector3", Vector3>
  | ValueField<"color", Color>
  | EnumField
  | ReferenceField
  | AssetField
  | GroupField;

export interface BehaviorType<T extends Behavior = Behavior> {
  new (): T;
  readonly typeName: string;
  /** Serialized fields in declaration order. */
  readonly fields: readonly FieldDeclaration[];
}

export const FIELD_PATH_SEPARATOR = ".";

function isRecord(value: unknown): value is object {
  return typeof value === "object" && value !== null;
}

/**
 * Base class of every component attached to a scene node. Subclasses declare
 * their serialized fields as class properties and list them in a static
 * `fields` array.
 */
export abstract class Behavior {
  // Serialized fields may use any name outside RESERVED_FIELD_NAMES.
  #owner: SceneNode | null = null;
  #type: BehaviorType | null = null;

  get isAttached(): boolean {
    return this.#owner !== null;
  }

  get node(): SceneNode {
    if (!this.#owner) {
      throw new SceneError("SC_ERR_DETACHED_BEHAVIOR", "Behavior is not attached to a node.");
    }
    return this.#owner;
  }

  get behaviorType(): BehaviorType {
    if (!this.#type) {
      throw new SceneError("SC_ERR_DETACHED_BEHAVIOR", "Behavior is not attached to a node.");
    }
    return this.#type;
  }

  /** Binds the behavior to its node; `SceneNode.addBehavior` is the only caller. */
  attach(node: SceneNode, type: BehaviorType): void {
    if (this.#owner) {
      throw new SceneError("SC_ERR_ALREADY_ATTACHED", `Behavior ${type.typeName} is already attached.`);
    }
    this.#owner = node;
    this.#type = type;
  }

  readField(path: string): unknown {
    let current: unknown = this;
    for (const segment of path.split(FIELD_PATH_SEPARATOR)) {
      if (!isRecord(current) || !(segment in current)) {
        throw new SceneError("SC_ERR_UNKNOWN_FIELD", `Field "${path}" does not exist.`);
      }
      current = Reflect.get(current, segment);
    }
    return current;
  }

  writeField(path: string, value: unknown): void {
    const segments = path.split(FIELD_PATH_SEPARATOR);
    const last = segments.pop();
    const parent = segments.length === 0 ? this : this.readField(segments.join(FIELD_PATH_SEPARATOR));
    if (last === undefined || !isRecord(parent)) {
      throw new SceneError("SC_ERR_UNKNOWN_FIELD", `Field "${path}" cannot be written.`);
    }
    Reflect.set(parent, last, value);
  }
}

/** Members of `Behavior` and `Object` that a serialized field would shadow. */
export const RESERVED_FIELD_NAMES: ReadonlySet<string> = new Set([
  ...Object.getOwnPropertyNames(Behavior.prototype),
  ...Object.getOwnPropertyNames(Object.prototype),
]);

function checkFieldNames(typeName: string, fields: readonly FieldDeclaration[], prefix: string) {
  for (const field of fields) {
    const path = `${prefix}${field.name}`;
    if (RESERVED_FIELD_NAMES.has(field.name)) {
      throw new SceneError("SC_ERR_RESERVED_FIELD", `Field ${typeName}.${path} uses a reserved member name.`);
    }
    if (field.kind === "group") checkFieldNames(typeName, field.fields, `${path}${FIELD_PATH_SEPARATOR}`);
  }
}

function initialValue(declaration: FieldDeclaration): unknown {
  switch (declaration.kind) {
    case "boolean":
      return declaration.default ?? false;
    case "integer":
    case "float":
      return declaration.default ?? 0;
    case "string":
      return declaration.default ?? "";
    case "vector2":
      return declaration.default ?? Vector2.zero;
    case "vector3":
      return declaration.default ?? Vector3.zero;
    case "color":
      return declaration.default ?? Color.clear;
    case "enum":
      return declaration.default ?? declaration.members[0] ?? "";
    case "reference":
    case "asset":
      return null;
    case "group":
      return Object.fromEntries(declaration.fields.map((field) => [field.name, initialValue(field)]));
  }
}

/** Builds a behavior type from declarations, for types that only exist in scene documents. */
export function defineBehaviorType(typeName: string, fields: readonly FieldDeclaration[]): BehaviorType {
  checkFieldNames(typeName, fields, "");
  return class extends Behavior {
    static readonly typeName = typeName;
    static readonly fields = fields;

    constructor() {
      super();
      for (const field of fields) {
        this.writeField(field.name, initialValue(field));
      }
    }
  };
}
