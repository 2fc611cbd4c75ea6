import {
  structuralEquals,
  type FieldValue,
  type Frame,
  type ReferenceTarget,
  type ReflectedField,
  type SceneHost,
} from "@scenecast/codegen";
import { Behavior, FIELD_PATH_SEPARATOR, type FieldDeclaration } from "./behavior.js";
import { SceneError } from "./errors.js";
import { Color, Vector2, Vector3 } from "./math.js";
import type { Scene } from "./scene.js";
import { SceneNode } from "./sceneNode.js";
import { Transform } from "./transform.js";

export const TEMPLATE_NODE_NAME = "__template_default_check";

type SceneFieldValue = FieldValue<SceneNode, Behavior>;

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (Array.isArray(value)) return "an array";
  if (value instanceof Object) return `a ${value.constructor.name}`;
  return `a ${typeof value}`;
}

function toReferenceTarget(value: unknown): ReferenceTarget<SceneNode, Behavior> | null {
  if (value === null || value === undefined) return null;
  if (value instanceof SceneNode) return { type: "node", node: value };
  if (value instanceof Behavior) return { type: "behavior", behavior: value };
  if (value instanceof Transform) return { type: "frame", node: value.node };
  return { type: "unknown", description: describeValue(value) };
}

function toFieldValue(
  declaration: Exclude<FieldDeclaration, { kind: "group" }>,
  raw: unknown,
  location: string,
): SceneFieldValue {
  const mismatch = (expected: string) =>
    new SceneError("SC_ERR_FIELD_TYPE", `Field ${location} expects ${expected} but holds ${describeValue(raw)}.`);

  switch (declaration.kind) {
    case "boolean":
      if (typeof raw !== "boolean") throw mismatch("a boolean");
      return { kind: "boolean", value: raw };
    case "integer":
      if (typeof raw !== "number" || !Number.isInteger(raw)) throw mismatch("an integer");
      return { kind: "integer", value: raw };
    case "float":
      if (typeof raw !== "number") throw mismatch("a number");
      return { kind: "float", value: raw };
    case "string":
      if (typeof raw !== "string") throw mismatch("a string");
      return { kind: "string", value: raw };
    case "enum":
      if (typeof raw !== "string") throw mismatch(`a ${declaration.enumName} member`);
      return {
        kind: "enum",
        enumName: declaration.enumName,
        members: declaration.members,
        index: declaration.members.indexOf(raw),
      };
    case "vector2":
      if (!(raw instanceof Vector2)) throw mismatch("a Vector2");
      return { kind: "vector2", value: { x: raw.x, y: raw.y } };
    case "vector3":
      if (!(raw instanceof Vector3)) throw mismatch("a Vector3");
      return { kind: "vector3", value: { x: raw.x, y: raw.y, z: raw.z } };
    case "color":
      if (!(raw instanceof Color)) throw mismatch("a Color");
      return { kind: "color", value: { r: raw.r, g: raw.g, b: raw.b, a: raw.a } };
    case "reference":
      return { kind: "reference", target: toReferenceTarget(raw) };
    case "asset":
      return { kind: "unsupported", typeName: declaration.typeName };
  }
}

function reflectFields(
  behavior: Behavior,
  declarations: readonly FieldDeclaration[],
  prefix: string,
  result: ReflectedField<SceneNode, Behavior>[],
): ReflectedField<SceneNode, Behavior>[] {
  for (const declaration of declarations) {
    const path = prefix.length === 0 ? declaration.name : `${prefix}${FIELD_PATH_SEPARATOR}${declaration.name}`;
    if (declaration.kind === "group") {
      reflectFields(behavior, declaration.fields, path, result);
      continue;
    }
    result.push({
      name: declaration.name,
      path,
      read: () => toFieldValue(declaration, behavior.readField(path), `${behavior.behaviorType.typeName}.${path}`),
    });
  }
  return result;
}

function frameOf(node: SceneNode): Frame {
  if (node.hasRectTransform) {
    const rect = node.rectTransform;
    return {
      kind: "rect",
      anchorMin: rect.anchorMin,
      anchorMax: rect.anchorMax,
      pivot: rect.pivot,
      anchoredPosition: rect.anchoredPosition,
      sizeDelta: rect.sizeDelta,
      rotation: rect.localEulerAngles,
      scale: rect.localScale,
    };
  }
  const { transform } = node;
  return {
    kind: "spatial",
    position: transform.localPosition,
    rotation: transform.localEulerAngles,
    scale: transform.localScale,
  };
}

/**
 * Exposes a live scene to the generator. Default templates are built as
 * throwaway nodes in `scene` and destroyed on release.
 */
export function createSceneHost(scene: Scene): SceneHost<SceneNode, Behavior> {
  return {
    nodeName: (node) => node.name,
    parentOf: (node) => node.parent,
    childrenOf: (node) => node.children,
    frameOf,
    behaviorsOf: (node) => node.behaviors,
    ownerOf: (behavior) => behavior.node,
    behaviorTypeName: (behavior) => behavior.behaviorType.typeName,
    fieldsOf: (behavior) => reflectFields(behavior, behavior.behaviorType.fields, "", []),
    createDefaultTemplate(behavior) {
      const templateNode = scene.createNode(TEMPLATE_NODE_NAME);
      try {
        const instance = templateNode.addBehavior(behavior.behaviorType);
        return {
          instance,
          release: () => scene.destroyNode(templateNode),
        };
      } catch (error) {
        scene.destroyNode(templateNode);
        throw error;
      }
    },
    valuesEqual: structuralEquals,
  };
}
