import { isIdentifier } from "@scenecast/codegen";
import { z } from "zod";
import { defineBehaviorType, type BehaviorType, type EnumField, type FieldDeclaration } from "./behavior.js";
import { SceneError } from "./errors.js";
import { Color, Vector2, Vector3 } from "./math.js";
import { Scene } from "./scene.js";
import type { SceneNode } from "./sceneNode.js";

export const SCENE_DOCUMENT_VERSION = 1;

const Vector2Schema = z.tuple([z.number(), z.number()]);
const Vector3Schema = z.tuple([z.number(), z.number(), z.number()]);
const ColorSchema = z.union([
  z.tuple([z.number(), z.number(), z.number()]),
  z.tuple([z.number(), z.number(), z.number(), z.number()]),
]);

const ReferenceSchema = z.union([
  z.object({ frame: z.string().min(1) }).strict(),
  z.object({ node: z.string().min(1), behavior: z.string().min(1).optional() }).strict(),
]);

const VALUE_KINDS = ["boolean", "integer", "float", "string", "vector2", "vector3", "color", "reference"] as const;

export type FieldDeclarationDocument =
  | { kind: (typeof VALUE_KINDS)[number]; name: string; default?: unknown }
  | { kind: "enum"; name: string; enum: string; default?: string }
  | { kind: "asset"; name: string; typeName: string }
  | { kind: "group"; name: string; fields: FieldDeclarationDocument[] };

const FieldDeclarationSchema: z.ZodType<FieldDeclarationDocument> = z.lazy(() =>
  z.union([
    z.object({ kind: z.enum(VALUE_KINDS), name: z.string().min(1), default: z.unknown().optional() }),
    z.object({
      kind: z.literal("enum"),
      name: z.string().min(1),
      enum: z.string().min(1),
      default: z.string().optional(),
    }),
    z.object({ kind: z.literal("asset"), name: z.string().min(1), typeName: z.string().min(1) }),
    z.object({ kind: z.literal("group"), name: z.string().min(1), fields: z.array(FieldDeclarationSchema) }),
  ]),
);

const FrameSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("spatial"),
    position: Vector3Schema.optional(),
    rotation: Vector3Schema.optional(),
    scale: Vector3Schema.optional(),
  }),
  z.object({
    kind: z.literal("rect"),
    anchorMin: Vector2Schema.optional(),
    anchorMax: Vector2Schema.optional(),
    pivot: Vector2Schema.optional(),
    anchoredPosition: Vector2Schema.optional(),
    sizeDelta: Vector2Schema.optional(),
    rotation: Vector3Schema.optional(),
    scale: Vector3Schema.optional(),
  }),
]);

const NodeSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  parent: z.string().min(1).nullable().optional(),
  frame: FrameSchema.optional(),
  behaviors: z
    .array(
      z.object({
        type: z.string().min(1),
        fields: z.record(z.unknown()).optional(),
      }),
    )
    .optional(),
});

export const SceneDocumentSchema = z.object({
  version: z.literal(SCENE_DOCUMENT_VERSION),
  enums: z.record(z.array(z.string().min(1)).min(1)).optional(),
  behaviorTypes: z
    .array(
      z.object({
        name: z.string().min(1),
        fields: z.array(FieldDeclarationSchema),
      }),
    )
    .optional(),
  nodes: z.array(NodeSchema),
});

export type SceneDocument = z.infer<typeof SceneDocumentSchema>;
type NodeDocument = z.infer<typeof NodeSchema>;

export interface LoadedScene {
  scene: Scene;
  nodesById: Map<string, SceneNode>;
  types: Map<string, BehaviorType>;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
    .join("; ");
}

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function parseWith<T>(schema: Schema<T>, value: unknown, location: string, expected: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new SceneError("SC_ERR_FIELD_TYPE", `${location} expects ${expected}.`);
  }
  return result.data;
}

function toColor(channels: z.output<typeof ColorSchema>): Color {
  return new Color(channels[0], channels[1], channels[2], channels.length === 4 ? channels[3] : 1);
}

type ReferenceResolver = (reference: z.infer<typeof ReferenceSchema>, location: string) => unknown;

/** Turns a JSON field value into the run-time value the declaration describes. */
function convertValue(
  declaration: Exclude<FieldDeclaration, { kind: "group" }>,
  raw: unknown,
  location: string,
  resolveReference: ReferenceResolver | null,
): unknown {
  switch (declaration.kind) {
    case "boolean":
      return parseWith(z.boolean(), raw, location, "a boolean");
    case "integer":
      return parseWith(z.number().int(), raw, location, "an integer");
    case "float":
      return parseWith(z.number(), raw, location, "a number");
    case "string":
      return parseWith(z.string(), raw, location, "a string");
    case "enum": {
      const member = parseWith(z.string(), raw, location, `a ${declaration.enumName} member`);
      if (!declaration.members.includes(member)) {
        throw new SceneError(
          "SC_ERR_FIELD_TYPE",
          `${location} expects one of ${declaration.members.join(", ")} but got "${member}".`,
        );
      }
      return member;
    }
    case "vector2": {
      return new Vector2(...parseWith(Vector2Schema, raw, location, "[x, y]"));
    }
    case "vector3": {
      return new Vector3(...parseWith(Vector3Schema, raw, location, "[x, y, z]"));
    }
    case "color": {
      return toColor(parseWith(ColorSchema, raw, location, "[r, g, b] or [r, g, b, a]"));
    }
    case "reference": {
      if (raw === null) return null;
      const reference = parseWith(ReferenceSchema, raw, location, "null, {node}, {node, behavior} or {frame}");
      if (!resolveReference) {
        throw new SceneError("SC_ERR_FIELD_TYPE", `${location} cannot default to a reference.`);
      }
      return resolveReference(reference, location);
    }
    case "asset":
      return raw;
  }
}

function convertDeclaration(
  document: FieldDeclarationDocument,
  enums: Record<string, string[]>,
  location: string,
): FieldDeclaration {
  const fieldLocation = `${location}.${document.name}`;
  switch (document.kind) {
    case "enum": {
      const members = enums[document.enum];
      if (!members) {
        throw new SceneError("SC_ERR_UNKNOWN_ENUM", `${fieldLocation} uses unknown enum "${document.enum}".`);
      }
      const declaration: EnumField = { kind: "enum", name: document.name, enumName: document.enum, members };
      if (document.default !== undefined) {
        declaration.default = parseMember(declaration.members, document.default, fieldLocation);
      }
      return declaration;
    }
    case "asset":
      return { kind: "asset", name: document.name, typeName: document.typeName };
    case "group":
      return {
        kind: "group",
        name: document.name,
        fields: document.fields.map((field) => convertDeclaration(field, enums, fieldLocation)),
      };
    case "reference":
      return { kind: "reference", name: document.name };
    case "boolean":
      return { kind: "boolean", name: document.name, default: optionalDefault(z.boolean(), document, fieldLocation) };
    case "integer":
      return {
        kind: "integer",
        name: document.name,
        default: optionalDefault(z.number().int(), document, fieldLocation),
      };
    case "float":
      return { kind: "float", name: document.name, default: optionalDefault(z.number(), document, fieldLocation) };
    case "string":
      return { kind: "string", name: document.name, default: optionalDefault(z.string(), document, fieldLocation) };
    case "vector2": {
      const value = optionalDefault(Vector2Schema, document, fieldLocation);
      return { kind: "vector2", name: document.name, default: value && new Vector2(value[0], value[1]) };
    }
    case "vector3": {
      const value = optionalDefault(Vector3Schema, document, fieldLocation);
      return { kind: "vector3", name: document.name, default: value && new Vector3(value[0], value[1], value[2]) };
    }
    case "color": {
      const value = optionalDefault(ColorSchema, document, fieldLocation);
      return { kind: "color", name: document.name, default: value && toColor(value) };
    }
  }
}

function parseMember(members: readonly string[], value: string, location: string): string {
  if (!members.includes(value)) {
    throw new SceneError("SC_ERR_FIELD_TYPE", `${location} expects one of ${members.join(", ")} but got "${value}".`);
  }
  return value;
}

function optionalDefault<T>(schema: Schema<T>, document: { default?: unknown }, location: string): T | undefined {
  if (document.default === undefined) return undefined;
  return parseWith(schema, document.default, `${location} default`, "a value of its kind");
}

function requireTypeName(name: string, label: string) {
  if (!isIdentifier(name)) {
    throw new SceneError("SC_ERR_INVALID_TYPE_NAME", `${label} name "${name}" is not a valid identifier.`);
  }
}

function applyFrame(node: SceneNode, frame: NodeDocument["frame"]) {
  if (!frame) return;
  if (frame.kind === "rect") {
    const rect = node.addRectTransform();
    if (frame.anchorMin) rect.anchorMin = new Vector2(...frame.anchorMin);
    if (frame.anchorMax) rect.anchorMax = new Vector2(...frame.anchorMax);
    if (frame.pivot) rect.pivot = new Vector2(...frame.pivot);
    if (frame.anchoredPosition) rect.anchoredPosition = new Vector2(...frame.anchoredPosition);
    if (frame.sizeDelta) rect.sizeDelta = new Vector2(...frame.sizeDelta);
  }
  const { transform } = node;
  if (frame.kind === "spatial" && frame.position) transform.localPosition = new Vector3(...frame.position);
  if (frame.rotation) transform.localEulerAngles = new Vector3(...frame.rotation);
  if (frame.scale) transform.localScale = new Vector3(...frame.scale);
}

/**
 * Builds a live scene from a parsed scene document. Nodes are created in
 * document order; field values are assigned once every node and behavior
 * exists, so references may point forward.
 */
export function buildScene(input: unknown): LoadedScene {
  const parsed = SceneDocumentSchema.safeParse(input);
  if (!parsed.success) {
    throw new SceneError("SC_ERR_INVALID_DOCUMENT", `Invalid scene document: ${formatIssues(parsed.error)}`);
  }
  const document = parsed.data;
  const enums = document.enums ?? {};
  // Type and enum names are emitted verbatim into generated modules.
  for (const enumName of Object.keys(enums)) {
    requireTypeName(enumName, "Enum");
  }

  const types = new Map<string, BehaviorType>();
  for (const typeDocument of document.behaviorTypes ?? []) {
    requireTypeName(typeDocument.name, "Behavior type");
    if (types.has(typeDocument.name)) {
      throw new SceneError("SC_ERR_DUPLICATE_TYPE", `Behavior type "${typeDocument.name}" is declared twice.`);
    }
    const fields = typeDocument.fields.map((field) => convertDeclaration(field, enums, typeDocument.name));
    types.set(typeDocument.name, defineBehaviorType(typeDocument.name, fields));
  }

  const scene = new Scene();
  const nodesById = new Map<string, SceneNode>();
  for (const nodeDocument of document.nodes) {
    if (nodesById.has(nodeDocument.id)) {
      throw new SceneError("SC_ERR_DUPLICATE_NODE", `Node id "${nodeDocument.id}" is used twice.`);
    }
    nodesById.set(nodeDocument.id, scene.createNode(nodeDocument.name));
  }

  const requireNode = (id: string, location: string) => {
    const node = nodesById.get(id);
    if (!node) {
      throw new SceneError("SC_ERR_UNKNOWN_NODE", `${location} refers to unknown node "${id}".`);
    }
    return node;
  };
  const requireType = (name: string, location: string) => {
    const type = types.get(name);
    if (!type) {
      throw new SceneError("SC_ERR_UNKNOWN_BEHAVIOR_TYPE", `${location} uses unknown behavior type "${name}".`);
    }
    return type;
  };

  for (const nodeDocument of document.nodes) {
    const node = requireNode(nodeDocument.id, "nodes");
    if (nodeDocument.parent) {
      node.setParent(requireNode(nodeDocument.parent, `Node "${nodeDocument.id}"`));
    }
    applyFrame(node, nodeDocument.frame);
    for (const behaviorDocument of nodeDocument.behaviors ?? []) {
      node.addBehavior(requireType(behaviorDocument.type, `Node "${nodeDocument.id}"`));
    }
  }

  const resolveReference: ReferenceResolver = (reference, location) => {
    if ("frame" in reference) {
      return requireNode(reference.frame, location).transform;
    }
    const node = requireNode(reference.node, location);
    if (reference.behavior === undefined) return node;
    const behavior = node.getBehavior(requireType(reference.behavior, location));
    if (!behavior) {
      throw new SceneError(
        "SC_ERR_UNKNOWN_BEHAVIOR",
        `${location} refers to ${reference.behavior} on node "${reference.node}", which has none.`,
      );
    }
    return behavior;
  };

  const assignFields = (
    target: { writeField(path: string, value: unknown): void },
    declarations: readonly FieldDeclaration[],
    values: Record<string, unknown>,
    prefix: string,
    location: string,
  ) => {
    for (const [name, raw] of Object.entries(values)) {
      const declaration = declarations.find((candidate) => candidate.name === name);
      const path = prefix.length === 0 ? name : `${prefix}.${name}`;
      const fieldLocation = `${location}.${name}`;
      if (!declaration) {
        throw new SceneError("SC_ERR_UNKNOWN_FIELD", `${fieldLocation} is not a declared field.`);
      }
      if (declaration.kind === "group") {
        const nested = parseWith(z.record(z.unknown()), raw, fieldLocation, "an object");
        assignFields(target, declaration.fields, nested, path, fieldLocation);
        continue;
      }
      target.writeField(path, convertValue(declaration, raw, fieldLocation, resolveReference));
    }
  };

  for (const nodeDocument of document.nodes) {
    const node = requireNode(nodeDocument.id, "nodes");
    (nodeDocument.behaviors ?? []).forEach((behaviorDocument, index) => {
      const behavior = node.behaviors[index];
      if (!behavior || !behaviorDocument.fields) return;
      assignFields(
        behavior,
        behavior.behaviorType.fields,
        behaviorDocument.fields,
        "",
        `${nodeDocument.id}.${behaviorDocument.type}`,
      );
    });
  }

  return { scene, nodesById, types };
}

/** Parses scene document JSON text and builds the scene it describes. */
export function loadSceneDocument(json: string): LoadedScene {
  let input: unknown;
  try {
    input = JSON.parse(json);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new SceneError("SC_ERR_INVALID_JSON", `Scene document is not valid JSON: ${detail}`);
  }
  return buildScene(input);
}
