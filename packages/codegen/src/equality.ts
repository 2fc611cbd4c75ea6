import type { FieldValue, ReferenceTarget, Rgba, Vec2, Vec3 } from "./host.js";

const FRAME_EPSILON_SQ = 1e-10;

function sameTarget<TNode, TBehavior>(
  a: ReferenceTarget<TNode, TBehavior> | null,
  b: ReferenceTarget<TNode, TBehavior> | null,
): boolean {
  if (a === null || b === null) return a === b;
  switch (a.type) {
    case "node":
      return b.type === "node" && a.node === b.node;
    case "frame":
      return b.type === "frame" && a.node === b.node;
    case "behavior":
      return b.type === "behavior" && a.behavior === b.behavior;
    case "unknown":
      return b.type === "unknown" && a.description === b.description;
  }
}

function sameVec2(a: Vec2, b: Vec2): boolean {
  return a.x === b.x && a.y === b.y;
}

function sameVec3(a: Vec3, b: Vec3): boolean {
  return a.x === b.x && a.y === b.y && a.z === b.z;
}

function sameColor(a: Rgba, b: Rgba): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a;
}

/**
 * Exact structural equality for reflected values. References compare by the
 * identity of their target; unsupported values never compare equal.
 */
export function structuralEquals<TNode, TBehavior>(
  a: FieldValue<TNode, TBehavior>,
  b: FieldValue<TNode, TBehavior>,
): boolean {
  switch (a.kind) {
    case "boolean":
      return b.kind === "boolean" && a.value === b.value;
    case "integer":
      return b.kind === "integer" && a.value === b.value;
    case "float":
      return b.kind === "float" && (a.value === b.value || (Number.isNaN(a.value) && Number.isNaN(b.value)));
    case "string":
      return b.kind === "string" && a.value === b.value;
    case "enum":
      return b.kind === "enum" && a.enumName === b.enumName && a.index === b.index;
    case "vector2":
      return b.kind === "vector2" && sameVec2(a.value, b.value);
    case "vector3":
      return b.kind === "vector3" && sameVec3(a.value, b.value);
    case "color":
      return b.kind === "color" && sameColor(a.value, b.value);
    case "reference":
      return b.kind === "reference" && sameTarget(a.target, b.target);
    case "unsupported":
      return false;
  }
}

export function approximatelyEqual2(a: Vec2, b: Vec2): boolean {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy < FRAME_EPSILON_SQ;
}

export function approximatelyEqual3(a: Vec3, b: Vec3): boolean {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  const dz = a.z - b.z;
  return dx * dx + dy * dy + dz * dz < FRAME_EPSILON_SQ;
}
