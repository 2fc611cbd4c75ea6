import type { PrimitiveValue, Rgba, Vec2, Vec3 } from "./host.js";
import type { ImportTracker } from "./imports.js";
import { isIdentifier } from "./names.js";

const MAX_SINGLE_PRECISION_DIGITS = 9;

/**
 * `double` prints the number exactly as the host holds it. `single` prints
 * the shortest decimal that survives a round trip through a 32-bit float,
 * for hosts that store floats that way (0.1, not 0.10000000149).
 */
export type FloatPrecision = "double" | "single";

export function formatFloat(value: number, precision: FloatPrecision = "double"): string {
  if (Number.isNaN(value)) return "Number.NaN";
  if (value === Number.POSITIVE_INFINITY) return "Number.POSITIVE_INFINITY";
  if (value === Number.NEGATIVE_INFINITY) return "Number.NEGATIVE_INFINITY";
  if (precision === "double") return String(value);

  const single = Math.fround(value);
  if (single === 0) return "0";
  for (let precision = 1; precision <= MAX_SINGLE_PRECISION_DIGITS; precision += 1) {
    const candidate = Number(single.toPrecision(precision));
    if (Math.fround(candidate) === single) return String(candidate);
  }
  return String(single);
}

export function formatInteger(value: number): string {
  if (!Number.isFinite(value)) return "0";
  const truncated = Math.trunc(value);
  return String(truncated === 0 ? 0 : truncated);
}

export function formatString(value: string): string {
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r");
  return `"${escaped}"`;
}

export function formatBoolean(value: boolean): string {
  return value ? "true" : "false";
}

/** `owner.name`, or `owner["name"]` when the name is not an identifier. */
export function formatMemberAccess(owner: string, member: string): string {
  return isIdentifier(member) ? `${owner}.${member}` : `${owner}[${formatString(member)}]`;
}

function formatComponents(values: readonly number[], precision: FloatPrecision): string {
  return values.map((value) => formatFloat(value, precision)).join(", ");
}

export function formatVector2(value: Vec2, imports: ImportTracker, precision: FloatPrecision = "double"): string {
  imports.useRuntime("Vector2");
  return `new Vector2(${formatComponents([value.x, value.y], precision)})`;
}

export function formatVector3(value: Vec3, imports: ImportTracker, precision: FloatPrecision = "double"): string {
  imports.useRuntime("Vector3");
  return `new Vector3(${formatComponents([value.x, value.y, value.z], precision)})`;
}

export function formatColor(value: Rgba, imports: ImportTracker, precision: FloatPrecision = "double"): string {
  imports.useRuntime("Color");
  return `new Color(${formatComponents([value.r, value.g, value.b, value.a], precision)})`;
}

/**
 * Source expression for a primitive value, or `null` when the value cannot be
 * expressed (an enum index outside its member list).
 */
export function formatPrimitive(
  value: PrimitiveValue,
  imports: ImportTracker,
  precision: FloatPrecision = "double",
): string | null {
  switch (value.kind) {
    case "boolean":
      return formatBoolean(value.value);
    case "integer":
      return formatInteger(value.value);
    case "float":
      return formatFloat(value.value, precision);
    case "string":
      return formatString(value.value);
    case "enum": {
      const member = value.members[value.index];
      if (member === undefined || value.index < 0) return null;
      return formatMemberAccess(imports.useBehaviorModule(value.enumName), member);
    }
    case "vector2":
      return formatVector2(value.value, imports, precision);
    case "vector3":
      return formatVector3(value.value, imports, precision);
    case "color":
      return formatColor(value.value, imports, precision);
  }
}
