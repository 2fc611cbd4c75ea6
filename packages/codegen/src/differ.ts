import { describeError } from "./errors.js";
import type { FieldValue, ReflectedField, SceneHost } from "./host.js";

export const DEFAULT_SKIPPED_FIELDS: readonly string[] = [
  "_registry",
  "_objects",
  "m_Script",
  "m_GameObject",
  "m_Enabled",
  "m_ObjectHideFlags",
];

export const DEFAULT_RESERVED_PREFIXES: readonly string[] = ["m_"];

/**
 * `skip` never emits an empty string, even when the type's default is
 * non-empty; `compare` treats it like any other value.
 */
export type EmptyStringPolicy = "skip" | "compare";

export interface DiffOptions {
  skippedFields: ReadonlySet<string>;
  reservedPrefixes: readonly string[];
  emptyStrings: EmptyStringPolicy;
  warn(message: string): void;
}

export interface FieldDifference<TNode, TBehavior> {
  name: string;
  path: string;
  value: Exclude<FieldValue<TNode, TBehavior>, { kind: "unsupported" }>;
}

export function createDiffOptions(overrides: Partial<DiffOptions> = {}): DiffOptions {
  return {
    skippedFields: overrides.skippedFields ?? new Set(DEFAULT_SKIPPED_FIELDS),
    reservedPrefixes: overrides.reservedPrefixes ?? DEFAULT_RESERVED_PREFIXES,
    emptyStrings: overrides.emptyStrings ?? "skip",
    warn: overrides.warn ?? (() => undefined),
  };
}

function isSkippedField<TNode, TBehavior>(field: ReflectedField<TNode, TBehavior>, options: DiffOptions): boolean {
  if (options.skippedFields.has(field.name)) return true;
  if (options.reservedPrefixes.some((prefix) => field.name.startsWith(prefix))) return true;
  return field.path.includes(".");
}

function readField<TNode, TBehavior>(
  field: ReflectedField<TNode, TBehavior>,
  owner: string,
  options: DiffOptions,
): FieldValue<TNode, TBehavior> | null {
  try {
    return field.read();
  } catch (error) {
    options.warn(`Skipping unreadable field ${owner}.${field.path}: ${describeError(error)}`);
    return null;
  }
}

/**
 * Top-level fields of `behavior` whose values differ from a freshly built
 * default instance of the same type, in declaration order.
 */
export function diffAgainstDefaults<TNode extends object, TBehavior extends object>(
  host: SceneHost<TNode, TBehavior>,
  behavior: TBehavior,
  options: DiffOptions,
): FieldDifference<TNode, TBehavior>[] {
  const typeName = host.behaviorTypeName(behavior);
  const template = host.createDefaultTemplate(behavior);
  try {
    const defaults = new Map<string, ReflectedField<TNode, TBehavior>>();
    for (const field of host.fieldsOf(template.instance)) {
      defaults.set(field.path, field);
    }

    const differences: FieldDifference<TNode, TBehavior>[] = [];
    for (const field of host.fieldsOf(behavior)) {
      if (isSkippedField(field, options)) continue;

      const value = readField(field, typeName, options);
      if (value === null || value.kind === "unsupported") continue;
      if (value.kind === "string" && options.emptyStrings === "skip" && value.value.length === 0) continue;

      const defaultField = defaults.get(field.path);
      if (!defaultField) continue;
      const defaultValue = readField(defaultField, typeName, options);
      if (defaultValue === null) continue;

      if (host.valuesEqual(value, defaultValue)) continue;
      differences.push({ name: field.name, path: field.path, value });
    }
    return differences;
  } finally {
    template.release();
  }
}
