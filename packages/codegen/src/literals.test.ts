import { describe, expect, it } from "vitest";
import { isGeneratorError } from "./errors.js";
import { createImportTracker, renderImport } from "./imports.js";
import { formatFloat, formatInteger, formatMemberAccess, formatPrimitive, formatString } from "./literals.js";
import { createNameAllocator } from "./names.js";

describe("formatFloat", () => {
  it("prints doubles so they read back unchanged", () => {
    expect(formatFloat(0.123456789)).toBe("0.123456789");
    expect(formatFloat(1 / 3)).toBe("0.3333333333333333");
    expect(formatFloat(0.1)).toBe("0.1");
    expect(formatFloat(1e-7)).toBe("1e-7");
    for (const value of [0.123456789, 1 / 3, -15.4, 2 ** -30]) {
      expect(Number(formatFloat(value))).toBe(value);
    }
  });

  it("prints the shortest single-precision round trip on request", () => {
    expect(formatFloat(0.1, "single")).toBe("0.1");
    expect(formatFloat(2.7, "single")).toBe("2.7");
    expect(formatFloat(-15.4, "single")).toBe("-15.4");
    expect(formatFloat(1 / 3, "single")).toBe("0.33333334");
    expect(formatFloat(1, "single")).toBe("1");
    expect(formatFloat(0.1 + 0.2, "single")).toBe("0.3");
  });

  it("normalizes zero and spells out non-finite values", () => {
    expect(formatFloat(-0)).toBe("0");
    expect(formatFloat(Number.NaN)).toBe("Number.NaN");
    expect(formatFloat(Number.NEGATIVE_INFINITY)).toBe("Number.NEGATIVE_INFINITY");
  });
});

describe("scalar literals", () => {
  it("truncates integers", () => {
    expect(formatInteger(3.9)).toBe("3");
    expect(formatInteger(-2.5)).toBe("-2");
    expect(formatInteger(Number.NaN)).toBe("0");
  });

  it("escapes strings", () => {
    expect(formatString('a"b\\c\nd\re')).toBe('"a\\"b\\\\c\\nd\\re"');
  });

  it("uses bracket access for names that are not identifiers", () => {
    expect(formatMemberAccess("card", "_cost")).toBe("card._cost");
    expect(formatMemberAccess("card", "max hp")).toBe('card["max hp"]');
  });
});

describe("formatPrimitive", () => {
  it("formats enum members and records the enum import", () => {
    const imports = createImportTracker();
    const value = { kind: "enum", enumName: "Facing", members: ["Up", "Down"], index: 1 } as const;
    expect(formatPrimitive(value, imports)).toBe("Facing.Down");
    expect(imports.behaviorModuleSymbols()).toEqual([{ name: "Facing", localName: "Facing", typeOnly: false }]);
  });

  it("returns null for an enum index outside the member list", () => {
    const imports = createImportTracker();
    expect(formatPrimitive({ kind: "enum", enumName: "Facing", members: ["Up"], index: 4 }, imports)).toBeNull();
    expect(imports.behaviorModuleSymbols()).toEqual([]);
  });

  it("formats vectors and colors through runtime constructors", () => {
    const imports = createImportTracker();
    expect(formatPrimitive({ kind: "vector3", value: { x: 1, y: 0.5, z: -2 } }, imports)).toBe(
      "new Vector3(1, 0.5, -2)",
    );
    expect(formatPrimitive({ kind: "color", value: { r: 1, g: 0, b: 0, a: 0.25 } }, imports)).toBe(
      "new Color(1, 0, 0, 0.25)",
    );
    expect(imports.runtimeSymbols()).toEqual([
      { name: "Color", localName: "Color", typeOnly: false },
      { name: "Vector3", localName: "Vector3", typeOnly: false },
    ]);
  });

  it("applies the float precision to vector components", () => {
    const imports = createImportTracker();
    const value = { kind: "vector2", value: { x: 0.1 + 0.2, y: 2 } } as const;
    expect(formatPrimitive(value, imports)).toBe("new Vector2(0.30000000000000004, 2)");
    expect(formatPrimitive(value, imports, "single")).toBe("new Vector2(0.3, 2)");
  });
});

describe("import tracking", () => {
  it("keeps a symbol type-only until it is used as a value", () => {
    const imports = createImportTracker();
    imports.useRuntime("SceneNode", "type");
    imports.useRuntime("AnchorContainer", "type");
    imports.useRuntime("SceneNode");
    expect(renderImport(imports.runtimeSymbols(), "@scenecast/scene")).toBe(
      'import { type AnchorContainer, SceneNode } from "@scenecast/scene";',
    );
    expect(renderImport(imports.behaviorModuleSymbols(), "./behaviors.js")).toBeNull();
  });

  it("aliases behavior module symbols whose names are taken", () => {
    const names = createNameAllocator(["SceneNode"]);
    names.allocate("facing");
    const imports = createImportTracker(names);
    expect(imports.useBehaviorModule("SceneNode")).toBe("sceneNodeType");
    expect(imports.useBehaviorModule("facing", "type")).toBe("facingType");
    expect(imports.useBehaviorModule("Card")).toBe("Card");
    expect(names.allocate("facingType")).toBe("facingType1");
    expect(renderImport(imports.behaviorModuleSymbols(), "./behaviors.js")).toBe(
      'import { Card, SceneNode as sceneNodeType, type facing as facingType } from "./behaviors.js";',
    );
  });

  it("rejects behavior module symbols that are not identifiers", () => {
    const imports = createImportTracker();
    try {
      imports.useBehaviorModule("Card Layout");
      expect.unreachable();
    } catch (error) {
      expect(isGeneratorError(error) ? error.code : null).toBe("SC_ERR_INVALID_TYPE_NAME");
    }
  });
});
