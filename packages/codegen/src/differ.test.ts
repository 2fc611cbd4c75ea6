import { describe, expect, it } from "vitest";
import { createDiffOptions, diffAgainstDefaults } from "./differ.js";
import { CARD_TYPE, createFakeGraph, float, integer, nodeRef, text, type FakeType } from "./__tests__/fakeHost.js";

describe("diffAgainstDefaults", () => {
  it("reports nothing for a default-initialized behavior", () => {
    const graph = createFakeGraph();
    const card = graph.attach(graph.node("Card"), CARD_TYPE);
    expect(diffAgainstDefaults(graph.host, card, createDiffOptions())).toEqual([]);
    expect(graph.liveTemplates()).toBe(0);
  });

  it("reports exactly the changed fields in declaration order", () => {
    const graph = createFakeGraph();
    const other = graph.node("Other");
    const card = graph.attach(graph.node("Card"), CARD_TYPE, {
      _target: nodeRef(other),
      _cost: integer(3),
      _speed: float(1),
    });
    const differences = diffAgainstDefaults(graph.host, card, createDiffOptions());
    expect(differences.map((difference) => difference.name)).toEqual(["_cost", "_target"]);
    expect(differences[0]?.value).toEqual({ kind: "integer", value: 3 });
  });

  it("releases the template when reading the graph throws", () => {
    const graph = createFakeGraph();
    const card = graph.attach(graph.node("Card"), CARD_TYPE);
    const failingHost = {
      ...graph.host,
      fieldsOf: () => {
        throw new Error("detached");
      },
    };
    expect(() => diffAgainstDefaults(failingHost, card, createDiffOptions())).toThrow("detached");
    expect(graph.templatesCreated()).toBe(1);
    expect(graph.liveTemplates()).toBe(0);
  });

  it("skips empty strings unless asked to compare them", () => {
    const type: FakeType = { name: "Label", fields: [{ name: "_text", defaultValue: text("Hello") }] };
    const graph = createFakeGraph();
    const label = graph.attach(graph.node("Label"), type, { _text: text("") });

    expect(diffAgainstDefaults(graph.host, label, createDiffOptions())).toEqual([]);
    expect(diffAgainstDefaults(graph.host, label, createDiffOptions({ emptyStrings: "compare" }))).toEqual([
      { name: "_text", path: "_text", value: { kind: "string", value: "" } },
    ]);
  });

  it("skips denied names, reserved prefixes and nested paths", () => {
    const type: FakeType = {
      name: "Panel",
      fields: [
        { name: "_registry", defaultValue: integer(0) },
        { name: "m_Color", defaultValue: integer(0) },
        { name: "x", path: "_offset.x", defaultValue: float(0) },
        { name: "_width", defaultValue: float(0) },
      ],
    };
    const graph = createFakeGraph();
    const panel = graph.attach(graph.node("Panel"), type, {
      _registry: integer(1),
      m_Color: integer(2),
      "_offset.x": float(3),
      _width: float(4),
    });
    const differences = diffAgainstDefaults(graph.host, panel, createDiffOptions());
    expect(differences.map((difference) => difference.path)).toEqual(["_width"]);
  });

  it("warns about unreadable fields and keeps going", () => {
    const warnings: string[] = [];
    const graph = createFakeGraph();
    const card = graph.attach(graph.node("Card"), CARD_TYPE, { _cost: integer(2) });
    card.unreadable.add("_speed");

    const differences = diffAgainstDefaults(
      graph.host,
      card,
      createDiffOptions({ warn: (message) => warnings.push(message) }),
    );
    expect(differences.map((difference) => difference.name)).toEqual(["_cost"]);
    expect(warnings).toEqual(["Skipping unreadable field Card._speed: cannot read _speed"]);
  });

  it("ignores unsupported values", () => {
    const type: FakeType = { name: "Odd", fields: [{ name: "_curve", defaultValue: integer(0) }] };
    const graph = createFakeGraph();
    const odd = graph.attach(graph.node("Odd"), type, { _curve: { kind: "unsupported", typeName: "Curve" } });
    expect(diffAgainstDefaults(graph.host, odd, createDiffOptions())).toEqual([]);
  });
});
