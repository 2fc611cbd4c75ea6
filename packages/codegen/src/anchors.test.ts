import { describe, expect, it } from "vitest";
import { collectAnchoredDescendants, resolveAnchorPath } from "./anchors.js";
import { classifyReference } from "./classify.js";
import { CARD_TYPE, createFakeGraph } from "./__tests__/fakeHost.js";

function buildCanvas() {
  const graph = createFakeGraph();
  const canvas = graph.node("Canvas");
  const a = graph.node("A", canvas);
  const b = graph.node("B", a);
  const target = graph.node("Target", b);
  const sibling = graph.node("Sibling", canvas);
  const outside = graph.node("Outside");
  return { graph, canvas, a, b, target, sibling, outside };
}

describe("resolveAnchorPath", () => {
  it("joins names from below the boundary down to the node", () => {
    const { graph, canvas, target } = buildCanvas();
    expect(resolveAnchorPath(graph.host, target, new Set([canvas]))).toBe("A/B/Target");
  });

  it("resolves a boundary to the empty path", () => {
    const { graph, canvas } = buildCanvas();
    expect(resolveAnchorPath(graph.host, canvas, new Set([canvas]))).toBe("");
  });

  it("returns null outside every boundary or without boundaries", () => {
    const { graph, canvas, target, outside } = buildCanvas();
    expect(resolveAnchorPath(graph.host, outside, new Set([canvas]))).toBeNull();
    expect(resolveAnchorPath(graph.host, target, new Set())).toBeNull();
  });

  it("uses the nearest boundary", () => {
    const { graph, canvas, a, target } = buildCanvas();
    expect(resolveAnchorPath(graph.host, target, new Set([canvas, a]))).toBe("B/Target");
  });
});

describe("collectAnchoredDescendants", () => {
  it("lists descendants depth first with their paths", () => {
    const { graph, canvas } = buildCanvas();
    expect(collectAnchoredDescendants(graph.host, canvas).map((entry) => entry.path)).toEqual([
      "A",
      "A/B",
      "A/B/Target",
      "Sibling",
    ]);
  });
});

describe("classifyReference", () => {
  it("classifies behavior targets by their owner", () => {
    const { graph, canvas, target, outside } = buildCanvas();
    const anchored = graph.attach(target, CARD_TYPE);
    const local = graph.attach(outside, CARD_TYPE);
    const boundaries = new Set([canvas]);

    expect(classifyReference(graph.host, { type: "behavior", behavior: anchored }, boundaries)).toEqual({
      kind: "anchor",
      path: "A/B/Target",
      target: { kind: "behavior", node: target, behavior: anchored },
    });
    expect(classifyReference(graph.host, { type: "behavior", behavior: local }, boundaries)).toEqual({
      kind: "behavior",
      node: outside,
      behavior: local,
    });
  });

  it("keeps frame and node targets local outside boundaries", () => {
    const { graph, outside } = buildCanvas();
    expect(classifyReference(graph.host, { type: "frame", node: outside }, new Set())).toEqual({
      kind: "frame",
      node: outside,
    });
  });

  it("marks unknown targets unsupported", () => {
    const { graph } = buildCanvas();
    expect(classifyReference(graph.host, { type: "unknown", description: "Material" }, new Set())).toEqual({
      kind: "unsupported",
      description: "Material",
    });
  });
});
