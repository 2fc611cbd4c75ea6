import { describe, expect, it } from "vitest";
import { SourceBuilder } from "./sourceBuilder.js";
import { createGraphWalker, type WalkerOptions } from "./walker.js";
import {
  CARD_TYPE,
  LAYOUT_TYPE,
  NOTE_TYPE,
  behaviorRef,
  createFakeGraph,
  emptyRef,
  frameRef,
  nodeRef,
  rect,
  text,
  type FakeBehavior,
  type FakeGraph,
  type FakeNode,
  type FakeType,
} from "./__tests__/fakeHost.js";

function walk(graph: FakeGraph, options: Partial<WalkerOptions<FakeNode, FakeBehavior>> = {}) {
  const builder = new SourceBuilder();
  const walker = createGraphWalker(graph.host, builder, { isSupported: () => true, ...options });
  return { builder, walker };
}

function countOccurrences(source: string, needle: string): number {
  return source.split(needle).length - 1;
}

describe("graph walker", () => {
  it("constructs a node reached twice only once", () => {
    const graph = createFakeGraph();
    const deck = graph.node("Deck");
    const shared = graph.node("Shared");
    graph.attach(deck, LAYOUT_TYPE, { _anchor: nodeRef(shared), _frame: frameRef(shared) });

    const { builder, walker } = walk(graph);
    expect(walker.emitNode(deck, "Deck", true)).toBe("deck");
    const source = builder.toString();
    expect(countOccurrences(source, 'new SceneNode("Shared")')).toBe(1);
    expect(source).toContain("deck._anchor = anchorNode;\n");
    expect(source).toContain("deck._frame = anchorNode.transform;\n");
  });

  it("terminates on reference cycles", () => {
    const graph = createFakeGraph();
    const a = graph.node("A");
    const b = graph.node("B");
    graph.attach(a, CARD_TYPE, { _target: nodeRef(b) });
    graph.attach(b, CARD_TYPE, { _target: nodeRef(a) });

    const { builder, walker } = walk(graph);
    walker.emitNode(a, "A", true);
    const source = builder.toString();
    expect(countOccurrences(source, "new SceneNode(")).toBe(2);
    expect(source).toContain("target._target = aNode;\n");
    expect(source).toContain("a._target = targetNode;\n");
  });

  it("parents children that were built before their parent", () => {
    const graph = createFakeGraph();
    const root = graph.node("Root");
    const mid = graph.node("Mid", root);
    const leaf = graph.node("Leaf", mid);
    const midCard = graph.attach(mid, CARD_TYPE);
    graph.attach(root, CARD_TYPE, { _target: nodeRef(leaf), _partner: behaviorRef(midCard) });

    const { builder, walker } = walk(graph);
    walker.emitNode(root, "Root", true);
    expect(builder.toString()).toBe(
      [
        'const rootNode = new SceneNode("Root");',
        "createdObjects.push(rootNode);",
        "const root = rootNode.addBehavior(Card);",
        "",
        'const targetNode = new SceneNode("Leaf");',
        "createdObjects.push(targetNode);",
        "root._target = targetNode;",
        "",
        'const partnerNode = new SceneNode("Mid");',
        "createdObjects.push(partnerNode);",
        "partnerNode.setParent(rootNode);",
        "targetNode.setParent(partnerNode);",
        "const partner = partnerNode.addBehavior(Card);",
        "root._partner = partner;",
        "",
      ].join("\n"),
    );
  });

  it("names later behaviors on a node after the node and type", () => {
    const graph = createFakeGraph();
    const hand = graph.node("Hand");
    graph.attach(hand, CARD_TYPE);
    graph.attach(hand, LAYOUT_TYPE);

    const { builder, walker } = walk(graph);
    walker.emitNode(hand, "Hand", true);
    expect(builder.toString()).toContain("const handCardLayout = handNode.addBehavior(CardLayout);\n");
    expect(walker.primaryTypeName(hand)).toBe("Card");
  });

  it("binds frame references to the rect variable", () => {
    const graph = createFakeGraph();
    const deck = graph.node("Deck");
    const panel = graph.node(
      "Panel",
      null,
      rect({ anchorMin: { x: 0.5, y: 0.5 }, anchorMax: { x: 0.5, y: 0.5 }, sizeDelta: { x: 200, y: 100 } }),
    );
    graph.attach(deck, LAYOUT_TYPE, { _frame: frameRef(panel) });

    const { builder, walker } = walk(graph);
    walker.emitNode(deck, "Deck", true);
    expect(builder.toString()).toBe(
      [
        'const deckNode = new SceneNode("Deck");',
        "createdObjects.push(deckNode);",
        "const deck = deckNode.addBehavior(CardLayout);",
        "",
        'const frameNode = new SceneNode("Panel");',
        "createdObjects.push(frameNode);",
        "const frameNodeRect = frameNode.addRectTransform();",
        "frameNodeRect.anchorMin = new Vector2(0.5, 0.5);",
        "frameNodeRect.anchorMax = new Vector2(0.5, 0.5);",
        "frameNodeRect.sizeDelta = new Vector2(200, 100);",
        "deck._frame = frameNodeRect;",
        "",
      ].join("\n"),
    );
    expect(walker.imports.runtimeSymbols()).toEqual([
      { name: "SceneNode", typeOnly: false },
      { name: "Vector2", typeOnly: false },
    ]);
  });

  it("looks up anchored targets once per node", () => {
    const graph = createFakeGraph();
    const canvas = graph.node("Canvas", null, rect());
    const hud = graph.node("Hud", canvas);
    const score = graph.node("Score", hud);
    const scoreCard = graph.attach(score, CARD_TYPE);
    const board = graph.node("Board");
    graph.attach(board, CARD_TYPE, { _target: nodeRef(score), _partner: behaviorRef(scoreCard) });

    const { builder, walker } = walk(graph, { anchorBoundaries: [canvas] });
    walker.emitNode(board, "Board", true);
    expect(builder.toString()).toBe(
      [
        'const boardNode = new SceneNode("Board");',
        "createdObjects.push(boardNode);",
        "const board = boardNode.addBehavior(Card);",
        "",
        'const targetNode = anchors?.objects.get("Hud/Score");',
        "if (targetNode) board._target = targetNode;",
        "if (targetNode) board._partner = targetNode.getBehavior(Card);",
        "",
      ].join("\n"),
    );
  });

  it("looks up the boundary itself through the container root", () => {
    const graph = createFakeGraph();
    const canvas = graph.node("Canvas", null, rect());
    const deck = graph.node("Deck");
    graph.attach(deck, LAYOUT_TYPE, { _frame: frameRef(canvas) });

    const { builder, walker } = walk(graph, { anchorBoundaries: [canvas] });
    walker.emitNode(deck, "Deck", true);
    const source = builder.toString();
    expect(source).toContain("const frameNode = anchors?.root;\nif (frameNode) deck._frame = frameNode.rectTransform;\n");
    expect(source).not.toContain('new SceneNode("Canvas")');
  });

  it("attaches referenced unsupported behaviors and expands them on request", () => {
    const graph = createFakeGraph();
    const root = graph.node("Root");
    const memo = graph.node("Memo");
    const note = graph.attach(memo, NOTE_TYPE, { _body: text("hi") });
    graph.attach(root, CARD_TYPE, { _partner: behaviorRef(note) });
    const isSupported = (behavior: FakeBehavior) => behavior.type !== NOTE_TYPE;

    const plain = walk(graph, { isSupported });
    plain.walker.emitNode(root, "Root", true);
    expect(plain.builder.toString()).toContain(
      "const note = partnerNode.addBehavior(Note);\nroot._partner = note;\n",
    );

    const expanded = walk(graph, { isSupported, expandBehavior: (behavior) => behavior.type === NOTE_TYPE });
    expanded.walker.emitNode(root, "Root", true);
    expect(expanded.builder.toString()).toContain(
      'const note = partnerNode.addBehavior(Note);\nnote._body = "hi";\nroot._partner = note;\n',
    );
  });

  it("clears references whose default is set", () => {
    const graph = createFakeGraph();
    const fallback = graph.node("Fallback");
    const linkType: FakeType = { name: "Link", fields: [{ name: "_next", defaultValue: nodeRef(fallback) }] };
    const chain = graph.node("Chain");
    graph.attach(chain, linkType, { _next: emptyRef });

    const { builder, walker } = walk(graph);
    walker.emitNode(chain, "Chain", true);
    expect(builder.toString()).toContain("chain._next = null;\n");
  });

  it("warns and skips values it cannot express", () => {
    const graph = createFakeGraph();
    const root = graph.node("Root");
    graph.attach(root, CARD_TYPE, {
      _facing: { kind: "enum", enumName: "Facing", members: ["Up", "Down"], index: 7 },
      _target: { kind: "reference", target: { type: "unknown", description: "Material" } },
    });
    const seen: string[] = [];

    const { builder, walker } = walk(graph, { onWarning: (message) => seen.push(message) });
    walker.emitNode(root, "Root", true);
    expect(walker.warnings).toEqual([
      "Skipping Card._facing: value is not a member of its enum",
      "Skipping unsupported reference: _target -> Material",
    ]);
    expect(seen).toEqual(walker.warnings);
    expect(builder.toString()).not.toContain("_facing");
    expect(graph.liveTemplates()).toBe(0);
  });

  it("names referenced nodes after the field unless the field name has no usable characters", () => {
    const graph = createFakeGraph();
    const root = graph.node("Root");
    const first = graph.node("Slot");
    const second = graph.node("Tray");
    const linkType: FakeType = {
      name: "Link",
      fields: [
        { name: "item", defaultValue: emptyRef },
        { name: "??", defaultValue: emptyRef },
      ],
    };
    graph.attach(root, linkType, { item: nodeRef(first), "??": nodeRef(second) });

    const { builder, walker } = walk(graph);
    walker.emitNode(root, "Root", true);
    const source = builder.toString();
    expect(source).toContain('const itemNode = new SceneNode("Slot");\n');
    expect(source).toContain("root.item = itemNode;\n");
    expect(source).toContain('const trayNode = new SceneNode("Tray");\n');
    expect(source).toContain('root["??"] = trayNode;\n');
  });
});
