export const SAMPLE_DOCUMENT = {
  version: 1,
  enums: { Facing: ["Up", "Down"] },
  behaviorTypes: [
    {
      name: "Card",
      fields: [
        { kind: "integer", name: "_cost" },
        { kind: "float", name: "_speed", default: 1 },
        { kind: "string", name: "_title" },
        { kind: "enum", name: "_facing", enum: "Facing" },
        { kind: "reference", name: "_target" },
        { kind: "reference", name: "_partner" },
      ],
    },
    {
      name: "CardLayout",
      fields: [
        { kind: "float", name: "_spacing", default: 0.5 },
        { kind: "reference", name: "_anchor" },
        { kind: "reference", name: "_frame" },
        { kind: "group", name: "_padding", fields: [{ kind: "float", name: "left" }] },
      ],
    },
  ],
  nodes: [
    { id: "canvas", name: "Canvas", frame: { kind: "rect" } },
    {
      id: "hud",
      name: "Hud",
      parent: "canvas",
      frame: { kind: "rect", anchorMin: [0, 1], anchorMax: [1, 1], sizeDelta: [0, 80] },
    },
    { id: "score", name: "Score", parent: "hud", behaviors: [{ type: "Card" }] },
    {
      id: "hand",
      name: "Hand",
      frame: { kind: "spatial", position: [0, -2.5, 0] },
      behaviors: [
        {
          type: "CardLayout",
          fields: { _spacing: 0.75, _anchor: { node: "slot" }, _frame: { frame: "hud" }, _padding: { left: 4 } },
        },
      ],
    },
    {
      id: "slot",
      name: "Slot",
      parent: "hand",
      behaviors: [
        {
          type: "Card",
          fields: {
            _cost: 2,
            _facing: "Down",
            _target: { node: "score" },
            _partner: { node: "hand", behavior: "CardLayout" },
          },
        },
      ],
    },
  ],
};

