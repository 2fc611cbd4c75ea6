import { approximatelyEqual2, approximatelyEqual3 } from "./equality.js";
import type { Frame, RectFrame, SpatialFrame, Vec2, Vec3 } from "./host.js";
import type { ImportTracker } from "./imports.js";
import { formatVector2, formatVector3, type FloatPrecision } from "./literals.js";
import type { NameAllocator } from "./names.js";
import type { SourceBuilder } from "./sourceBuilder.js";

const ZERO2: Vec2 = { x: 0, y: 0 };
const ONE2: Vec2 = { x: 1, y: 1 };
const ZERO3: Vec3 = { x: 0, y: 0, z: 0 };
const ONE3: Vec3 = { x: 1, y: 1, z: 1 };

export const DEFAULT_SPATIAL_FRAME: SpatialFrame = {
  kind: "spatial",
  position: ZERO3,
  rotation: ZERO3,
  scale: ONE3,
};

export const DEFAULT_RECT_FRAME: RectFrame = {
  kind: "rect",
  anchorMin: ZERO2,
  anchorMax: ONE2,
  pivot: { x: 0.5, y: 0.5 },
  anchoredPosition: ZERO2,
  sizeDelta: ZERO2,
  rotation: ZERO3,
  scale: ONE3,
};

export interface FrameContext {
  builder: SourceBuilder;
  imports: ImportTracker;
  names: NameAllocator;
  floatPrecision: FloatPrecision;
}

function emitSpatialFrame(context: FrameContext, frame: SpatialFrame, nodeVar: string) {
  const { builder, imports, floatPrecision } = context;
  const target = `${nodeVar}.transform`;
  if (!approximatelyEqual3(frame.position, DEFAULT_SPATIAL_FRAME.position)) {
    builder.statement(`${target}.localPosition = ${formatVector3(frame.position, imports, floatPrecision)};`);
  }
  if (!approximatelyEqual3(frame.rotation, DEFAULT_SPATIAL_FRAME.rotation)) {
    builder.statement(`${target}.localEulerAngles = ${formatVector3(frame.rotation, imports, floatPrecision)};`);
  }
  if (!approximatelyEqual3(frame.scale, DEFAULT_SPATIAL_FRAME.scale)) {
    builder.statement(`${target}.localScale = ${formatVector3(frame.scale, imports, floatPrecision)};`);
  }
}

function emitRectFrame(context: FrameContext, frame: RectFrame, nodeVar: string): string {
  const { builder, imports, names, floatPrecision } = context;
  const rectVar = names.allocate(`${nodeVar}Rect`);
  builder.statement(`const ${rectVar} = ${nodeVar}.addRectTransform();`);

  const defaults = DEFAULT_RECT_FRAME;
  if (
    !approximatelyEqual2(frame.anchorMin, defaults.anchorMin) ||
    !approximatelyEqual2(frame.anchorMax, defaults.anchorMax)
  ) {
    builder.statement(`${rectVar}.anchorMin = ${formatVector2(frame.anchorMin, imports, floatPrecision)};`);
    builder.statement(`${rectVar}.anchorMax = ${formatVector2(frame.anchorMax, imports, floatPrecision)};`);
  }
  if (!approximatelyEqual2(frame.pivot, defaults.pivot)) {
    builder.statement(`${rectVar}.pivot = ${formatVector2(frame.pivot, imports, floatPrecision)};`);
  }
  if (!approximatelyEqual2(frame.anchoredPosition, defaults.anchoredPosition)) {
    builder.statement(`${rectVar}.anchoredPosition = ${formatVector2(frame.anchoredPosition, imports, floatPrecision)};`);
  }
  if (!approximatelyEqual2(frame.sizeDelta, defaults.sizeDelta)) {
    builder.statement(`${rectVar}.sizeDelta = ${formatVector2(frame.sizeDelta, imports, floatPrecision)};`);
  }
  if (!approximatelyEqual3(frame.rotation, defaults.rotation)) {
    builder.statement(`${rectVar}.localEulerAngles = ${formatVector3(frame.rotation, imports, floatPrecision)};`);
  }
  if (!approximatelyEqual3(frame.scale, defaults.scale)) {
    builder.statement(`${rectVar}.localScale = ${formatVector3(frame.scale, imports, floatPrecision)};`);
  }
  return rectVar;
}

/**
 * Emits the statements that move a freshly built node's frame away from the
 * implicit default. Returns the rect variable for rect frames.
 */
export function emitFrame(context: FrameContext, frame: Frame, nodeVar: string): string | null {
  if (frame.kind === "rect") {
    return emitRectFrame(context, frame, nodeVar);
  }
  emitSpatialFrame(context, frame, nodeVar);
  return null;
}
