import { Vector2, Vector3 } from "./math.js";
import type { SceneNode } from "./sceneNode.js";

/** Local placement of a node relative to its parent. Rotation is Euler angles in degrees. */
export class Transform {
  localPosition = Vector3.zero;
  localEulerAngles = Vector3.zero;
  localScale = Vector3.one;

  constructor(readonly node: SceneNode) {}
}

/** Transform of a node laid out inside a rectangular parent. */
export class RectTransform extends Transform {
  anchorMin = Vector2.zero;
  anchorMax = Vector2.one;
  pivot = new Vector2(0.5, 0.5);
  anchoredPosition = Vector2.zero;
  sizeDelta = Vector2.zero;

  static replacing(transform: Transform): RectTransform {
    const rect = new RectTransform(transform.node);
    rect.localPosition = transform.localPosition;
    rect.localEulerAngles = transform.localEulerAngles;
    rect.localScale = transform.localScale;
    return rect;
  }
}
