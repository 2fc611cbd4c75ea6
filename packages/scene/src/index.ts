export { Color, Vector2, Vector3 } from "./math.js";
export { RectTransform, Transform } from "./transform.js";
export { Behavior, FIELD_PATH_SEPARATOR, RESERVED_FIELD_NAMES, defineBehaviorType } from "./behavior.js";
export type {
  AssetField,
  BehaviorType,
  EnumField,
  FieldDeclaration,
  GroupField,
  ReferenceField,
} from "./behavior.js";
export { AnchorContainer, SceneNode } from "./sceneNode.js";
export { PATH_SEPARATOR, Scene } from "./scene.js";
export { TEMPLATE_NODE_NAME, createSceneHost } from "./host.js";
export { SCENE_DOCUMENT_VERSION, SceneDocumentSchema, buildScene, loadSceneDocument } from "./document.js";
export type { FieldDeclarationDocument, LoadedScene, SceneDocument } from "./document.js";
export { SceneError, asSceneError, isSceneError } from "./errors.js";
