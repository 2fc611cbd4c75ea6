export type SceneErrorCode =
  // scene graph
  | "SC_ERR_ALREADY_ATTACHED"
  | "SC_ERR_DESTROYED_NODE"
  | "SC_ERR_DETACHED_BEHAVIOR"
  | "SC_ERR_NOT_RECT"
  | "SC_ERR_PARENT_CYCLE"
  | "SC_ERR_UNKNOWN_ANCHOR"
  // behavior types and fields
  | "SC_ERR_FIELD_TYPE"
  | "SC_ERR_RESERVED_FIELD"
  | "SC_ERR_UNKNOWN_FIELD"
  // scene documents
  | "SC_ERR_DUPLICATE_NODE"
  | "SC_ERR_DUPLICATE_TYPE"
  | "SC_ERR_INVALID_DOCUMENT"
  | "SC_ERR_INVALID_JSON"
  | "SC_ERR_INVALID_TYPE_NAME"
  | "SC_ERR_UNKNOWN_BEHAVIOR"
  | "SC_ERR_UNKNOWN_BEHAVIOR_TYPE"
  | "SC_ERR_UNKNOWN_ENUM"
  | "SC_ERR_UNKNOWN_NODE"
  | "SC_ERR_UNEXPECTED";

export class SceneError extends Error {
  readonly code: SceneErrorCode;

  constructor(code: SceneErrorCode, message: string) {
    super(message);
    this.name = "SceneError";
    this.code = code;
  }

  format(): string {
    return `${this.code}: ${this.message}`;
  }
}

export function isSceneError(error: unknown): error is SceneError {
  return error instanceof SceneError;
}

/** Wraps anything thrown while loading or walking a scene as `SC_ERR_UNEXPECTED`. */
export function asSceneError(error: unknown, fallbackMessage: string): SceneError {
  if (isSceneError(error)) return error;
  return new SceneError("SC_ERR_UNEXPECTED", error instanceof Error ? error.message : fallbackMessage);
}
