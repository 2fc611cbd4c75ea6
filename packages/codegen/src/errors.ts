export type GeneratorErrorCode =
  | "SC_ERR_INVALID_OUTPUT_NAME"
  | "SC_ERR_INVALID_TYPE_NAME"
  | "SC_ERR_NESTED_ANCHORS"
  | "SC_ERR_NO_ROOTS"
  | "SC_ERR_UNVISITED_NODE";

/** A caller mistake the generator cannot emit valid code for. */
export class GeneratorError extends Error {
  readonly code: GeneratorErrorCode;

  constructor(code: GeneratorErrorCode, message: string) {
    super(message);
    this.name = "GeneratorError";
    this.code = code;
  }

  /** `code: message`, the line the CLI prints. */
  format(): string {
    return `${this.code}: ${this.message}`;
  }
}

export function isGeneratorError(error: unknown): error is GeneratorError {
  return error instanceof GeneratorError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
