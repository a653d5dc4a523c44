export type ControllerErrorCode = "invalid_state" | "model_load_failed" | "invalid_input";

export abstract class ControllerError extends Error {
  abstract readonly code: ControllerErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** An illegal lifecycle transition was requested. */
export class InvalidStateError extends ControllerError {
  readonly code = "invalid_state";
}

export type ModelLoadFailure = "not_found" | "invalid_artifact";

export class ModelLoadError extends ControllerError {
  readonly code = "model_load_failed";

  constructor(
    readonly path: string,
    readonly reason: ModelLoadFailure,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/** A prediction request carried a malformed feature vector. */
export class InvalidInputError extends ControllerError {
  readonly code = "invalid_input";
}

export function isControllerError(error: unknown): error is ControllerError {
  return error instanceof ControllerError;
}
