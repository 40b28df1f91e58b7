export type EngineErrorKind =
  | "InvalidRoster"
  | "InfeasiblePairing"
  | "InvalidTransition"
  | "Conflict"
  | "Disputed"
  | "NotFound"
  | "Unauthorized"
  | "InvalidInput";

export class EngineError extends Error {
  constructor(
    public readonly kind: EngineErrorKind,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = "EngineError";
  }
}

export interface EngineFailure {
  kind: EngineErrorKind;
  message: string;
  details?: unknown;
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function notFound(entity: string, id: string): EngineError {
  return new EngineError("NotFound", `${entity} '${id}' not found`);
}

export function invalidTransition(message: string): EngineError {
  return new EngineError("InvalidTransition", message);
}

export function unauthorized(message: string): EngineError {
  return new EngineError("Unauthorized", message);
}

export function conflict(message: string): EngineError {
  return new EngineError("Conflict", message);
}
