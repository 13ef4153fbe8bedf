export type CombustionErrorKind =
  | "UnknownSpecies"
  | "InvalidFlow"
  | "InvalidComposition"
  | "UnreachableTarget"
  | "DegenerateComposition";

export class CombustionError extends Error {
  readonly kind: CombustionErrorKind;
  readonly details: Record<string, unknown>;

  constructor(kind: CombustionErrorKind, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "CombustionError";
    this.kind = kind;
    this.details = details;
  }
}

export function isCombustionError(error: unknown): error is CombustionError {
  return error instanceof CombustionError;
}
