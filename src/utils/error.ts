export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum SPARSE_ARRAY_ERROR {
  OUT_OF_RANGE = "OUT_OF_RANGE",
  UNDERFLOW = "UNDERFLOW",
  DELETION_UNDERFLOW = "DELETION_UNDERFLOW",
  INDEX_OVERFLOW = "INDEX_OVERFLOW",
}

export class SparseArrayError extends AppError {
  constructor(
    public readonly category: SPARSE_ARRAY_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_sparse_array_error(error: unknown): error is SparseArrayError {
  return error instanceof SparseArrayError;
}
