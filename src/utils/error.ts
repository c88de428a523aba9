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

export enum ENTITY_ERROR {
  RESERVED_INDEX = "RESERVED_INDEX",
  INT_OUT_OF_RANGE = "INT_OUT_OF_RANGE",
}

export class EntityError extends AppError {
  constructor(
    public readonly category: ENTITY_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_entity_error(error: unknown): error is EntityError {
  return error instanceof EntityError;
}
