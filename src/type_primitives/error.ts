/***
 * Type errors — Dev-only assertion and validation failures.
 *
 * Kept apart from EntityError: these signal a caller breaking a
 * type-level contract the compiler cannot see (a u32 argument that is
 * negative or fractional), not a recoverable decode failure.
 *
 ***/

import { AppError } from "utils/error";

export enum TYPE_ERROR {
  ASSERTION_FAIL_CONDITION = "ASSERTION_FAIL_CONDITION",
  VALIDATION_FAIL_CONDITION = "VALIDATION_FAIL_CONDITION",
}

export class TypeError extends AppError {
  constructor(
    public readonly category: TYPE_ERROR,
    message: string,
    context?: Record<string, unknown>,
  ) {
    super(message, false, context);
  }
}
