/**
 * Student Errors
 *
 * Every failure a student operation can report. The HTTP layer maps each
 * kind to a status code in one place (see api/errors.ts).
 */

export type StudentErrorKind =
  | "validation"
  | "not_found"
  | "precondition_failed"
  | "constraint_violation";

export interface StudentViolation {
  field: string;
  message: string;
}

export abstract class StudentError extends Error {
  abstract readonly kind: StudentErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * One or more fields failed their constraints. `field` is the first offender.
 */
export class ValidationError extends StudentError {
  readonly kind = "validation";
  readonly field: string;
  readonly violations: StudentViolation[];

  constructor(violations: StudentViolation[]) {
    super(violations.map((v) => `${v.field}: ${v.message}`).join("; "));
    this.violations = violations;
    this.field = violations.length > 0 ? violations[0].field : "unknown";
  }
}

export class NotFoundError extends StudentError {
  readonly kind = "not_found";
}

/**
 * Caller's view of the record is stale (e.g. old email no longer matches)
 */
export class PreconditionFailedError extends StudentError {
  readonly kind = "precondition_failed";
}

/**
 * Write would break a storage-level uniqueness rule
 */
export class ConstraintViolationError extends StudentError {
  readonly kind = "constraint_violation";
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.field = field;
  }
}

export function isStudentError(error: unknown): error is StudentError {
  return error instanceof StudentError;
}
