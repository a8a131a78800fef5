/**
 * Student Validation
 *
 * Field rules for students and addresses, expressed as zod schemas.
 * Everything here is pure: candidates go in, violations (or a typed value)
 * come out. Email uniqueness needs the store and is enforced there.
 */

import { z } from "zod";
import { Address, GENDERS, StudentInput } from "./student";
import { StudentViolation, ValidationError } from "./errors";

export const MIN_AGE = 13;
export const MOBILE_PATTERN = /^[6-9]\d{9}$/;
export const PINCODE_PATTERN = /^\d{6}$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function isCalendarDate(value: string): boolean {
  if (!DATE_PATTERN.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

export const addressSchema = z.object({
  pincode: z.string().regex(PINCODE_PATTERN, "must be exactly 6 digits"),
  state: z.string(),
  city: z.string(),
});

export const emailSchema = z.string().email("must be a valid email address");

export const studentInputSchema = z.object({
  studentName: z
    .string()
    .min(3, "must be between 3 and 10 characters")
    .max(10, "must be between 3 and 10 characters")
    .refine((name) => name.trim().length > 0, "must not be blank"),
  address: addressSchema,
  age: z.number().int("must be a whole number").min(MIN_AGE, `must be at least ${MIN_AGE}`),
  email: emailSchema,
  mobile: z.string().regex(MOBILE_PATTERN, "must be 10 digits starting with 6-9"),
  gender: z.enum(GENDERS, {
    errorMap: () => ({ message: `must be one of ${GENDERS.join(", ")}` }),
  }),
  dob: z.string().refine(isCalendarDate, "must be a date in YYYY-MM-DD format"),
});

/**
 * Nested paths report their leaf: address.pincode is reported as "pincode".
 */
function fieldOf(path: (string | number)[], fallback: string): string {
  for (let i = path.length - 1; i >= 0; i--) {
    const segment = path[i];
    if (typeof segment === "string") {
      return segment;
    }
  }
  return fallback;
}

function toViolations(error: z.ZodError, fallback: string): StudentViolation[] {
  return error.issues.map((issue) => ({
    field: fieldOf(issue.path, fallback),
    message: issue.message,
  }));
}

function parseWith<T>(schema: z.ZodType<T>, candidate: unknown, fallback: string): T {
  const result = schema.safeParse(candidate);
  if (!result.success) {
    throw new ValidationError(toViolations(result.error, fallback));
  }
  return result.data;
}

/**
 * All violations for a candidate student, empty when valid
 */
export function collectStudentViolations(candidate: unknown): StudentViolation[] {
  const result = studentInputSchema.safeParse(candidate);
  return result.success ? [] : toViolations(result.error, "student");
}

export function parseStudentInput(candidate: unknown): StudentInput {
  return parseWith(studentInputSchema, candidate, "student");
}

export function parseAddress(candidate: unknown): Address {
  return parseWith(addressSchema, candidate, "address");
}

export function parseEmail(candidate: unknown): string {
  return parseWith(emailSchema, candidate, "email");
}
