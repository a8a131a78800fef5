/**
 * Student Service
 *
 * Business operations over a StudentRepository:
 * - Reads (all, by address, by age range, name/address/age projection)
 * - Registration of new students
 * - Guarded email update (caller must know the current email)
 * - Address replacement
 *
 * Every write validates the candidate before it reaches the store.
 */

import {
  Student,
  StudentSummary,
  toStudentSummary,
} from "../domain/student";
import {
  NotFoundError,
  PreconditionFailedError,
  StudentViolation,
  ValidationError,
} from "../domain/errors";
import { parseAddress, parseEmail, parseStudentInput } from "../domain/studentValidation";
import { StudentRepository } from "../stores/studentStore";

export class StudentService {
  constructor(private readonly store: StudentRepository) {}

  private requireStudent(studentId: number): Student {
    const student = this.store.findById(studentId);
    if (!student) {
      throw new NotFoundError("Student not found");
    }
    return student;
  }

  getAllStudentDetails(): Student[] {
    return this.store.findAll();
  }

  getStudentById(studentId: number): Student {
    return this.requireStudent(studentId);
  }

  getStudentDetailsByAddress(address: unknown): Student[] {
    return this.store.findByAddress(parseAddress(address));
  }

  /**
   * Inclusive on both ends. A reversed range matches nobody.
   */
  getStudentsBetweenAge(startAge: number, endAge: number): Student[] {
    const violations: StudentViolation[] = [];
    if (!Number.isInteger(startAge)) {
      violations.push({ field: "startAge", message: "must be a whole number" });
    }
    if (!Number.isInteger(endAge)) {
      violations.push({ field: "endAge", message: "must be a whole number" });
    }
    if (violations.length > 0) {
      throw new ValidationError(violations);
    }
    return this.store.findByAgeBetween(startAge, endAge);
  }

  registerStudent(candidate: unknown): Student {
    return this.store.save(parseStudentInput(candidate));
  }

  /**
   * Replace a student's email, but only if oldEmail is still the stored one
   * (exact, case-sensitive). A stale oldEmail leaves the record untouched.
   */
  updateStudentEmail(studentId: number, oldEmail: string, newEmail: unknown): Student {
    const student = this.requireStudent(studentId);

    if (student.email !== oldEmail) {
      throw new PreconditionFailedError("Old email does not match");
    }

    const email = parseEmail(newEmail);
    return this.store.save({ ...student, email });
  }

  updateStudentAddress(studentId: number, address: unknown): Student {
    const student = this.requireStudent(studentId);
    return this.store.save({ ...student, address: parseAddress(address) });
  }

  getNameAddressAgeOfAllStudents(): StudentSummary[] {
    return this.store.findAll().map(toStudentSummary);
  }
}
