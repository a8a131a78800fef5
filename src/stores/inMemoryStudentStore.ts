/**
 * In-memory StudentRepository, used by tests and STUDENT_STORE=memory.
 * Same ordering, id assignment and email rules as StudentStore.
 */

import { Address, Student, StudentDraft, copyStudent, sameAddress } from "../domain/student";
import {
  StudentRepository,
  assertEmailAvailable,
  byStudentId,
  resolveStudentId,
} from "./studentStore";

export class InMemoryStudentStore implements StudentRepository {
  private readonly students = new Map<number, Student>();

  constructor(initial: Student[] = []) {
    for (const student of initial) {
      this.students.set(student.studentId, copyStudent(student));
    }
  }

  save(draft: StudentDraft): Student {
    const existing = Array.from(this.students.values());
    assertEmailAvailable(existing, draft);

    const student = copyStudent({ ...draft, studentId: resolveStudentId(existing, draft) });
    this.students.set(student.studentId, student);
    return copyStudent(student);
  }

  findById(studentId: number): Student | null {
    const student = this.students.get(studentId);
    return student ? copyStudent(student) : null;
  }

  findAll(): Student[] {
    return Array.from(this.students.values()).map(copyStudent).sort(byStudentId);
  }

  findByAddress(address: Address): Student[] {
    return this.findAll().filter((s) => sameAddress(s.address, address));
  }

  findByAgeBetween(startAge: number, endAge: number): Student[] {
    return this.findAll().filter((s) => s.age >= startAge && s.age <= endAge);
  }
}
