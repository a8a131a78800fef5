/**
 * Student Store
 *
 * Persists students as JSON files, one per record, in data/students/
 * (or the directory given to the constructor).
 *
 * Every operation is synchronous, so two requests can never interleave
 * inside a save: the email check and the write happen back to back.
 */

import fs from "fs";
import path from "path";
import {
  Address,
  Student,
  StudentDraft,
  copyStudent,
  sameAddress,
} from "../domain/student";
import { ConstraintViolationError, NotFoundError } from "../domain/errors";

export const DEFAULT_DATA_DIR = path.join(__dirname, "../../data/students");

const FILE_PREFIX = "student-";

/**
 * Storage operations the service depends on
 */
export interface StudentRepository {
  findById(studentId: number): Student | null;
  findAll(): Student[];
  findByAddress(address: Address): Student[];
  findByAgeBetween(startAge: number, endAge: number): Student[];
  save(student: StudentDraft): Student;
}

export function byStudentId(a: Student, b: Student): number {
  return a.studentId - b.studentId;
}

export function nextStudentId(students: Student[]): number {
  return students.reduce((max, s) => Math.max(max, s.studentId), 0) + 1;
}

/**
 * Id the draft will be stored under: a fresh one for inserts, its own for
 * updates. Updating an id with no record throws NotFoundError.
 */
export function resolveStudentId(students: Student[], draft: StudentDraft): number {
  if (draft.studentId === undefined) {
    return nextStudentId(students);
  }
  const { studentId } = draft;
  if (!students.some((s) => s.studentId === studentId)) {
    throw new NotFoundError("Student not found");
  }
  return studentId;
}

/**
 * Throws if any other student already uses the draft's email
 */
export function assertEmailAvailable(students: Student[], draft: StudentDraft): void {
  const holder = students.find(
    (s) => s.email === draft.email && s.studentId !== draft.studentId
  );
  if (holder) {
    throw new ConstraintViolationError("email", `Email already in use: ${draft.email}`);
  }
}

export class StudentStore implements StudentRepository {
  private readonly dataDir: string;

  constructor(dataDir: string = DEFAULT_DATA_DIR) {
    this.dataDir = dataDir;
    if (!fs.existsSync(this.dataDir)) {
      fs.mkdirSync(this.dataDir, { recursive: true });
    }
  }

  private getFilePath(studentId: number): string {
    return path.join(this.dataDir, `${FILE_PREFIX}${studentId}.json`);
  }

  private write(student: Student): void {
    fs.writeFileSync(this.getFilePath(student.studentId), JSON.stringify(student, null, 2), "utf-8");
  }

  /**
   * Insert when the draft has no id, otherwise replace the stored record
   */
  save(draft: StudentDraft): Student {
    const students = this.findAll();
    assertEmailAvailable(students, draft);

    const student = copyStudent({ ...draft, studentId: resolveStudentId(students, draft) });
    this.write(student);
    return copyStudent(student);
  }

  /**
   * Load a student by ID
   */
  findById(studentId: number): Student | null {
    const filePath = this.getFilePath(studentId);
    if (!fs.existsSync(filePath)) {
      return null;
    }
    const data = fs.readFileSync(filePath, "utf-8");
    return JSON.parse(data) as Student;
  }

  /**
   * Get all students, ordered by id
   */
  findAll(): Student[] {
    if (!fs.existsSync(this.dataDir)) {
      return [];
    }

    const files = fs
      .readdirSync(this.dataDir)
      .filter((f) => f.startsWith(FILE_PREFIX) && f.endsWith(".json"));
    const students: Student[] = [];

    for (const file of files) {
      try {
        const data = fs.readFileSync(path.join(this.dataDir, file), "utf-8");
        students.push(JSON.parse(data) as Student);
      } catch (error) {
        console.warn(`Skipping unreadable student file ${file}:`, error);
      }
    }

    return students.sort(byStudentId);
  }

  findByAddress(address: Address): Student[] {
    return this.findAll().filter((s) => sameAddress(s.address, address));
  }

  /**
   * Students with startAge <= age <= endAge
   */
  findByAgeBetween(startAge: number, endAge: number): Student[] {
    return this.findAll().filter((s) => s.age >= startAge && s.age <= endAge);
  }
}
