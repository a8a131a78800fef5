/**
 * Student Domain Model
 *
 * A student record owns exactly one embedded Address. Addresses have no
 * identity of their own and are always copied, never shared between students.
 *
 * studentId is assigned by the store when the record is first saved.
 */

export const GENDERS = ["MALE", "FEMALE"] as const;

export type Gender = (typeof GENDERS)[number];

export interface Address {
  pincode: string; // exactly 6 digits
  state: string;
  city: string;
}

export interface Student {
  studentId: number;
  studentName: string;
  address: Address;
  age: number;
  email: string;
  mobile: string; // 10 digits, starts with 6-9
  gender: Gender;
  dob: string; // YYYY-MM-DD
}

/**
 * Input type for registering a new student (id comes from the store)
 */
export type StudentInput = Omit<Student, "studentId">;

/**
 * Shape accepted by StudentRepository.save: new records carry no id yet
 */
export type StudentDraft = StudentInput & { studentId?: number };

/**
 * Name / address / age view of a student
 */
export interface StudentSummary {
  studentName: string;
  address: Address;
  age: number;
}

export function copyAddress(address: Address): Address {
  return { pincode: address.pincode, state: address.state, city: address.city };
}

export function sameAddress(a: Address, b: Address): boolean {
  return a.pincode === b.pincode && a.state === b.state && a.city === b.city;
}

export function copyStudent(student: Student): Student {
  return { ...student, address: copyAddress(student.address) };
}

export function toStudentSummary(student: Student): StudentSummary {
  return {
    studentName: student.studentName,
    address: copyAddress(student.address),
    age: student.age,
  };
}
