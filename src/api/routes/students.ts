/**
 * Students API Routes
 *
 * Read, filter and update student records. Business rules live in
 * StudentService; this layer only parses request input and maps errors.
 */

import { Router } from "express";
import { StudentService } from "../../services/studentService";
import { ValidationError } from "../../domain/errors";
import { sendError } from "../errors";

function parseInteger(raw: unknown, field: string): number {
  const value = typeof raw === "string" && /^-?\d+$/.test(raw.trim()) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(value)) {
    throw new ValidationError([{ field, message: "must be a whole number" }]);
  }
  return value;
}

function parseStudentId(raw: unknown): number {
  const studentId = parseInteger(raw, "studentId");
  if (studentId < 1) {
    throw new ValidationError([{ field: "studentId", message: "must be a positive number" }]);
  }
  return studentId;
}

function requireQueryString(raw: unknown, field: string): string {
  if (typeof raw !== "string") {
    throw new ValidationError([{ field, message: "is required" }]);
  }
  return raw;
}

function isEmptyBody(body: unknown): boolean {
  return (
    body === undefined ||
    body === null ||
    (typeof body === "object" && Object.keys(body).length === 0)
  );
}

export function createStudentsRouter(studentService: StudentService): Router {
  const router = Router();

  // GET /students - List all students
  router.get("/", (req, res) => {
    try {
      res.json(studentService.getAllStudentDetails());
    } catch (error) {
      sendError(res, error, "Failed to fetch students");
    }
  });

  /**
   * GET /students/by-address
   * Students whose pincode, state and city all match.
   * Address comes in the JSON body; query params are used when the body is empty.
   */
  router.get("/by-address", (req, res) => {
    try {
      const body: unknown = req.body;
      const address = isEmptyBody(body) ? req.query : body;
      res.json(studentService.getStudentDetailsByAddress(address));
    } catch (error) {
      sendError(res, error, "Failed to fetch students by address");
    }
  });

  /**
   * GET /students/between-age?startAge=18&endAge=25
   * Inclusive on both ends
   */
  router.get("/between-age", (req, res) => {
    try {
      const startAge = parseInteger(req.query.startAge, "startAge");
      const endAge = parseInteger(req.query.endAge, "endAge");
      res.json(studentService.getStudentsBetweenAge(startAge, endAge));
    } catch (error) {
      sendError(res, error, "Failed to fetch students by age");
    }
  });

  // GET /students/name-address-age - Summary view of every student
  router.get("/name-address-age", (req, res) => {
    try {
      res.json(studentService.getNameAddressAgeOfAllStudents());
    } catch (error) {
      sendError(res, error, "Failed to fetch student summaries");
    }
  });

  // POST /students - Register a new student
  router.post("/", (req, res) => {
    try {
      const body: unknown = req.body;
      const student = studentService.registerStudent(body);
      res.status(201).json(student);
    } catch (error) {
      sendError(res, error, "Failed to create student");
    }
  });

  // GET /students/:id - Get student by ID
  router.get("/:id", (req, res) => {
    try {
      res.json(studentService.getStudentById(parseStudentId(req.params.id)));
    } catch (error) {
      sendError(res, error, "Failed to fetch student");
    }
  });

  /**
   * PUT /students/:id/email?oldEmail=...&newEmail=...
   * Rejected unless oldEmail is the student's current email
   */
  router.put("/:id/email", (req, res) => {
    try {
      const studentId = parseStudentId(req.params.id);
      const oldEmail = requireQueryString(req.query.oldEmail, "oldEmail");
      const newEmail = requireQueryString(req.query.newEmail, "newEmail");
      res.json(studentService.updateStudentEmail(studentId, oldEmail, newEmail));
    } catch (error) {
      sendError(res, error, "Failed to update email");
    }
  });

  // PUT /students/:id/address - Replace a student's address
  router.put("/:id/address", (req, res) => {
    try {
      const studentId = parseStudentId(req.params.id);
      const body: unknown = req.body;
      res.json(studentService.updateStudentAddress(studentId, body));
    } catch (error) {
      sendError(res, error, "Failed to update address");
    }
  });

  return router;
}
