/**
 * Seed script to populate sample students from data/seed/students.json
 *
 * Run with: npm run seed
 * Students whose email already exists are skipped, so it is safe to re-run.
 */

import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { loadConfig } from "../config";
import { StudentStore } from "../stores/studentStore";
import { StudentService } from "../services/studentService";
import { ConstraintViolationError, ValidationError } from "../domain/errors";

const SEED_FILE = path.join(__dirname, "../../data/seed/students.json");

export interface SeedSummary {
  created: number;
  skipped: number;
  rejected: number;
}

export function seedStudents(service: StudentService, candidates: unknown[]): SeedSummary {
  const summary: SeedSummary = { created: 0, skipped: 0, rejected: 0 };

  for (const candidate of candidates) {
    try {
      const student = service.registerStudent(candidate);
      console.log(`  Created student #${student.studentId} ${student.studentName}`);
      summary.created++;
    } catch (error) {
      if (error instanceof ConstraintViolationError) {
        console.log(`  ${error.message}, skipping`);
        summary.skipped++;
      } else if (error instanceof ValidationError) {
        console.log(`  Invalid seed entry (${error.message}), skipping`);
        summary.rejected++;
      } else {
        throw error;
      }
    }
  }

  return summary;
}

function main(): void {
  dotenv.config();
  const config = loadConfig();
  const service = new StudentService(new StudentStore(config.dataDir));

  const raw: unknown = JSON.parse(fs.readFileSync(SEED_FILE, "utf-8"));
  if (!Array.isArray(raw)) {
    throw new Error(`${SEED_FILE} must contain a JSON array`);
  }

  console.log(`Seeding students into ${config.dataDir}`);
  const summary = seedStudents(service, raw);
  console.log(
    `Done: ${summary.created} created, ${summary.skipped} skipped, ${summary.rejected} rejected`
  );
}

if (require.main === module) {
  main();
}
