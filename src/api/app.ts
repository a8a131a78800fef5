import express from "express";
import cors from "cors";
import { createStudentsRouter } from "./routes/students";
import { handleRequestError } from "./errors";
import { StudentService } from "../services/studentService";
import { StudentRepository, StudentStore } from "../stores/studentStore";
import { InMemoryStudentStore } from "../stores/inMemoryStudentStore";
import { AppConfig } from "../config";

export function createStore(config: AppConfig): StudentRepository {
  return config.store === "memory" ? new InMemoryStudentStore() : new StudentStore(config.dataDir);
}

export function createApp(studentService: StudentService, corsOrigins: string[]): express.Express {
  const app = express();

  // Middleware
  app.use(cors({
    origin: corsOrigins,
    credentials: true,
  }));
  app.use(express.json());

  // Routes
  app.use("/students", createStudentsRouter(studentService));

  // Health check
  app.get("/health", (req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.use(handleRequestError);

  return app;
}
