/**
 * Server configuration, read from the environment (after dotenv has run).
 *
 *   API_PORT          port to listen on (default 3001)
 *   STUDENT_STORE     "file" or "memory" (default "file")
 *   STUDENT_DATA_DIR  directory for student JSON files (default data/students)
 *   CORS_ORIGINS      comma-separated allowed origins
 */

import { z } from "zod";
import { DEFAULT_DATA_DIR } from "./stores/studentStore";

const DEFAULT_CORS_ORIGINS = ["http://localhost:5173", "http://localhost:3000"];

const configSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535),
  store: z.enum(["file", "memory"]),
  dataDir: z.string().min(1),
  corsOrigins: z.array(z.string().url()),
});

export type AppConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// Blank variables (e.g. `API_PORT=` in .env) count as unset
function present(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

function splitList(value: string | undefined): string[] | undefined {
  const list = present(value);
  if (list === undefined) {
    return undefined;
  }
  return list
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = configSchema.safeParse({
    port: present(env.API_PORT) ?? 3001,
    store: present(env.STUDENT_STORE) ?? "file",
    dataDir: present(env.STUDENT_DATA_DIR) ?? DEFAULT_DATA_DIR,
    corsOrigins: splitList(env.CORS_ORIGINS) ?? DEFAULT_CORS_ORIGINS,
  });

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  return result.data;
}
