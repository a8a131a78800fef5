import { ConfigError, loadConfig } from "./config";
import { DEFAULT_DATA_DIR } from "./stores/studentStore";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      store: "file",
      dataDir: DEFAULT_DATA_DIR,
      corsOrigins: ["http://localhost:5173", "http://localhost:3000"],
    });
  });

  it("reads values from the environment", () => {
    const config = loadConfig({
      API_PORT: "8080",
      STUDENT_STORE: "memory",
      STUDENT_DATA_DIR: "/tmp/students",
      CORS_ORIGINS: "https://a.example.com, https://b.example.com,",
    });

    expect(config).toEqual({
      port: 8080,
      store: "memory",
      dataDir: "/tmp/students",
      corsOrigins: ["https://a.example.com", "https://b.example.com"],
    });
  });

  it("treats blank variables as unset", () => {
    const config = loadConfig({ API_PORT: "", STUDENT_STORE: "  ", STUDENT_DATA_DIR: "" });

    expect(config.port).toBe(3001);
    expect(config.store).toBe("file");
    expect(config.dataDir).toBe(DEFAULT_DATA_DIR);
  });

  it("throws a ConfigError for an unknown store", () => {
    expect(() => loadConfig({ STUDENT_STORE: "postgres" })).toThrow(ConfigError);
  });

  it("throws a ConfigError for a non-numeric port", () => {
    expect(() => loadConfig({ API_PORT: "abc" })).toThrow(/^Invalid configuration: port:/);
  });
});
