import dotenv from "dotenv";
import { loadConfig } from "../config";
import { StudentService } from "../services/studentService";
import { createApp, createStore } from "./app";

dotenv.config();

const config = loadConfig();
const studentService = new StudentService(createStore(config));
const app = createApp(studentService, config.corsOrigins);

// Start server
app.listen(config.port, () => {
  console.log(`Student records API running on http://localhost:${config.port} (${config.store} store)`);
});

export default app;
