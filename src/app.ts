// src/app.ts
import express from "express";
import cors from "cors";
import helmet from "helmet";
import type { AppContext } from "./lib/appContext";
import { errorHandler } from "./middleware/errorHandler";

// Routes
import studentsRouter from "./routes/students";
import coursesRouter from "./routes/courses";
import instructorsRouter from "./routes/instructors";
import enrollmentsRouter from "./routes/enrollments";
import reportsRouter from "./routes/reports";
import maintenanceRouter from "./routes/maintenance";

export function createApp(context: AppContext) {
  const app = express();

  // Security & Performance Middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: true, limit: "1mb" }));

  // Health check
  app.get("/health", (req, res) => {
    res.status(200).json({
      status: "OK",
      app: context.config.appName,
      students: context.store.students.size,
      courses: context.store.courses.size,
      uptime: process.uptime(),
    });
  });

  // API Routes
  app.use("/students", studentsRouter(context));
  app.use("/courses", coursesRouter(context));
  app.use("/instructors", instructorsRouter(context));
  app.use("/enrollments", enrollmentsRouter(context));
  app.use("/reports", reportsRouter(context));
  app.use("/maintenance", maintenanceRouter(context));

  app.use((req, res) => {
    res.status(404).json({
      success: false,
      message: `Route ${req.originalUrl} not found`,
      method: req.method,
    });
  });

  // Global error handler
  app.use(errorHandler);

  return app;
}
