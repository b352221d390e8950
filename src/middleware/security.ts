// src/middleware/security.ts
import rateLimit from "express-rate-limit";

// Load, save, backup and import all touch the disk.
export const createMaintenanceRateLimiter = () =>
  rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: 60,
    message: {
      success: false,
      message: "Too many maintenance requests. Please try again later.",
    },
    standardHeaders: true,
    legacyHeaders: false,
  });
