// src/middleware/validate.ts
import type { Request, Response, NextFunction } from "express";
import type { ObjectSchema } from "joi";

// Replaces req.body with the validated (converted, stripped) value.
export const validateBody =
  (schema: ObjectSchema) => (req: Request, res: Response, next: NextFunction) => {
    const { error, value } = schema.validate(req.body ?? {}, { abortEarly: false, stripUnknown: true });
    if (error) {
      return res.status(400).json({
        success: false,
        message: "Validation failed",
        details: error.details.map((d) => d.message),
      });
    }
    req.body = value;
    next();
  };
