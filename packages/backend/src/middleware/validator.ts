import type { RequestHandler } from "express";
import { ZodError, type ZodTypeAny } from "zod";
import type { ApiErrorResponse } from "@lorebase/shared";

interface ValidationSchemas {
  body?: ZodTypeAny;
  params?: ZodTypeAny;
}

export function validationErrorResponse(error: ZodError): ApiErrorResponse {
  return {
    error: "Validation failed",
    code: "VALIDATION_FAILED",
    stage: "request",
    details: error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message
    }))
  };
}

/**
 * Replaces `req.body` and `req.params` with their parsed values. Query strings are parsed
 * inside the handler, where their typed result is needed.
 */
export const validate = (schemas: ValidationSchemas): RequestHandler => {
  return (req, res, next) => {
    try {
      if (schemas.body) {
        req.body = schemas.body.parse(req.body);
      }
      if (schemas.params) {
        req.params = schemas.params.parse(req.params);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        res.status(400).json(validationErrorResponse(error));
        return;
      }

      next(error);
    }
  };
};
