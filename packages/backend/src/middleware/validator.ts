import type { RequestHandler } from "express";
import type { ZodTypeAny } from "zod";
import type { ApiErrorResponse } from "@finhop/shared";
import { describeIssues } from "../errors.js";

interface ValidationSchemas {
  body?: ZodTypeAny;
  query?: ZodTypeAny;
  params?: ZodTypeAny;
}

type RequestPart = keyof ValidationSchemas;

const parts: RequestPart[] = ["params", "query", "body"];

/** Replaces each validated part with its parsed value; the first invalid part answers 400. */
export const validate = (schemas: ValidationSchemas): RequestHandler => {
  return (req, res, next) => {
    for (const part of parts) {
      const schema = schemas[part];
      if (!schema) {
        continue;
      }

      const parsed = schema.safeParse(req[part]);
      if (!parsed.success) {
        const body: ApiErrorResponse = {
          error: "Validation failed",
          details: describeIssues(parsed.error.issues)
        };
        res.status(400).json(body);
        return;
      }
      req[part] = parsed.data;
    }
    next();
  };
};
