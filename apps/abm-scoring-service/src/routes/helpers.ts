import { Response } from "express";
import { z } from "zod";
import { ValidationError, describeError, httpStatusFor } from "../utils/errors";

/**
 * Validate a request body or query, turning zod failures into a ValidationError
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`${issue.path.join(".") || "body"}: ${issue.message}`, {
      issues: parsed.error.issues.map(i => ({ path: i.path.join("."), message: i.message })),
    });
  }
  return parsed.data;
}

export function sendError(res: Response, route: string, error: unknown): Response {
  const report = describeError(error, { route });
  const status = httpStatusFor(error);
  if (status >= 500) {
    console.error(`[${route}] ${report.message}`, report.context);
  } else {
    console.warn(`[${route}] ${report.message}`);
  }
  return res.status(status).json(report);
}
