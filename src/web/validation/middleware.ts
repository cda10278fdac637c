/**
 * Validation Middleware
 *
 * Express middleware and helpers that check request data against Zod
 * schemas and answer 400 with a ClientErrorResponse when it does not fit.
 */

import { Request, Response, NextFunction, RequestHandler } from "express";
import { z } from "zod";
import { ClientErrorResponse } from "@core/types";
import { getLogger } from "@utils/logger";

const logger = getLogger("ValidationMiddleware");

/**
 * Turn a Zod error into the 400 body. `error` names the first problem,
 * `details` lists all of them.
 */
export function formatZodError(
  error: z.ZodError,
  fallbackField: string = "body",
): ClientErrorResponse {
  const details = error.issues.map((issue) => ({
    field: issue.path.join(".") || fallbackField,
    message: issue.message,
  }));

  const first = details[0];
  const message = first
    ? `${first.field}: ${first.message}`
    : "Request validation failed";

  return { error: message, details };
}

/**
 * Create middleware that validates the request body against a Zod schema.
 * On success the parsed value replaces `req.body`.
 *
 * @example
 * ```typescript
 * app.post('/api/screens',
 *   validateBody(screenRequestSchema),
 *   asyncRoute((req, res) => controller.createScreen(req, res)),
 * );
 * ```
 */
export function validateBody<S extends z.ZodTypeAny>(schema: S): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      logger.debug(
        `Body validation failed for ${req.method} ${req.path}:`,
        result.error.issues,
      );
      res.status(400).json(formatZodError(result.error));
      return;
    }

    req.body = result.data;
    next();
  };
}

/**
 * Validate data against a schema inside a controller method
 *
 * @example
 * ```typescript
 * const headers = validate(displayHeadersSchema, req.headers, "headers");
 * if (!headers.success) {
 *   res.status(400).json(headers.error);
 *   return;
 * }
 * ```
 */
export function validate<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  fallbackField?: string,
):
  | { success: true; data: z.output<S> }
  | { success: false; error: ClientErrorResponse } {
  const result = schema.safeParse(data);

  if (!result.success) {
    return {
      success: false,
      error: formatZodError(result.error, fallbackField),
    };
  }

  return {
    success: true,
    data: result.data,
  };
}
