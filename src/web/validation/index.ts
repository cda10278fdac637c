/**
 * Validation Module
 *
 * Exports validation schemas and middleware.
 */

export * from "./schemas";

export { formatZodError, validateBody, validate } from "./middleware";
