/**
 * Schema Validators — Contract Enforcement
 *
 * Zod validators for the request parameters handed in by the keyboard UI and
 * the JSON bodies returned by the backend. validateOrThrow() is for
 * programmer/config errors; validateOrLog() is for untrusted input that is
 * turned into an ApiError rather than an exception.
 */

import { z } from "zod";
import { createSubsystemLogger } from "../../logging/subsystem.js";

const log = createSubsystemLogger("contracts");

// ─── Schemas ───────────────────────────────────────────────────────────

const nonBlank = (label: string) =>
  z.string().refine((value) => value.trim().length > 0, { message: `${label} must not be blank` });

/**
 * RewriteParams: a rewrite of the text the user is typing.
 * tone: 0 = casual, 1 = formal. length: 0 = detailed, 1 = brief.
 */
export const RewriteParamsSchema = z.object({
  text: nonBlank("text"),
  tone: z.number().finite().min(0).max(1),
  length: z.number().finite().min(0).max(1),
  presetId: z.string().min(1).optional(),
  locale: z.string().min(1).optional(),
});

export type RewriteParams = z.infer<typeof RewriteParamsSchema>;

/**
 * ChatParams: a free-form question.
 */
export const ChatParamsSchema = z.object({
  query: nonBlank("query"),
});

export type ChatParams = z.infer<typeof ChatParamsSchema>;

/**
 * Successful backend reply. A string `error` field may still appear on a 2xx
 * reply, so both fields are optional here and checked by the executor.
 */
export const CompletionBodySchema = z.object({
  text: z.string().optional(),
  error: z.string().optional(),
  details: z.string().optional(),
});

export type CompletionBody = z.infer<typeof CompletionBodySchema>;

/**
 * Error reply: `{ error, details? }`. Extra fields (rate limit reset time,
 * message) are tolerated and ignored.
 */
export const ErrorBodySchema = z.object({
  error: z.string().optional(),
  details: z.string().optional(),
});

export type ErrorBody = z.infer<typeof ErrorBodySchema>;

// ─── Validation Helpers ────────────────────────────────────────────────

export type ValidationError = {
  path: (string | number)[];
  message: string;
  code: string;
};

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] };

function formatZodErrors(error: z.ZodError): ValidationError[] {
  return error.issues.map((issue) => ({
    path: issue.path,
    message: issue.message,
    code: issue.code,
  }));
}

function summarize(errors: ValidationError[]): string {
  return errors.map((e) => `  ${e.path.join(".")}: ${e.message} (${e.code})`).join("\n");
}

/**
 * Validate data against a Zod schema. Throws a structured error on failure.
 */
export function validateOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  label?: string,
): T {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }
  const errors = formatZodErrors(result.error);
  const prefix = label ? `[${label}] ` : "";
  throw new ContractValidationError(
    `${prefix}Validation failed:\n${summarize(errors)}`,
    errors,
    label,
  );
}

/**
 * Validate data against a Zod schema. Logs a warning on failure, returns result.
 */
export function validateOrLog<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  label?: string,
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  const errors = formatZodErrors(result.error);
  const prefix = label ? `[${label}] ` : "";
  log.warn(`${prefix}Validation failed:\n${summarize(errors)}`, { label, errors });
  return { success: false, errors };
}

/**
 * Structured error for contract validation failures.
 */
export class ContractValidationError extends Error {
  readonly errors: ValidationError[];
  readonly label: string | undefined;

  constructor(message: string, errors: ValidationError[], label?: string) {
    super(message);
    this.name = "ContractValidationError";
    this.errors = errors;
    this.label = label;
  }
}
