/**
 * Page URL Resolver - Zod Validation Schemas
 *
 * Input validation for command-line options and environment configuration.
 * Each schema coerces raw text to typed values and carries descriptive
 * error messages.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';

export { ValidationError };

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Join zod issues into one message, each prefixed by its field path
 */
export function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    })
    .join('; ');
}

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data
 * @throws ValidationError with descriptive message if validation fails
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Treat an empty string as absent, so `KEY=` in a .env file falls back to the default
 */
function emptyAsUndefined(value: unknown): unknown {
  return value === '' ? undefined : value;
}

// ═══════════════════════════════════════════════════════════════════════════════
// COMMAND-LINE OPTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Non-negative integer flag given as decimal digits. Exponents, signs,
 * fractions, empty text and values beyond the safe integer range are rejected.
 */
function integerFlag(name: string, max?: number) {
  const bounded = z.number().safe(`${name} is out of range`);
  return z
    .string({ invalid_type_error: `${name} must be a number` })
    .superRefine((value, ctx) => {
      if (!/^-?\d+(\.\d+)?$/.test(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be a number` });
      } else if (value.includes('.')) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be an integer` });
      } else if (value.startsWith('-')) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must not be negative` });
      }
    })
    .transform((value) => Number(value))
    .pipe(max === undefined ? bounded : bounded.max(max, `${name} must be ${max} or less`));
}

/**
 * Schema for parsed command-line flags.
 * Numeric flags arrive as text from the argument parser.
 */
export const CliOptionsInput = z.object({
  dsn: z.preprocess(emptyAsUndefined, z.string().optional()),
  pid: integerFlag('pid').default('0'),
  query: z.preprocess(emptyAsUndefined, z.string().optional()),
  nfields: integerFlag('nfields', 1000).default('0'),
  children: z.boolean().default(false),
  roots: z.boolean().default(false),
  csv: z.boolean().default(false),
  verbose: z.boolean().default(false),
  help: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliOptionsInput>;

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Schema for PAGE_RESOLVER_* environment variables
 */
export const ResolverEnvInput = z.object({
  PAGE_RESOLVER_DSN: z.preprocess(emptyAsUndefined, z.string().optional()),
  PAGE_RESOLVER_PAGES_QUERY: z.preprocess(emptyAsUndefined, z.string().optional()),
  PAGE_RESOLVER_DOMAINS_QUERY: z.preprocess(emptyAsUndefined, z.string().optional()),
  PAGE_RESOLVER_URL_TEMPLATE: z.preprocess(
    emptyAsUndefined,
    z
      .string()
      .refine(
        (value) => value.includes('{domain}') && value.includes('{id}'),
        'URL template must contain {domain} and {id}'
      )
      .optional()
  ),
  PAGE_RESOLVER_BUSY_TIMEOUT_MS: z.preprocess(
    emptyAsUndefined,
    z.coerce
      .number({ invalid_type_error: 'busy timeout must be a number' })
      .int('busy timeout must be an integer')
      .positive('busy timeout must be positive')
      .optional()
  ),
});

export type ResolverEnv = z.infer<typeof ResolverEnvInput>;
