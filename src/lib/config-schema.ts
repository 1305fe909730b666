/**
 * Configuration Schema Validation
 *
 * Zod schema for the CLI configuration read from .iwsltrc files and
 * environment variables.
 */

import { z } from 'zod';

/**
 * CLI Configuration Schema
 */
export const CliConfigSchema = z.object({
  /** Directory holding the downloaded archives and extracted corpora */
  dataDir: z.string().min(1).optional(),

  /** IWSLT release year, e.g. "2016" */
  year: z.string().regex(/^\d{4}$/, 'year must be four digits').optional(),

  /** Language pair, e.g. "de-en" */
  langpair: z
    .string()
    .regex(/^[a-z]{2,3}-[a-z]{2,3}$/i, 'langpair must look like "de-en"')
    .optional(),

  /** Base URL of the archive server */
  archiveBaseUrl: z.string().url().optional(),

  /** Retries on network and server errors during download */
  maxRetries: z.number().int().min(0).max(10).optional(),
});

/** Type inferred from CliConfigSchema */
export type CliConfig = z.infer<typeof CliConfigSchema>;

/**
 * Safely validate CLI configuration without throwing
 */
export function safeValidateCliConfig(config: unknown): z.SafeParseReturnType<unknown, CliConfig> {
  return CliConfigSchema.safeParse(config);
}

/**
 * Format Zod validation errors for user display
 */
export function formatValidationError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('\n');
}
