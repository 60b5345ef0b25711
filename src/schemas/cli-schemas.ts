import { z } from 'zod';
import { DEFAULT_CSV_PATH } from '../config/constants';

export const PRIORITY_SCHEMA = z.enum(['HIGH', 'MEDIUM', 'LOW']);

const POSITIVE_INT = z.coerce.number().int().positive();

// CLI options schema for command line argument validation
export const CLI_OPTIONS_SCHEMA = z.object({
  out: z.string().min(1).default(DEFAULT_CSV_PATH),
  jsonOutput: z.string().min(1).optional(),
  log: z.string().min(1).optional(),
  minPriority: PRIORITY_SCHEMA.optional(),
  failOn: PRIORITY_SCHEMA.optional(),
  maxLines: POSITIVE_INT.optional(),
  mergeIssues: z.boolean().optional(),
  maxComplexity: POSITIVE_INT.optional(),
  maxFunctionLines: POSITIVE_INT.optional(),
  config: z.string().min(1).optional(),
  quiet: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

// Inferred types
export type CliOptions = z.infer<typeof CLI_OPTIONS_SCHEMA>;
