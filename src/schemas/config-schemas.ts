import { z } from 'zod';
import { PRIORITY_SCHEMA } from './cli-schemas';

// Configuration file schema for .pyreview.ini validation
export const CONFIG_SCHEMA = z.object({
  minPriority: PRIORITY_SCHEMA.default('LOW'),
  failOn: PRIORITY_SCHEMA.optional(),
  maxLines: z.number().int().positive().optional(),
  maxComplexity: z.number().int().positive().default(10),
  maxFunctionLines: z.number().int().positive().default(50),
  mergeIssues: z.boolean().default(false),
});

// Inferred types
export type Config = z.infer<typeof CONFIG_SCHEMA>;
