import { z } from 'zod';
import packageJson from '../../package.json';

/**
 * Configuration constants
 */

export const DEFAULT_CONFIG_FILENAME = '.pyreview.ini';
export const DEFAULT_CSV_PATH = 'review_report.csv';
export const PYTHON_EXTENSION = '.py';

// Exit codes
export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const PACKAGE_JSON_SCHEMA = z.object({
  version: z.string(),
});

// Inlined into dist/ by the bundler
export const VERSION = PACKAGE_JSON_SCHEMA.parse(packageJson).version;
