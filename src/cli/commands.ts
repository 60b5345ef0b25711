import type { Command } from 'commander';
import { loadConfig } from '../boundaries/config-loader';
import { parseCliOptions } from '../boundaries/cli-parser';
import { validateSourcePath } from '../boundaries/source-path';
import { DEFAULT_CSV_PATH, EXIT_FAILURE, EXIT_USAGE } from '../config/constants';
import { InputError, handleUnknownError } from '../errors/index';
import { error, setSilentMode, setVerboseMode } from '../output/logger';
import { resolveSettings, reviewFile } from './orchestrator';

/*
 * Validate options, input path and configuration, then review the file.
 * Returns the process exit code instead of exiting, so callers and tests
 * decide what to do with it.
 */
export function runReview(file: string, rawOptions: unknown): number {
  // Parse and validate CLI options
  let cliOptions;
  try {
    cliOptions = parseCliOptions(rawOptions);
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Parsing CLI options');
    error(`Error: ${err.message}`);
    return EXIT_FAILURE;
  }
  setSilentMode(cliOptions.quiet);
  setVerboseMode(cliOptions.verbose);

  try {
    validateSourcePath(file);
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Validating input path');
    error(`Error: ${err.message}`);
    return e instanceof InputError ? EXIT_USAGE : EXIT_FAILURE;
  }

  // Load config file, if any
  let config;
  try {
    config = loadConfig(process.cwd(), cliOptions.config);
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Loading configuration');
    error(`Error: ${err.message}`);
    return EXIT_FAILURE;
  }

  try {
    return reviewFile(file, resolveSettings(cliOptions, config)).exitCode;
  } catch (e: unknown) {
    const err = handleUnknownError(e, `Reviewing ${file}`);
    error(`Error: ${err.message}`);
    return EXIT_FAILURE;
  }
}

/*
 * Registers the review command with Commander.
 * It is the program's only command: `pyreview <file> [options]`.
 */
export function registerMainCommand(program: Command): void {
  program
    .argument('<file>', 'Python source file to analyze (e.g. src/module.py)')
    .option('--out <path>', 'CSV report path (semicolon separated)', DEFAULT_CSV_PATH)
    .option('--json-output <path>', 'Also write a JSON report to this path')
    .option('--log <path>', 'Also write a short text summary to this path')
    .option('--min-priority <priority>', 'Only report issues at or above LOW, MEDIUM or HIGH')
    .option('--fail-on <priority>', 'Exit with code 2 when an issue at or above this priority is found')
    .option('--max-lines <n>', 'Cap the number of impacted lines listed per issue')
    .option('--merge-issues', 'Merge identical issues across lines into one row')
    .option('--max-complexity <n>', 'Complexity threshold for functions and classes')
    .option('--max-function-lines <n>', 'Line count threshold for functions and classes')
    .option('--config <path>', 'Path to a custom .pyreview.ini config file')
    .option('-q, --quiet', 'Print nothing but errors')
    .option('-v, --verbose', 'Enable verbose logging')
    .action((file: string) => {
      process.exitCode = runReview(file, program.opts());
    });
}
