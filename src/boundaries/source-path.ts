import { statSync, type Stats } from 'fs';
import * as path from 'path';
import { InputError } from '../errors/index';
import { PYTHON_EXTENSION } from '../config/constants';

/**
 * Check that `filePath` names an existing Python source file.
 * Returns the absolute path.
 */
export function validateSourcePath(filePath: string, cwd: string = process.cwd()): string {
  const absolute = path.resolve(cwd, filePath);
  let stats: Stats;
  try {
    stats = statSync(absolute);
  } catch {
    throw new InputError(`file not found: ${filePath}`);
  }
  if (stats.isDirectory()) {
    throw new InputError(`expected a file but got a directory: ${filePath}`);
  }
  if (!absolute.toLowerCase().endsWith(PYTHON_EXTENSION)) {
    throw new InputError(`expected a ${PYTHON_EXTENSION} file: ${filePath}`);
  }
  return absolute;
}
