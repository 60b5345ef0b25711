import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import path from 'path';
import { tmpdir } from 'os';
import { runReview } from '../src/cli/commands.js';
import { resolveSettings } from '../src/cli/orchestrator.js';
import { validateSourcePath } from '../src/boundaries/source-path.js';
import { InputError } from '../src/errors/index.js';
import { setSilentMode } from '../src/output/logger.js';

describe('validateSourcePath', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(tmpdir(), 'pyreview-path-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('returns the absolute path of a .py file', () => {
    writeFileSync(path.join(tempDir, 'mod.py'), 'x = 1\n');
    expect(validateSourcePath('mod.py', tempDir)).toBe(path.join(tempDir, 'mod.py'));
  });

  it('rejects missing files, directories and other extensions', () => {
    mkdirSync(path.join(tempDir, 'pkg.py'));
    writeFileSync(path.join(tempDir, 'notes.txt'), 'x');
    expect(() => validateSourcePath('gone.py', tempDir)).toThrow('file not found: gone.py');
    expect(() => validateSourcePath('pkg.py', tempDir)).toThrow('expected a file but got a directory: pkg.py');
    expect(() => validateSourcePath('notes.txt', tempDir)).toThrow(InputError);
  });
});

describe('runReview', () => {
  let tempDir: string;
  let out: string;

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(tmpdir(), 'pyreview-cli-'));
    out = path.join(tempDir, 'report.csv');
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    setSilentMode(false);
    rmSync(tempDir, { recursive: true, force: true });
  });

  function writeSource(name: string, content: string): string {
    const file = path.join(tempDir, name);
    writeFileSync(file, content);
    return file;
  }

  it('writes the CSV report and exits 0', () => {
    const file = writeSource('sample.py', 'eval(x)\n');
    expect(runReview(file, { out, quiet: true })).toBe(0);
    const rows = readFileSync(out, 'utf-8').split('\r\n');
    expect(rows).toContain(
      'Security;HIGH;1;Arbitrary code execution risk.;sample.py: Use of eval(). Avoid on untrusted input.'
    );
  });

  it('exits 2 when the fail-on threshold is met', () => {
    const file = writeSource('sample.py', 'eval(x)\n');
    expect(runReview(file, { out, quiet: true, failOn: 'HIGH' })).toBe(2);
  });

  it('exits 0 when findings stay below the fail-on threshold', () => {
    const file = writeSource('clean.py', '"""Doc."""\nprint(1)\n');
    expect(runReview(file, { out, quiet: true, failOn: 'HIGH', minPriority: 'LOW' })).toBe(0);
  });

  it('writes the JSON and log reports when asked', () => {
    const file = writeSource('sample.py', 'x = input()\neval(x)\n');
    const jsonOutput = path.join(tempDir, 'report.json');
    const log = path.join(tempDir, 'summary.log');
    expect(runReview(file, { out, jsonOutput, log, quiet: true, minPriority: 'HIGH' })).toBe(0);
    expect(JSON.parse(readFileSync(jsonOutput, 'utf-8'))).toEqual([
      {
        file,
        category: 'Security',
        priority: 'HIGH',
        impacted_lines: '2',
        potential_impact: 'Arbitrary code execution risk.',
        description: 'sample.py: Use of eval(). Avoid on untrusted input.',
      },
    ]);
    expect(readFileSync(log, 'utf-8').split('\n')[2]).toBe('Total issues: 1');
  });

  it('exits 2 for input that is not a Python file', () => {
    const file = writeSource('notes.txt', 'x');
    expect(runReview(file, { out, quiet: true })).toBe(2);
    expect(runReview(path.join(tempDir, 'missing.py'), { out, quiet: true })).toBe(2);
    expect(existsSync(out)).toBe(false);
  });

  it('exits 1 for invalid options', () => {
    const file = writeSource('sample.py', 'x = 1\n');
    expect(runReview(file, { out, quiet: true, minPriority: 'URGENT' })).toBe(1);
    expect(runReview(file, { out, quiet: true, maxLines: '0' })).toBe(1);
  });

  it('exits 1 for a missing config file', () => {
    const file = writeSource('sample.py', 'x = 1\n');
    expect(runReview(file, { out, quiet: true, config: path.join(tempDir, 'nope.ini') })).toBe(1);
  });
});

describe('resolveSettings', () => {
  it('lets CLI flags override the config file', () => {
    const settings = resolveSettings(
      { out: 'r.csv', quiet: false, verbose: false, minPriority: 'HIGH', maxComplexity: 4 },
      { minPriority: 'LOW', failOn: 'MEDIUM', maxComplexity: 10, maxFunctionLines: 50, mergeIssues: true }
    );
    expect(settings).toEqual({
      out: 'r.csv',
      jsonOutput: undefined,
      log: undefined,
      minPriority: 'HIGH',
      failOn: 'MEDIUM',
      maxLines: undefined,
      mergeIssues: true,
      maxComplexity: 4,
      maxFunctionLines: 50,
      quiet: false,
    });
  });
});
