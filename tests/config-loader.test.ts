import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'fs';
import path from 'path';
import { tmpdir } from 'os';
import { loadConfig, parseConfigText } from '../src/boundaries/config-loader.js';
import { DEFAULT_CONFIG_FILENAME } from '../src/config/constants.js';
import { ConfigError } from '../src/errors/index.js';

describe('parseConfigText', () => {
  it('reads global keys and the pyreview section only', () => {
    const ini = `
# comment
MinPriority = medium
[pyreview]
MaxLines = 5
MergeIssues = yes
[other]
FailOn = HIGH
`;
    expect(parseConfigText(ini)).toEqual({ minPriority: 'MEDIUM', maxLines: 5, mergeIssues: true });
  });

  it('strips quotes around values', () => {
    expect(parseConfigText('FailOn = "high"\nMaxComplexity = 12\n')).toEqual({ failOn: 'HIGH', maxComplexity: 12 });
  });

  it('rejects malformed numbers and booleans', () => {
    expect(() => parseConfigText('MaxLines = five')).toThrow(ConfigError);
    expect(() => parseConfigText('MergeIssues = maybe')).toThrow('Invalid MergeIssues value: maybe');
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(tmpdir(), 'pyreview-config-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('falls back to defaults without a config file', () => {
    expect(loadConfig(tempDir)).toEqual({
      minPriority: 'LOW',
      maxComplexity: 10,
      maxFunctionLines: 50,
      mergeIssues: false,
    });
  });

  it('reads the default config file', () => {
    writeFileSync(path.join(tempDir, DEFAULT_CONFIG_FILENAME), '[pyreview]\nFailOn = medium\nMaxFunctionLines = 80\n');
    const config = loadConfig(tempDir);
    expect(config.failOn).toBe('MEDIUM');
    expect(config.maxFunctionLines).toBe(80);
    expect(config.minPriority).toBe('LOW');
  });

  it('requires an explicitly named file to exist', () => {
    expect(() => loadConfig(tempDir, 'custom.ini')).toThrow(
      `Missing configuration file at ${path.join(tempDir, 'custom.ini')}`
    );
  });

  it('rejects unknown priorities', () => {
    writeFileSync(path.join(tempDir, 'custom.ini'), 'MinPriority = urgent\n');
    expect(() => loadConfig(tempDir, 'custom.ini')).toThrow(ConfigError);
  });
});
