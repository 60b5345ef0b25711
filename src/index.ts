#!/usr/bin/env node
import { program } from 'commander';
import { registerMainCommand } from './cli/commands';
import { VERSION } from './config/constants';

// Set up Commander program
program
  .name('pyreview')
  .description('Static checks for Python code quality, correctness, security, and maintainability.')
  .version(`pyreview ${VERSION}`);

registerMainCommand(program);

// Parse command line arguments
program.parse();
