#!/usr/bin/env node

import { Command } from 'commander';
import pc from 'picocolors';
import { buildConfig } from './config.js';
import { scanWithConfig } from './index.js';
import { formatOutput } from './reporter/index.js';
import type { OutputFormat } from './types.js';

const VALID_FORMATS: readonly OutputFormat[] = ['terminal', 'json', 'markdown'];

interface CliOptions {
  format?: string;
  excludeDir?: string[];
  ignore?: string[];
  allow?: string[];
  verbose?: boolean;
}

function parseFormat(value: string | undefined): OutputFormat | undefined {
  if (value === undefined) return undefined;
  const format = VALID_FORMATS.find(candidate => candidate === value);
  if (!format) {
    throw new Error(`Invalid format "${value}". Valid values: ${VALID_FORMATS.join(', ')}`);
  }
  return format;
}

const program = new Command();

program
  .name('depscout')
  .description('List the dependencies declared across Python, JavaScript and container manifests')
  .version('0.1.0')
  .argument('[directory]', 'Project root directory', '.')
  .option('-f, --format <format>', 'Output format: terminal, json, markdown')
  .option('--exclude-dir <dirs...>', 'Additional directory names to skip')
  .option('--ignore <packages...>', 'Never report these packages')
  .option('--allow <packages...>', 'Always report these packages, even when a filter rule matches')
  .option('--verbose', 'Log every discovered file and exclusion to stderr')
  .action(async (directory: string, options: CliOptions) => {
    try {
      // Resolved up front so a config-file format applies to the output too
      const config = buildConfig({
        rootDir: directory,
        format: parseFormat(options.format),
        excludeDirs: options.excludeDir,
        ignorePackages: options.ignore,
        allowPackages: options.allow,
        logLevel: options.verbose ? 'debug' : undefined,
      });

      const result = await scanWithConfig(config);
      process.stdout.write(formatOutput(result, config.format));
      process.exit(0);
    } catch (error) {
      console.error(pc.red('Error:'), error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

program.parse();
