#!/usr/bin/env node

/**
 * api-change-guard CLI
 *
 * Usage:
 *   api-change-guard <file1> <file2> [logs_file]
 *
 * The two API documents may be given in either order; the one declaring the
 * lower version is the baseline. Prints the violation list as JSON on stdout.
 */

import { Command, CommanderError, Option } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import { ChangeGuard } from './guard';
import { ChangeGuardError } from './core/errors';
import { severityRank } from './core/classifier';
import { ReportFormat, Severity } from './core/types';

interface CheckOptions {
  format: ReportFormat;
  output?: string;
  failOn?: Severity;
  escalate: boolean;
  verbose?: boolean;
}

/** Where the CLI writes; each call is one line */
export interface CliOutput {
  out: (line: string) => void;
  err: (line: string) => void;
}

export const EXIT_OK = 0;
export const EXIT_FAILED_ON_SEVERITY = 1;
export const EXIT_ERROR = 2;

const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

// ─── Program ────────────────────────────────────────────────────────────────

/**
 * Run the CLI against user arguments (without the node and script entries)
 * and return the exit code.
 */
export function run(argv: string[], output: CliOutput = consoleOutput): number {
  let exitCode = EXIT_OK;

  const program = new Command();

  program
    .name('api-change-guard')
    .description('Detect breaking API changes and verify the declared version bump.')
    .version('1.0.0')
    .argument('<file1>', 'API document (YAML or JSON)')
    .argument('<file2>', 'API document (YAML or JSON)')
    .argument('[logs_file]', 'Usage log (JSON array or newline-delimited JSON)')
    .addOption(
      new Option('-f, --format <format>', 'Report format')
        .choices(['json', 'console', 'markdown'])
        .default('json')
    )
    .option('-o, --output <file>', 'Write report to file instead of stdout')
    .addOption(
      new Option('--fail-on <severity>', 'Exit with code 1 when a violation at or above this severity exists')
        .choices(['LOW', 'MEDIUM', 'HIGH'])
    )
    .option('--no-escalate', 'Do not raise severity for endpoints seen in the usage log')
    .option('--verbose', 'Print progress to stderr')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => output.out(text.trimEnd()),
      writeErr: (text) => output.err(text.trimEnd()),
    })
    .action((file1: string, file2: string, logsFile: string | undefined, opts: CheckOptions) => {
      try {
        const guard = new ChangeGuard({
          escalateOnUsage: opts.escalate,
          onLog: opts.verbose ? (line) => output.err(chalk.gray(`   ${line}`)) : undefined,
        });

        const report = guard.analyzeFiles(file1, file2, logsFile);
        const formatted = guard.format(report, opts.format);

        if (opts.output) {
          fs.writeFileSync(opts.output, `${formatted}\n`, 'utf-8');
          output.err(`📄 Report written to ${opts.output}`);
        } else {
          output.out(formatted);
        }

        const failOn = opts.failOn;
        if (failOn && report.violations.some((v) => severityRank(v.severity) >= severityRank(failOn))) {
          exitCode = EXIT_FAILED_ON_SEVERITY;
        }
      } catch (error) {
        const kind = error instanceof ChangeGuardError ? error.name : 'Error';
        output.err(`❌ ${kind}: ${error instanceof Error ? error.message : String(error)}`);
        exitCode = EXIT_ERROR;
      }
    });

  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version end through the override too
      return error.exitCode === 0 ? EXIT_OK : EXIT_ERROR;
    }
    throw error;
  }

  return exitCode;
}

// ─── Run ────────────────────────────────────────────────────────────────────

if (require.main === module) {
  process.exitCode = run(process.argv.slice(2));
}
