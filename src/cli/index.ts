#!/usr/bin/env node
/**
 * fragment-pipeline CLI - Transcribe audio fragments into ordered transcripts
 *
 * Usage:
 *   fragment-pipeline start [--config <file>] [--dry-run] [--verbose]
 *   fragment-pipeline doctor [--config <file>]
 *
 * `start` watches the input directory, transcribes each fragment and writes
 * gap-free runs as full_<start>_to_<end>.txt until SIGINT/SIGTERM.
 *
 * A fragment that fails leaves a permanent gap at its sequence number:
 * merging stops there. Clear the input, processed, failed and archive
 * directories between runs over the same fragment set.
 */

import { Command } from 'commander';
import { runDoctorChecks } from './doctor';
import {
  EXIT_SUCCESS,
  EXIT_USER_ERROR,
  exitCodeFor,
  runStart,
  waitForSignal,
} from './startCommand';

const VERSION = '0.1.0';

// ============================================================================
// Console output helpers
// ============================================================================

const SYMBOLS = {
  check: '✔',    // checkmark
  cross: '✘',    // cross
  warn: '⚠',     // warning sign
  arrow: '→',    // right arrow
  bullet: '•',   // bullet
  line: '─',     // horizontal line
} as const;

function banner(mode: string): void {
  console.log();
  console.log(`  fragment-pipeline v${VERSION} ${SYMBOLS.bullet} ${mode}`);
  console.log(`  ${SYMBOLS.line.repeat(40)}`);
  console.log();
}

function step(message: string): void {
  console.log(`  ${SYMBOLS.arrow} ${message}`);
}

function success(message: string): void {
  console.log(`  ${SYMBOLS.check} ${message}`);
}

function fail(message: string): void {
  console.log(`  ${SYMBOLS.cross} ${message}`);
}

// ============================================================================
// CLI definition
// ============================================================================

const program = new Command();

program
  .name('fragment-pipeline')
  .description('Transcribe numbered audio fragments and merge them into ordered transcripts')
  .version(VERSION, '-v, --version')
  .showHelpAfterError('(use --help for available options)');

// ============================================================================
// start command
// ============================================================================

program
  .command('start')
  .description('Watch the input directory and transcribe fragments until interrupted')
  .option('--config <file>', 'Config file (default: $FRAGMENT_PIPELINE_CONFIG or ./config/pipeline.config.json)')
  .option('--dry-run', 'Skip the model; each transcript line is the fragment file name', false)
  .option('--verbose', 'Debug logging', false)
  .action(async (options: { config?: string; dryRun: boolean; verbose: boolean }) => {
    banner('Pipeline');

    try {
      const result = await runStart(options, {
        waitForShutdown: async () => {
          step('Press Ctrl+C to stop');
          console.log();
          return waitForSignal();
        },
        log: step,
      });

      const { status } = result;
      console.log();
      success('Pipeline stopped.');
      console.log();
      console.log(`  Transcripts written: ${status.archivedCount}`);
      console.log(`  Failed fragments:    ${status.failedCount}`);
      console.log(`  Next sequence:       ${status.cursor}`);
      if (status.buffered > 0) {
        fail(`${status.buffered} result(s) not merged (gap at ${status.cursor}): ${status.bufferedSequences.join(', ')}`);
      }
      console.log();
      process.exit(result.exitCode);
    } catch (error) {
      console.log();
      const message = error instanceof Error ? error.message : String(error);
      fail(`Pipeline failed: ${message}`);

      if (options.verbose && error instanceof Error && error.stack) {
        console.log();
        console.log(error.stack);
      }
      process.exit(exitCodeFor(error));
    }
  });

// ============================================================================
// doctor command
// ============================================================================

program
  .command('doctor')
  .description('Check the environment, config and transcription backend')
  .option('--config <file>', 'Config file to check')
  .action(async (options: { config?: string }) => {
    banner('Doctor');

    const result = await runDoctorChecks({ configPath: options.config });
    for (const check of result.checks) {
      const symbol =
        check.status === 'pass' ? SYMBOLS.check : check.status === 'warn' ? SYMBOLS.warn : SYMBOLS.cross;
      console.log(`  ${symbol} ${check.name}: ${check.message}`);
      if (check.hint && check.status !== 'pass') {
        for (const line of check.hint.split('\n')) {
          console.log(`      ${line}`);
        }
      }
    }

    console.log();
    console.log(`  ${result.passed} passed, ${result.warned} warnings, ${result.failed} failed`);
    console.log();
    process.exit(result.failed > 0 ? EXIT_USER_ERROR : EXIT_SUCCESS);
  });

program.parseAsync().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  fail(message);
  process.exit(exitCodeFor(error));
});
