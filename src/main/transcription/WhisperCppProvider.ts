/**
 * WhisperCppProvider.ts - Local whisper.cpp transcription
 *
 * Runs the whisper.cpp CLI against a fragment file on disk and reads the
 * plain-text output it writes. No API key or network required.
 */

import { execFile } from 'child_process';
import { existsSync } from 'fs';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir, cpus } from 'os';
import { join } from 'path';
import { ModelUnavailableError, TranscriptionError } from '../pipeline/errors';
import type { AudioInput, ModelProvider, Transcriber, WhisperCppConfig } from './types';

// ============================================================================
// Constants
// ============================================================================

const WHISPER_CLI_NAMES =
  process.platform === 'win32'
    ? ['whisper-cli.exe', 'whisper-cpp.exe', 'whisper.exe']
    : ['whisper-cli', 'whisper-cpp', 'whisper'];

const MAX_STDERR_PREVIEW = 300;

/**
 * Safe child environment -- only expose PATH and essential vars.
 */
const SAFE_CHILD_ENV = {
  PATH: process.env.PATH,
  HOME: process.env.HOME || process.env.USERPROFILE,
  USERPROFILE: process.env.USERPROFILE,
  LANG: process.env.LANG,
};

// ============================================================================
// Helpers
// ============================================================================

/**
 * Execute a command and return stdout, or null on failure.
 */
function execQuiet(command: string, args: string[]): Promise<string | null> {
  return new Promise((resolve) => {
    execFile(command, args, { env: SAFE_CHILD_ENV }, (error, stdout) => {
      if (error) {
        resolve(null);
      } else {
        resolve(stdout.toString().trim());
      }
    });
  });
}

/**
 * Resolve the whisper.cpp binary: the configured path if it exists, else
 * the first known CLI name found on PATH.
 */
export async function findWhisperCppBinary(configured?: string): Promise<string | null> {
  if (configured) {
    return existsSync(configured) ? configured : null;
  }

  const lookup = process.platform === 'win32' ? 'where' : 'which';
  for (const name of WHISPER_CLI_NAMES) {
    if ((await execQuiet(lookup, [name])) !== null) {
      return name;
    }
  }
  return null;
}

// ============================================================================
// WhisperCppProvider Class
// ============================================================================

export class WhisperCppProvider implements ModelProvider {
  readonly kind = 'whisper-cpp' as const;
  readonly id: string;
  private binary: string | null = null;

  constructor(private readonly config: WhisperCppConfig) {
    this.id = `whisper-cpp:${config.modelPath}`;
  }

  /**
   * Verify the binary and model once; later calls reuse the resolved binary.
   */
  async acquire(): Promise<Transcriber> {
    if (!this.binary) {
      if (!existsSync(this.config.modelPath)) {
        throw new ModelUnavailableError(`Whisper model not found at ${this.config.modelPath}`);
      }
      const binary = await findWhisperCppBinary(this.config.binaryPath);
      if (!binary) {
        throw new ModelUnavailableError(
          this.config.binaryPath
            ? `whisper.cpp binary not found at ${this.config.binaryPath}`
            : `whisper.cpp binary not found on PATH (tried ${WHISPER_CLI_NAMES.join(', ')})`
        );
      }
      this.binary = binary;
    }

    const binary = this.binary;
    return {
      transcribe: (input, signal) => this.transcribe(binary, input, signal),
    };
  }

  private async transcribe(binary: string, input: AudioInput, signal?: AbortSignal): Promise<string> {
    // Output goes to a private temp dir so nothing lands in the watched directory
    const workDir = await mkdtemp(join(tmpdir(), 'fragment-whisper-'));
    const outputBase = join(workDir, 'out');

    const args = [
      '-m', this.config.modelPath,
      '-l', this.config.language,
      '--output-txt',
      '--no-timestamps',
      '--no-prints',
      '-of', outputBase,
      '-t', String(this.config.threads ?? Math.max(1, Math.min(cpus().length, 4))),
      input.path,
    ];

    try {
      await this.runCli(binary, args, signal);

      try {
        return (await readFile(`${outputBase}.txt`, 'utf-8')).trim();
      } catch (error) {
        throw new TranscriptionError(
          `whisper.cpp produced no output for ${input.fileName}`,
          'transcription',
          error
        );
      }
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  private runCli(binary: string, args: string[], signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      execFile(binary, args, { env: SAFE_CHILD_ENV, signal }, (error, _stdout, stderr) => {
        if (!error) {
          resolve();
          return;
        }
        if (error.name === 'AbortError') {
          reject(new TranscriptionError('whisper.cpp run was aborted', 'timeout', error));
          return;
        }
        const detail = stderr.toString().slice(0, MAX_STDERR_PREVIEW) || error.message;
        reject(new TranscriptionError(`whisper.cpp failed: ${detail}`, 'transcription', error));
      });
    });
  }
}
