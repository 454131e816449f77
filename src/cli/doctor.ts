/**
 * doctor.ts - Environment health check for the fragment-pipeline CLI
 *
 * Checks what `start` needs before it runs:
 * - Node.js version compatibility
 * - Config file validity
 * - Access to the working directories
 * - Free disk space against the configured threshold
 * - Transcription backend (whisper.cpp binary and model, or API key)
 */

import { existsSync } from 'fs';
import { access } from 'fs/promises';
import { constants } from 'fs';
import { dirname } from 'path';
import { statfsProbe, type DiskSpaceProbe } from '../main/pipeline/diskSpace';
import { formatBytes } from '../main/pipeline/errors';
import { loadConfig, type PipelineConfig } from '../main/settings/config';
import { findWhisperCppBinary } from '../main/transcription/WhisperCppProvider';

// ============================================================================
// Types
// ============================================================================

export interface DoctorCheck {
  name: string;
  status: 'pass' | 'fail' | 'warn';
  message: string;
  hint?: string;
}

export interface DoctorResult {
  checks: DoctorCheck[];
  passed: number;
  warned: number;
  failed: number;
}

export interface DoctorOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  nodeVersion?: string;
  diskProbe?: DiskSpaceProbe;
  findBinary?: (configured?: string) => Promise<string | null>;
}

const MIN_NODE_MAJOR = 20;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Parse a semver string into [major, minor, patch].
 */
function parseSemver(version: string): [number, number, number] | null {
  const match = version.match(/(\d+)\.(\d+)\.(\d+)/);
  if (!match) return null;
  return [parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10)];
}

/** Closest existing directory at or above `path`. */
function nearestExisting(path: string): string {
  let current = path;
  while (!existsSync(current)) {
    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return current;
}

// ============================================================================
// Check functions
// ============================================================================

export function checkNodeVersion(version: string = process.version): DoctorCheck {
  const parsed = parseSemver(version);

  if (!parsed) {
    return {
      name: 'Node.js',
      status: 'warn',
      message: `Unknown version: ${version}`,
      hint: `fragment-pipeline requires Node.js >= ${MIN_NODE_MAJOR}.0.0`,
    };
  }

  if (parsed[0] >= MIN_NODE_MAJOR) {
    return { name: 'Node.js', status: 'pass', message: `${version} (>= ${MIN_NODE_MAJOR}.0.0)` };
  }

  return {
    name: 'Node.js',
    status: 'fail',
    message: `${version} is too old`,
    hint: `fragment-pipeline requires Node.js >= ${MIN_NODE_MAJOR}.0.0`,
  };
}

export async function checkDirectory(label: string, dir: string): Promise<DoctorCheck> {
  if (!existsSync(dir)) {
    const parent = nearestExisting(dir);
    try {
      await access(parent, constants.W_OK);
    } catch {
      return {
        name: label,
        status: 'fail',
        message: `${dir} does not exist and ${parent} is not writable`,
      };
    }
    return { name: label, status: 'warn', message: `${dir} does not exist`, hint: 'It will be created on start' };
  }

  try {
    await access(dir, constants.R_OK | constants.W_OK);
  } catch {
    return { name: label, status: 'fail', message: `${dir} is not readable and writable` };
  }
  return { name: label, status: 'pass', message: dir };
}

export async function checkDiskSpace(config: PipelineConfig, probe: DiskSpaceProbe): Promise<DoctorCheck> {
  const target = nearestExisting(config.archiveDir);
  let free: number;
  try {
    free = await probe(target);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { name: 'Disk space', status: 'warn', message: `Could not determine free space on ${target}: ${message}` };
  }

  if (free < config.minFreeDiskBytes) {
    return {
      name: 'Disk space',
      status: 'fail',
      message: `${formatBytes(free)} free on ${target}, ${formatBytes(config.minFreeDiskBytes)} required`,
      hint: 'Dispatch pauses while free space is below minFreeDiskBytes',
    };
  }
  return { name: 'Disk space', status: 'pass', message: `${formatBytes(free)} free on ${target}` };
}

export async function checkModel(
  config: PipelineConfig,
  env: NodeJS.ProcessEnv,
  findBinary: (configured?: string) => Promise<string | null>
): Promise<DoctorCheck[]> {
  const model = config.model;

  switch (model.kind) {
    case 'whisper-cpp': {
      const binary = await findBinary(model.binaryPath);
      const modelFound = existsSync(model.modelPath);
      return [
        binary
          ? { name: 'whisper.cpp', status: 'pass', message: `Using ${binary}` }
          : {
              name: 'whisper.cpp',
              status: 'fail',
              message: model.binaryPath ? `Not found at ${model.binaryPath}` : 'Not found on PATH',
              hint: 'Install whisper.cpp or set model.binaryPath',
            },
        modelFound
          ? { name: 'Whisper model', status: 'pass', message: model.modelPath }
          : {
              name: 'Whisper model',
              status: 'fail',
              message: `Not found at ${model.modelPath}`,
              hint: 'Download a ggml-*.bin model and set model.modelPath',
            },
      ];
    }
    case 'openai':
      return [
        env[model.apiKeyEnv]?.trim()
          ? { name: 'API key', status: 'pass', message: `${model.apiKeyEnv} is set` }
          : {
              name: 'API key',
              status: 'fail',
              message: `${model.apiKeyEnv} not set`,
              hint: `Export ${model.apiKeyEnv} for ${model.baseUrl}`,
            },
      ];
    case 'static':
      return [{ name: 'Model', status: 'warn', message: 'Static provider: transcripts will contain placeholder text' }];
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Run all doctor checks and return the result. Checks that need the config
 * are left out when it cannot be loaded.
 */
export async function runDoctorChecks(options: DoctorOptions = {}): Promise<DoctorResult> {
  const env = options.env ?? process.env;
  const checks: DoctorCheck[] = [checkNodeVersion(options.nodeVersion)];

  let config: PipelineConfig | null = null;
  try {
    config = await loadConfig({ path: options.configPath, env });
    checks.push({ name: 'Config', status: 'pass', message: config.configPath ?? 'defaults' });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    checks.push({ name: 'Config', status: 'fail', message });
  }

  if (config) {
    const results = await Promise.all([
      checkDirectory('Input dir', config.inputDir),
      checkDirectory('Processed dir', config.processedDir),
      checkDirectory('Failed dir', config.failedDir),
      checkDirectory('Archive dir', config.archiveDir),
      checkDiskSpace(config, options.diskProbe ?? statfsProbe),
      checkModel(config, env, options.findBinary ?? findWhisperCppBinary),
    ]);
    checks.push(...results.flat());
  }

  const passed = checks.filter((c) => c.status === 'pass').length;
  const warned = checks.filter((c) => c.status === 'warn').length;
  const failed = checks.filter((c) => c.status === 'fail').length;

  return { checks, passed, warned, failed };
}
