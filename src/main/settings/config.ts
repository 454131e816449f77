/**
 * Pipeline configuration
 *
 * Loaded from a JSON file and validated with zod. Every field except
 * `model` has a default; unknown keys are rejected so that typos surface at
 * startup instead of silently falling back to defaults.
 *
 * Lookup order for the file: explicit path, FRAGMENT_PIPELINE_CONFIG,
 * ./config/pipeline.config.json. Relative paths inside the file resolve
 * against the file's own directory.
 */

import { readFile } from 'fs/promises';
import { dirname, isAbsolute, resolve } from 'path';
import { z } from 'zod';
import { ConfigError, errnoCode } from '../pipeline/errors';

// ============================================================================
// Schema
// ============================================================================

const GiB = 1024 ** 3;

export const DEFAULT_CONFIG_PATH = './config/pipeline.config.json';

const whisperCppSchema = z
  .object({
    kind: z.literal('whisper-cpp'),
    binaryPath: z.string().min(1).optional(),
    modelPath: z.string().min(1),
    language: z.string().min(1).default('en'),
    threads: z.number().int().min(1).max(64).optional(),
    serialize: z.boolean().default(true),
  })
  .strict();

const openaiSchema = z
  .object({
    kind: z.literal('openai'),
    baseUrl: z.string().url().default('https://api.openai.com'),
    model: z.string().min(1).default('whisper-1'),
    language: z.string().min(1).optional(),
    apiKeyEnv: z.string().min(1).default('OPENAI_API_KEY'),
  })
  .strict();

const staticSchema = z
  .object({
    kind: z.literal('static'),
    text: z.string().default('[{name}]'),
  })
  .strict();

export const modelSchema = z.discriminatedUnion('kind', [whisperCppSchema, openaiSchema, staticSchema]);

const extensionSchema = z
  .string()
  .regex(/^\.[A-Za-z0-9]+$/, 'must look like ".wav"')
  .transform((ext) => ext.toLowerCase());

export const configSchema = z
  .object({
    inputDir: z.string().min(1).default('./fragments/incoming'),
    processedDir: z.string().min(1).default('./fragments/processed'),
    failedDir: z.string().min(1).default('./fragments/failed'),
    archiveDir: z.string().min(1).default('./transcripts'),
    logsDir: z.string().min(1).default('./logs'),
    extensions: z.array(extensionSchema).min(1).default(['.wav']),
    concurrency: z.number().int().min(1).max(64).default(2),
    queueCapacity: z.number().int().min(1).default(16),
    pollIntervalMs: z.number().int().min(50).default(500),
    mergeIntervalMs: z.number().int().min(50).default(5000),
    jobTimeoutMs: z.number().int().min(1000).default(120_000),
    minFreeDiskBytes: z.number().int().min(0).default(GiB),
    firstSequence: z.number().int().min(0).default(0),
    bufferSoftLimit: z.number().int().min(1).default(1000),
    logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    model: modelSchema,
  })
  .strict();

export type PipelineConfigInput = z.input<typeof configSchema>;

export type PipelineConfig = z.output<typeof configSchema> & {
  /** Absolute path of the file the config was read from, if any */
  configPath: string | null;
};

// ============================================================================
// Loading
// ============================================================================

export interface LoadConfigOptions {
  path?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Resolve which config file to read.
 */
export function resolveConfigPath(options: LoadConfigOptions = {}): string {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  return resolve(cwd, options.path ?? env.FRAGMENT_PIPELINE_CONFIG ?? DEFAULT_CONFIG_PATH);
}

/**
 * Read, override from the environment, and validate the config file.
 * Throws ConfigError for a missing or unreadable file, invalid JSON, or
 * values the schema rejects.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<PipelineConfig> {
  const configPath = resolveConfigPath(options);

  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read config file ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config file ${configPath} is not valid JSON: ${message}`);
  }

  return parseConfig(parsed, { baseDir: dirname(configPath), env: options.env, configPath });
}

/**
 * Validate an already-parsed config object.
 */
export function parseConfig(
  input: unknown,
  options: { baseDir: string; env?: NodeJS.ProcessEnv; configPath?: string | null }
): PipelineConfig {
  if (!isRecord(input)) {
    throw new ConfigError('Config must be a JSON object');
  }

  const withEnv = applyEnvOverrides({ ...input }, options.env ?? process.env);
  const result = configSchema.safeParse(withEnv);
  if (!result.success) {
    throw new ConfigError('Invalid configuration', formatIssues(result.error));
  }

  return {
    ...resolvePaths(result.data, options.baseDir),
    configPath: options.configPath ?? null,
  };
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

// ============================================================================
// Helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  if (env.FRAGMENT_PIPELINE_INPUT_DIR) {
    config.inputDir = env.FRAGMENT_PIPELINE_INPUT_DIR;
  }
  if (env.FRAGMENT_PIPELINE_CONCURRENCY) {
    // Non-numeric values become NaN and are reported by the schema
    config.concurrency = Number(env.FRAGMENT_PIPELINE_CONCURRENCY);
  }
  if (env.FRAGMENT_PIPELINE_LOG_LEVEL) {
    config.logLevel = env.FRAGMENT_PIPELINE_LOG_LEVEL;
  }
  return config;
}

type ValidatedConfig = z.output<typeof configSchema>;

function resolvePaths(config: ValidatedConfig, baseDir: string): ValidatedConfig {
  const at = (p: string) => (isAbsolute(p) ? p : resolve(baseDir, p));

  const model = config.model;
  let resolvedModel = model;
  if (model.kind === 'whisper-cpp') {
    resolvedModel = {
      ...model,
      modelPath: at(model.modelPath),
      // A bare command name is looked up on PATH, not resolved
      binaryPath: model.binaryPath && /[\\/]/.test(model.binaryPath) ? at(model.binaryPath) : model.binaryPath,
    };
  }

  return {
    ...config,
    inputDir: at(config.inputDir),
    processedDir: at(config.processedDir),
    failedDir: at(config.failedDir),
    archiveDir: at(config.archiveDir),
    logsDir: at(config.logsDir),
    model: resolvedModel,
  };
}
