import fs from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';
import { parse as parseYaml } from 'yaml';

export const DEFAULT_WORKERS = 5;
export const DEFAULT_POLL_INTERVAL_MS = 500;
export const DEFAULT_MAX_ITERATIONS = 3;
export const MAX_WORKERS = 32;

export type WorkerCommandConfig = Readonly<{
  command: string;
  args: readonly string[];
  /** Flag repeated once per context directory, e.g. `--add-dir`. */
  contextDirFlag?: string;
  contextDirs: readonly string[];
  env: Readonly<Record<string, string>>;
}>;

export type ValidationCommandConfig = Readonly<{
  command: string;
  args: readonly string[];
  workDir: string;
  reportPath: string;
  /** File that must exist before the harness can run (a test project, a script). */
  entryPoint?: string;
  timeoutMs: number | null;
  env: Readonly<Record<string, string>>;
}>;

export type LoopConfig = Readonly<{
  manifestPath: string;
  runDir: string;
  workDir: string;
  promptsDir?: string;
  workers: number;
  pollIntervalMs: number;
  jobTimeoutMs: number | null;
  maxIterations: number;
  model: string;
  worker: WorkerCommandConfig;
  validation: ValidationCommandConfig;
}>;

export type ConfigErrorCode = 'NOT_FOUND' | 'INVALID_FORMAT' | 'INVALID_VALUE';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

const envSchema = z.record(z.string(), z.string()).optional().default({});

const rawConfigSchema = z
  .object({
    manifest: z.string().min(1),
    run_dir: z.string().min(1).optional().default('.fixloop'),
    work_dir: z.string().min(1).optional().default('.'),
    prompts_dir: z.string().min(1).optional(),
    workers: z.number().int().optional().default(DEFAULT_WORKERS),
    poll_interval_ms: z.number().int().positive().optional().default(DEFAULT_POLL_INTERVAL_MS),
    job_timeout_sec: z.number().positive().nullable().optional().default(null),
    max_iterations: z.number().int().optional().default(DEFAULT_MAX_ITERATIONS),
    model: z.string().min(1).optional().default('default'),
    worker: z
      .object({
        command: z.string().min(1),
        args: z.array(z.string()).optional().default([]),
        context_dir_flag: z.string().min(1).optional(),
        context_dirs: z.array(z.string().min(1)).optional().default([]),
        env: envSchema,
      })
      .passthrough(),
    validation: z
      .object({
        command: z.string().min(1),
        args: z.array(z.string()).optional().default([]),
        work_dir: z.string().min(1).optional(),
        report_path: z.string().min(1),
        entry_point: z.string().min(1).optional(),
        timeout_sec: z.number().positive().nullable().optional().default(null),
        env: envSchema,
      })
      .passthrough(),
  })
  .passthrough();

export type ConfigOverrides = Readonly<{
  workers?: number;
  maxIterations?: number;
  model?: string;
  runDir?: string;
  jobTimeoutSec?: number | null;
}>;

export function validateWorkers(value: unknown): number {
  const n = typeof value === 'string' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isInteger(n) || n < 1 || n > MAX_WORKERS) {
    throw new ConfigError(`workers must be an integer between 1 and ${MAX_WORKERS} (got ${String(value)})`, 'INVALID_VALUE', {
      field: 'workers',
      value,
    });
  }
  return n;
}

export function validateMaxIterations(value: unknown): number {
  const n = typeof value === 'string' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isInteger(n) || n < 1) {
    throw new ConfigError(`max_iterations must be a positive integer (got ${String(value)})`, 'INVALID_VALUE', {
      field: 'max_iterations',
      value,
    });
  }
  return n;
}

function secondsToMs(value: number | null): number | null {
  return value === null ? null : Math.round(value * 1000);
}

/**
 * Normalizes a raw config object. Relative paths resolve against `baseDir`
 * (the directory holding the config file).
 */
export function parseConfigObject(raw: unknown, baseDir: string, overrides: ConfigOverrides = {}): LoopConfig {
  const parsed = rawConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid config: ${detail}`, 'INVALID_FORMAT');
  }
  const cfg = parsed.data;
  const resolve = (p: string): string => path.resolve(baseDir, p);
  const workDir = resolve(cfg.work_dir);

  const jobTimeoutMs =
    overrides.jobTimeoutSec !== undefined ? secondsToMs(overrides.jobTimeoutSec) : secondsToMs(cfg.job_timeout_sec);

  return Object.freeze({
    manifestPath: resolve(cfg.manifest),
    runDir: overrides.runDir ? path.resolve(overrides.runDir) : resolve(cfg.run_dir),
    workDir,
    promptsDir: cfg.prompts_dir ? resolve(cfg.prompts_dir) : undefined,
    workers: validateWorkers(overrides.workers ?? cfg.workers),
    pollIntervalMs: cfg.poll_interval_ms,
    jobTimeoutMs,
    maxIterations: validateMaxIterations(overrides.maxIterations ?? cfg.max_iterations),
    model: overrides.model ?? cfg.model,
    worker: Object.freeze({
      command: cfg.worker.command,
      args: Object.freeze([...cfg.worker.args]),
      contextDirFlag: cfg.worker.context_dir_flag,
      contextDirs: Object.freeze(cfg.worker.context_dirs.map(resolve)),
      env: Object.freeze({ ...cfg.worker.env }),
    }),
    validation: Object.freeze({
      command: cfg.validation.command,
      args: Object.freeze([...cfg.validation.args]),
      workDir: cfg.validation.work_dir ? resolve(cfg.validation.work_dir) : workDir,
      reportPath: resolve(cfg.validation.report_path),
      entryPoint: cfg.validation.entry_point ? resolve(cfg.validation.entry_point) : undefined,
      timeoutMs: secondsToMs(cfg.validation.timeout_sec),
      env: Object.freeze({ ...cfg.validation.env }),
    }),
  });
}

export async function loadConfigFromFile(configPath: string, overrides: ConfigOverrides = {}): Promise<LoopConfig> {
  const resolved = path.resolve(configPath);
  let text: string;
  try {
    text = await fs.readFile(resolved, 'utf-8');
  } catch {
    throw new ConfigError(`Config not found: ${resolved}`, 'NOT_FOUND', { path: resolved });
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`${resolved}: invalid YAML (${msg})`, 'INVALID_FORMAT', { path: resolved });
  }
  return parseConfigObject(raw, path.dirname(resolved), overrides);
}

/** Resolves the config path from an explicit flag, FIXLOOP_CONFIG, or `./fixloop.yaml`. */
export function resolveConfigPath(explicit: string | undefined, env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): string {
  if (explicit && explicit.trim()) return path.resolve(cwd, explicit.trim());
  const fromEnv = env.FIXLOOP_CONFIG;
  if (fromEnv && fromEnv.trim()) return path.resolve(cwd, fromEnv.trim());
  return path.resolve(cwd, 'fixloop.yaml');
}
