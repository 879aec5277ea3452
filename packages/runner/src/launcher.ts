import { spawn as spawnDefault, type ChildProcess } from 'node:child_process';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { StringDecoder } from 'node:string_decoder';

import type { JobSpec } from '@fixloop/core';

import { terminateProcessTree } from './processTermination.js';

/** How a worker process ended. `error` is set when the process could not be started at all. */
export type ProcessExit = Readonly<{
  exitCode: number;
  signal: NodeJS.Signals | null;
  error?: string;
}>;

/** A launched external worker, observed by polling. */
export interface WorkerProcess {
  readonly pid: number | null;
  /** Exit details once the process has exited and its output is flushed; null while running. */
  poll(): ProcessExit | null;
  /** Output captured so far (stdout and stderr interleaved, tail-capped). */
  output(): string;
  terminate(signal: NodeJS.Signals): void;
}

export interface ProcessLauncher {
  /** Starts one worker. Throws synchronously when the process cannot be spawned. */
  launch(spec: JobSpec): WorkerProcess;
}

export type SpawnLauncherOptions = Readonly<{
  command: string;
  /** Argument template; see {@link expandArgs} for placeholders. */
  args: readonly string[];
  contextDirFlag?: string;
  contextDirs?: readonly string[];
  model?: string;
  env?: Readonly<Record<string, string>>;
  maxCapturedChars?: number;
  spawn?: typeof spawnDefault;
  platform?: NodeJS.Platform;
}>;

const DEFAULT_MAX_CAPTURED_CHARS = 64_000;

export function exitCodeFromExitEvent(code: number | null, signal: NodeJS.Signals | null): number {
  if (typeof code === 'number') return code;
  if (signal) {
    const signals = os.constants.signals as unknown as Record<string, number | undefined>;
    const n = signals[signal];
    if (typeof n === 'number') return 128 + n;
    return 1;
  }
  return 0;
}

export type ArgVars = Readonly<{
  payload_file: string;
  model: string;
  log_path: string;
  log_dir: string;
  work_dir: string;
  label: string;
}>;

/**
 * Expands `{payload_file}`, `{model}`, `{log_path}`, `{log_dir}`, `{work_dir}` and `{label}`
 * inside each argument. Unknown placeholders are left untouched.
 */
export function expandArgs(template: readonly string[], vars: ArgVars): string[] {
  return template.map((arg) =>
    arg.replace(/\{([a-z_]+)\}/g, (whole, name: string) => {
      switch (name) {
        case 'payload_file':
        case 'model':
        case 'log_path':
        case 'log_dir':
        case 'work_dir':
        case 'label':
          return vars[name];
        default:
          return whole;
      }
    }),
  );
}

export function payloadPathForLog(logPath: string): string {
  const base = logPath.endsWith('.log') ? logPath.slice(0, -'.log'.length) : logPath;
  return `${base}.payload.md`;
}

/** Launches workers as local child processes, tee-ing their output into the job's log file. */
export class SpawnLauncher implements ProcessLauncher {
  private readonly options: SpawnLauncherOptions;
  private readonly spawn: typeof spawnDefault;
  private readonly platform: NodeJS.Platform;

  constructor(options: SpawnLauncherOptions) {
    this.options = options;
    this.spawn = options.spawn ?? spawnDefault;
    this.platform = options.platform ?? process.platform;
  }

  buildArgs(spec: JobSpec, payloadFile: string): string[] {
    const args = expandArgs(this.options.args, {
      payload_file: payloadFile,
      model: this.options.model ?? 'default',
      log_path: spec.logPath,
      log_dir: path.dirname(spec.logPath),
      work_dir: spec.workingDirectory,
      label: spec.label,
    });
    const flag = this.options.contextDirFlag;
    if (flag) {
      const dirs = [...new Set([...(this.options.contextDirs ?? []), ...spec.extraContext])];
      for (const dir of dirs) args.push(flag, dir);
    }
    return args;
  }

  launch(spec: JobSpec): WorkerProcess {
    fs.mkdirSync(path.dirname(spec.logPath), { recursive: true });
    const payloadFile = payloadPathForLog(spec.logPath);
    fs.writeFileSync(payloadFile, spec.payload, 'utf-8');

    const detached = this.platform !== 'win32';
    const proc = this.spawn(this.options.command, this.buildArgs(spec, payloadFile), {
      cwd: spec.workingDirectory,
      stdio: ['ignore', 'pipe', 'pipe'],
      env: {
        ...process.env,
        ...this.options.env,
        FIXLOOP_LABEL: spec.label,
        FIXLOOP_LOG_PATH: spec.logPath,
        FIXLOOP_MODEL: this.options.model ?? 'default',
      },
      detached,
      windowsHide: true,
    });

    return new SpawnedWorker(proc, spec.logPath, {
      detached,
      platform: this.platform,
      maxCapturedChars: this.options.maxCapturedChars ?? DEFAULT_MAX_CAPTURED_CHARS,
    });
  }
}

class SpawnedWorker implements WorkerProcess {
  readonly pid: number | null;
  private readonly proc: ChildProcess;
  private readonly detached: boolean;
  private readonly platform: NodeJS.Platform;
  private readonly maxCapturedChars: number;
  private captured = '';
  private exit: ProcessExit | null = null;
  private logClosed = false;

  constructor(
    proc: ChildProcess,
    logPath: string,
    options: { detached: boolean; platform: NodeJS.Platform; maxCapturedChars: number },
  ) {
    this.proc = proc;
    this.pid = proc.pid ?? null;
    this.detached = options.detached;
    this.platform = options.platform;
    this.maxCapturedChars = options.maxCapturedChars;

    const log = fs.createWriteStream(logPath, { flags: 'a' });
    log.once('close', () => {
      this.logClosed = true;
    });
    log.on('error', () => {
      this.logClosed = true;
    });

    const append = (text: string): void => {
      if (!text) return;
      this.captured += text;
      if (this.captured.length > this.maxCapturedChars) {
        this.captured = this.captured.slice(this.captured.length - this.maxCapturedChars);
      }
    };
    // One decoder per stream: a multi-byte character may be split across chunks.
    const decoders: StringDecoder[] = [];
    const tee = (stream: NodeJS.ReadableStream | null): void => {
      if (!stream) return;
      const decoder = new StringDecoder('utf8');
      decoders.push(decoder);
      stream.on('data', (chunk: Buffer | string) => {
        log.write(chunk);
        append(typeof chunk === 'string' ? chunk : decoder.write(chunk));
      });
    };
    tee(proc.stdout);
    tee(proc.stderr);
    const flush = (): void => {
      for (const decoder of decoders) append(decoder.end());
    };

    proc.once('error', (err) => {
      // Spawn failures (ENOENT, EACCES) surface here; 'close' may or may not follow.
      if (this.exit) return;
      if (this.pid === null) {
        this.exit = { exitCode: -1, signal: null, error: err.message };
        log.end();
      }
    });
    proc.once('close', (code, signal) => {
      if (!this.exit) this.exit = { exitCode: exitCodeFromExitEvent(code, signal), signal };
      flush();
      log.end();
    });
  }

  poll(): ProcessExit | null {
    if (!this.exit || !this.logClosed) return null;
    return this.exit;
  }

  output(): string {
    return this.captured;
  }

  terminate(signal: NodeJS.Signals): void {
    if (this.exit) return;
    terminateProcessTree(this.proc, signal, { platform: this.platform, processGroup: this.detached });
  }
}
