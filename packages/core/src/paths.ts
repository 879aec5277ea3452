import { randomBytes } from 'node:crypto';
import path from 'node:path';

import type { PhaseName } from './phases.js';

export type RunPaths = Readonly<{
  runDir: string;
  runLog: string;
  progress: string;
  loopState: string;
  reportMarkdown: string;
  reportJson: string;
  historyDb: string;
  plansDir: string;
  checksDir: string;
  harnessDir: string;
  guidanceDir: string;
  logsDir: string;
  validationDir: string;
}>;

const SAFE_SEGMENT_CHAR = /[A-Za-z0-9._-]/;

/**
 * Encodes an identity into a single filesystem path segment.
 *
 * Unsafe characters (and a leading dot) are percent-encoded from their UTF-8 bytes and
 * `%` itself is always encoded, so two distinct identities never map to the same segment.
 */
export function encodePathSegment(identity: string): string {
  if (!identity) throw new Error('Refusing empty path segment');
  let out = '';
  let index = 0;
  for (const ch of identity) {
    const keep = SAFE_SEGMENT_CHAR.test(ch) && !(index === 0 && ch === '.');
    if (keep) {
      out += ch;
    } else {
      for (const byte of Buffer.from(ch, 'utf-8')) {
        out += `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
      }
    }
    index += 1;
  }
  return out;
}

function nowIso(): string {
  return new Date().toISOString();
}

export function makeRunId(pid: number = process.pid): string {
  // 20261018T033802Z-12345.ABC123
  const compact = nowIso().replace(/[-:]/g, '').replace(/\.\d{3}Z$/, 'Z');
  const rand = randomBytes(6).toString('base64url').replace(/[^A-Za-z0-9]/g, 'x');
  return `${compact}-${pid}.${rand}`;
}

export function iterationDirName(iteration: number): string {
  if (!Number.isInteger(iteration) || iteration < 1) {
    throw new Error(`Invalid iteration: ${iteration}`);
  }
  return `iter-${String(iteration).padStart(3, '0')}`;
}

export function getRunPaths(runDir: string): RunPaths {
  const dir = path.resolve(runDir);
  return {
    runDir: dir,
    runLog: path.join(dir, 'run.log'),
    progress: path.join(dir, 'progress.txt'),
    loopState: path.join(dir, 'loop-state.json'),
    reportMarkdown: path.join(dir, 'report.md'),
    reportJson: path.join(dir, 'report.json'),
    historyDb: path.join(dir, 'fixloop.db'),
    plansDir: path.join(dir, 'plans'),
    checksDir: path.join(dir, 'checks'),
    harnessDir: path.join(dir, 'checks', '_harness'),
    guidanceDir: path.join(dir, 'guidance'),
    logsDir: path.join(dir, 'logs'),
    validationDir: path.join(dir, 'validation'),
  };
}

/** Log path keyed by (phase, task identity, iteration). */
export function getJobLogPath(runDir: string, phase: PhaseName, identity: string, iteration: number): string {
  return path.join(getRunPaths(runDir).logsDir, iterationDirName(iteration), phase, `${encodePathSegment(identity)}.log`);
}

export function getPlanPath(runDir: string, identity: string): string {
  return path.join(getRunPaths(runDir).plansDir, `${encodePathSegment(identity)}.md`);
}

export function getCheckPath(runDir: string, identity: string): string {
  return path.join(getRunPaths(runDir).checksDir, `${encodePathSegment(identity)}.md`);
}

export function getGuidancePath(runDir: string, iteration: number): string {
  return path.join(getRunPaths(runDir).guidanceDir, `${iterationDirName(iteration)}.md`);
}

export function getValidationLogPath(runDir: string, iteration: number): string {
  return path.join(getRunPaths(runDir).validationDir, `${iterationDirName(iteration)}.log`);
}
