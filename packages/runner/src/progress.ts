import fs from 'node:fs/promises';
import path from 'node:path';

import { appendProgressEvent } from '@fixloop/state-db';

function nowIso(): string {
  return new Date().toISOString();
}

export type ProgressTarget = Readonly<{
  progressPath: string;
  runId: string;
  /** Run history database; progress lines are mirrored there as events. */
  dbPath?: string;
}>;

export async function ensureProgressFile(progressPath: string): Promise<void> {
  await fs.mkdir(path.dirname(progressPath), { recursive: true });
  const exists = await fs
    .stat(progressPath)
    .then(() => true)
    .catch(() => false);
  if (!exists) {
    await fs.writeFile(progressPath, '', 'utf-8');
  }
}

export async function appendProgress(target: ProgressTarget, line: string): Promise<void> {
  await ensureProgressFile(target.progressPath);
  await fs.appendFile(target.progressPath, `${line}\n`, 'utf-8');
  if (!target.dbPath) return;
  const trimmed = line.trim();
  appendProgressEvent(target.dbPath, {
    runId: target.runId,
    source: 'loop',
    phase: trimmed.startsWith('Phase: ') ? trimmed.slice('Phase: '.length).split(' ')[0] ?? null : null,
    message: line,
  });
}

export async function markStarted(target: ProgressTarget): Promise<void> {
  await appendProgress(target, `Started: ${nowIso()} Run: ${target.runId}`);
}

export async function markPhase(target: ProgressTarget, phase: string, iteration: number): Promise<void> {
  await appendProgress(target, `Phase: ${phase} (iteration ${iteration})`);
}

export async function markEnded(target: ProgressTarget, outcome: string): Promise<void> {
  await appendProgress(target, `Ended: ${nowIso()} Outcome: ${outcome}`);
}
