import fs from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';
import { parse as parseYaml } from 'yaml';

/** One schedulable unit of work, loaded once from the manifest and never mutated. */
export type TaskDescriptor = Readonly<{
  identity: string;
  sourceLocation: string;
  category: string;
  /** Identity the task had before any renaming; used to map harness failures back to tasks. */
  originalIdentity: string;
}>;

export type ManifestErrorCode = 'INVALID_FORMAT' | 'DUPLICATE_ID' | 'INVALID_ID' | 'NOT_FOUND';

export class ManifestError extends Error {
  constructor(
    message: string,
    public readonly code: ManifestErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ManifestError';
  }
}

const rawTaskSchema = z
  .object({
    identity: z.string().min(1).optional(),
    source: z.string().min(1),
    category: z.string().min(1).optional().default('uncategorized'),
    original_identity: z.string().min(1).optional(),
  })
  .passthrough();

const rawManifestSchema = z
  .object({
    tasks: z.record(z.string(), rawTaskSchema),
  })
  .passthrough();

function validateIdentity(identity: string, key: string): void {
  const trimmed = identity.trim();
  if (!trimmed || trimmed !== identity) {
    throw new ManifestError(`Task '${key}': identity must be non-empty without surrounding whitespace`, 'INVALID_ID', {
      key,
      identity,
    });
  }
  if (identity === '.' || identity === '..') {
    throw new ManifestError(`Task '${key}': identity '${identity}' is reserved`, 'INVALID_ID', { key, identity });
  }
  if (identity.startsWith('_')) {
    // `_harness`, `_analysis` and `_validation` name the queue-wide jobs
    throw new ManifestError(`Task '${key}': identities starting with '_' are reserved`, 'INVALID_ID', { key, identity });
  }
}

function formatZodIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

/**
 * Normalizes a parsed manifest object into frozen task descriptors, in file order.
 *
 * @throws ManifestError with code INVALID_FORMAT, INVALID_ID or DUPLICATE_ID
 */
export function parseManifestObject(raw: unknown, sourceName = 'manifest'): readonly TaskDescriptor[] {
  const parsed = rawManifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ManifestError(`${sourceName}: ${formatZodIssues(parsed.error)}`, 'INVALID_FORMAT');
  }

  // Keyed case-folded: artifact and log file names are derived from the identity, and some
  // filesystems ignore case.
  const seen = new Map<string, { key: string; identity: string }>();
  const tasks: TaskDescriptor[] = [];
  for (const [key, entry] of Object.entries(parsed.data.tasks)) {
    const identity = entry.identity ?? key;
    validateIdentity(identity, key);

    const folded = identity.toLowerCase();
    const first = seen.get(folded);
    if (first !== undefined) {
      const message =
        first.identity === identity
          ? `duplicate task identity '${identity}'`
          : `task identity '${identity}' differs from '${first.identity}' only by case`;
      throw new ManifestError(`${sourceName}: ${message} (entries '${first.key}' and '${key}')`, 'DUPLICATE_ID', {
        identity,
        firstKey: first.key,
        secondKey: key,
        ...(first.identity !== identity ? { firstIdentity: first.identity } : {}),
      });
    }
    seen.set(folded, { key, identity });

    tasks.push(
      Object.freeze({
        identity,
        sourceLocation: entry.source,
        category: entry.category,
        originalIdentity: entry.original_identity ?? identity,
      }),
    );
  }

  return Object.freeze(tasks);
}

export function parseManifestText(text: string, sourceName: string): readonly TaskDescriptor[] {
  const ext = path.extname(sourceName).toLowerCase();
  let raw: unknown;
  try {
    raw = ext === '.yaml' || ext === '.yml' ? parseYaml(text) : JSON.parse(text);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ManifestError(`${sourceName}: unreadable manifest (${msg})`, 'INVALID_FORMAT');
  }
  return parseManifestObject(raw, sourceName);
}

export async function loadManifest(manifestPath: string): Promise<readonly TaskDescriptor[]> {
  const resolved = path.resolve(manifestPath);
  let text: string;
  try {
    text = await fs.readFile(resolved, 'utf-8');
  } catch {
    throw new ManifestError(`Manifest not found: ${resolved}`, 'NOT_FOUND', { path: resolved });
  }
  return parseManifestText(text, resolved);
}

export function groupByCategory(tasks: readonly TaskDescriptor[]): Map<string, TaskDescriptor[]> {
  const groups = new Map<string, TaskDescriptor[]>();
  for (const task of tasks) {
    const list = groups.get(task.category);
    if (list) list.push(task);
    else groups.set(task.category, [task]);
  }
  return groups;
}
