import fs from 'node:fs/promises';
import path from 'node:path';

export type AppendLog = (line: string) => Promise<void>;

export type RunLogOptions = Readonly<{
  /** Extra sink for every line (the CLI echoes to stderr). */
  echo?: (line: string) => void;
}>;

/**
 * Append-only run log. Lines are written in call order; the file and its
 * directory are created on first use.
 */
export function createRunLog(logPath: string, options: RunLogOptions = {}): AppendLog {
  let chain: Promise<void> = Promise.resolve();
  let ensured = false;

  return (line: string): Promise<void> => {
    options.echo?.(line);
    const next = chain.then(async () => {
      if (!ensured) {
        await fs.mkdir(path.dirname(logPath), { recursive: true });
        ensured = true;
      }
      await fs.appendFile(logPath, `${line}\n`, 'utf-8');
    });
    // the caller sees the failure; later lines still get written
    chain = next.catch(() => undefined);
    return next;
  };
}

