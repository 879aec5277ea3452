import { spawn as spawnDefault } from 'node:child_process';

export interface ProcessKillTarget {
  pid?: number | null;
  kill: (signal?: NodeJS.Signals) => boolean;
}

type TaskKillSpawnResult = {
  unref: () => void;
  once: (event: 'error', listener: () => void) => unknown;
};

type TaskKillSpawn = (
  command: string,
  args: readonly string[],
  options: { stdio: 'ignore'; windowsHide: true },
) => TaskKillSpawnResult;

export interface TerminateProcessOptions {
  platform?: NodeJS.Platform;
  /** The child leads its own process group (spawned with `detached: true`). */
  processGroup?: boolean;
  spawnImpl?: TaskKillSpawn;
  killImpl?: (pid: number, signal: NodeJS.Signals) => void;
}

/**
 * Terminates a worker and whatever it spawned.
 * - POSIX workers spawned as group leaders get the signal on the whole group (`kill(-pid)`),
 *   falling back to the child alone when the group is already gone.
 * - On Windows, SIGKILL also runs `taskkill /T /F` so the tree goes with it.
 *
 * Returns false when no signal could be delivered (the process has already exited).
 */
export function terminateProcessTree(
  proc: ProcessKillTarget,
  signal: NodeJS.Signals,
  options: TerminateProcessOptions = {},
): boolean {
  const platform = options.platform ?? process.platform;
  const pid = proc.pid && proc.pid > 0 ? proc.pid : null;

  if (platform === 'win32') {
    let delivered = safeKill(proc, signal);
    if (signal === 'SIGKILL' && pid !== null) {
      const spawnImpl: TaskKillSpawn =
        options.spawnImpl ?? ((command, args, spawnOptions) => spawnDefault(command, args, spawnOptions));
      try {
        const killer = spawnImpl('taskkill', ['/PID', String(pid), '/T', '/F'], { stdio: 'ignore', windowsHide: true });
        killer.unref();
        killer.once('error', () => void 0);
        delivered = true;
      } catch {
        // taskkill unavailable; proc.kill above is all we can do
      }
    }
    return delivered;
  }

  if (options.processGroup && pid !== null) {
    const killImpl = options.killImpl ?? ((target: number, sig: NodeJS.Signals) => process.kill(target, sig));
    try {
      killImpl(-pid, signal);
      return true;
    } catch {
      // ESRCH: group already gone, try the child directly
    }
  }
  return safeKill(proc, signal);
}

function safeKill(proc: ProcessKillTarget, signal: NodeJS.Signals): boolean {
  try {
    return proc.kill(signal);
  } catch {
    return false;
  }
}
