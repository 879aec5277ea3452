import type { JobSpec } from '@fixloop/core';

import type { ProcessExit, ProcessLauncher, WorkerProcess } from './launcher.js';

export type FakeJobBehavior = Readonly<{
  exitCode?: number;
  /** Number of polls before the process reports its exit (default 1: exits on the first poll). */
  polls?: number;
  /** Never exits on its own; only a terminate() ends it. */
  hang?: boolean;
  output?: string;
  /** Makes launch() throw with this message. */
  launchError?: string;
  /** Runs at launch, e.g. to write the artifact a real worker would produce. */
  onLaunch?: (spec: JobSpec) => void;
}>;

const SIGNAL_EXIT_CODES: Partial<Record<NodeJS.Signals, number>> = { SIGTERM: 143, SIGKILL: 137, SIGINT: 130 };

export class FakeWorkerProcess implements WorkerProcess {
  readonly pid = null;
  readonly signals: NodeJS.Signals[] = [];
  private polls = 0;

  constructor(private readonly behavior: FakeJobBehavior) {}

  poll(): ProcessExit | null {
    this.polls += 1;
    const signal = this.signals.at(-1);
    if (signal) return { exitCode: SIGNAL_EXIT_CODES[signal] ?? 1, signal };
    if (this.behavior.hang) return null;
    if (this.polls < (this.behavior.polls ?? 1)) return null;
    return { exitCode: this.behavior.exitCode ?? 0, signal: null };
  }

  output(): string {
    return this.behavior.output ?? '';
  }

  terminate(signal: NodeJS.Signals): void {
    this.signals.push(signal);
  }
}

/**
 * In-process launcher for tests and dry runs. Every launch is recorded; behavior is chosen per spec.
 */
export class FakeLauncher implements ProcessLauncher {
  readonly launched: JobSpec[] = [];
  readonly processes: FakeWorkerProcess[] = [];

  constructor(private readonly behave: (spec: JobSpec) => FakeJobBehavior = () => ({})) {}

  launch(spec: JobSpec): WorkerProcess {
    this.launched.push(spec);
    const behavior = this.behave(spec);
    if (behavior.launchError !== undefined) throw new Error(behavior.launchError);
    behavior.onLaunch?.(spec);
    const proc = new FakeWorkerProcess(behavior);
    this.processes.push(proc);
    return proc;
  }

  labels(): string[] {
    return this.launched.map((spec) => spec.label);
  }
}
