/**
 * Background work tracker
 *
 * Long-running tool work (e.g. `bash` with run_in_background) is registered
 * here under a short id (b1, b2, ...). Stopping is cooperative: `stop` only
 * flags the unit, and the code doing the work polls `isStopped`.
 */

export type BackgroundStatus = 'running' | 'completed' | 'failed' | 'stopped';

export interface BackgroundUnit {
  id: string;
  description: string;
  status: BackgroundStatus;
  output: string;
  exitCode: number | null;
  startedAt: number;
  finishedAt?: number;
}

export interface BackgroundRunResult {
  output: string;
  exitCode: number;
}

export type BackgroundWork = (isStopped: () => boolean) => Promise<BackgroundRunResult>;

interface TrackedUnit {
  unit: BackgroundUnit;
  settled: Promise<void>;
}

export class BackgroundTracker {
  private readonly units = new Map<string, TrackedUnit>();
  private counter = 0;

  constructor(private readonly prefix = 'b') {}

  /** Register and start a unit of work; returns immediately */
  start(description: string, work: BackgroundWork): BackgroundUnit {
    const id = `${this.prefix}${++this.counter}`;
    const unit: BackgroundUnit = {
      id,
      description,
      status: 'running',
      output: '',
      exitCode: null,
      startedAt: Date.now(),
    };

    const settled = work(() => unit.status === 'stopped').then(
      (result) => {
        unit.output = result.output;
        unit.exitCode = result.exitCode;
        if (unit.status === 'running') {
          unit.status = result.exitCode === 0 ? 'completed' : 'failed';
        }
        unit.finishedAt = Date.now();
      },
      (error: unknown) => {
        unit.output = error instanceof Error ? error.message : String(error);
        unit.exitCode = -1;
        if (unit.status === 'running') {
          unit.status = 'failed';
        }
        unit.finishedAt = Date.now();
      }
    );

    this.units.set(id, { unit, settled });
    return { ...unit };
  }

  get(id: string): BackgroundUnit | undefined {
    const tracked = this.units.get(id);
    return tracked ? { ...tracked.unit } : undefined;
  }

  list(): BackgroundUnit[] {
    return Array.from(this.units.values(), (tracked) => ({ ...tracked.unit }));
  }

  /**
   * Flag a running unit as stopped. Returns the unit, or undefined when the id
   * is unknown. Units that already finished keep their final status.
   */
  stop(id: string): BackgroundUnit | undefined {
    const tracked = this.units.get(id);
    if (!tracked) return undefined;
    if (tracked.unit.status === 'running') {
      tracked.unit.status = 'stopped';
    }
    return { ...tracked.unit };
  }

  /** Wait until the unit's work settles or `timeoutMs` elapses */
  async wait(id: string, timeoutMs: number): Promise<BackgroundUnit | undefined> {
    const tracked = this.units.get(id);
    if (!tracked) return undefined;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, timeoutMs);
    });
    try {
      await Promise.race([tracked.settled, timeout]);
    } finally {
      clearTimeout(timer);
    }
    return { ...tracked.unit };
  }

  /** Settles once every unit's work has returned */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.units.values(), (tracked) => tracked.settled));
  }
}
