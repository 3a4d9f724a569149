/* src/runner/util/trace.ts
 * Opt-in turn timing trace. Emits to stderr only when AGENT_CONSOLE_TRACE=1,
 * otherwise no-ops.
 */

type Dict = Record<string, unknown>;

const enabled = (): boolean => process.env.AGENT_CONSOLE_TRACE === '1';

const emit = (area: string, label: string, payload?: Dict): void => {
  if (!enabled()) return;
  if (payload && Object.keys(payload).length > 0) {
    console.error(`[agent-console:trace:${area}] ${label}`, payload);
  } else {
    console.error(`[agent-console:trace:${area}] ${label}`);
  }
};

/** Format milliseconds as `1h 02m 03.456s`, `2m 03.456s` or `3.456s`. */
export const formatDuration = (ms: number): string => {
  const totalSeconds = Math.max(0, ms) / 1000;
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = (totalSeconds % 60).toFixed(3);
  const pad = (s: string, n: number) => s.padStart(n, '0');
  if (hours > 0)
    return `${String(hours)}h ${pad(String(minutes), 2)}m ${pad(seconds, 6)}s`;
  if (minutes > 0) return `${String(minutes)}m ${pad(seconds, 6)}s`;
  return `${seconds}s`;
};

/** Restartable stopwatch; `lap()` returns elapsed ms and restarts. */
export class Stopwatch {
  private startedAt: number;

  constructor(private readonly now: () => number = () => performance.now()) {
    this.startedAt = this.now();
  }

  public elapsed(): number {
    return this.now() - this.startedAt;
  }

  public restart(): void {
    this.startedAt = this.now();
  }

  public lap(): number {
    const e = this.elapsed();
    this.restart();
    return e;
  }
}

export const turnTrace = {
  turn(area: 'interactive' | 'batch' | 'printer', elapsedMs: number) {
    emit(area, `message loop duration: ${formatDuration(elapsedMs)}`);
  },
  session: {
    mode(mode: string, payload?: Dict) {
      emit('session', `mode: ${mode}`, payload);
    },
    stopping() {
      emit('session', 'stopping');
    },
  },
};
