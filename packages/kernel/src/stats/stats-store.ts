/**
 * Keel Kernel — Measurement Store
 *
 * Append-only store of timing samples keyed by work-unit identity (a file
 * path for parses, a node name for compilations). Appends are synchronous,
 * so concurrent async callers on one event loop cannot lose updates.
 *
 * measure() is a pure observability side channel: it never changes the
 * outcome of the action it wraps.
 */

/** Milliseconds from an arbitrary origin. */
export type Clock = () => number;

export interface Sample {
  readonly key: string;
  readonly start: number;
  readonly end: number;
}

export interface SampleSummary {
  readonly count: number;
  readonly total: number;
  readonly min: number;
  readonly max: number;
  readonly mean: number;
}

export class StatsStore {
  private readonly entries: Sample[] = [];

  constructor(
    readonly name: string,
    readonly clock: Clock = () => performance.now(),
  ) {}

  append(sample: Sample): void {
    this.entries.push(sample);
  }

  samples(): ReadonlyArray<Sample> {
    return [...this.entries];
  }

  /** Per-key duration summary, keys in first-seen order. */
  summary(): ReadonlyMap<string, SampleSummary> {
    const durations = new Map<string, number[]>();
    for (const sample of this.entries) {
      const list = durations.get(sample.key) ?? [];
      list.push(sample.end - sample.start);
      durations.set(sample.key, list);
    }
    const result = new Map<string, SampleSummary>();
    for (const [key, list] of durations) {
      const total = list.reduce((a, b) => a + b, 0);
      result.set(key, {
        count: list.length,
        total,
        min: Math.min(...list),
        max: Math.max(...list),
        mean: total / list.length,
      });
    }
    return result;
  }
}

/**
 * Run `action` and record its elapsed time under `key`, whether it resolves
 * or throws. The action's outcome is returned or rethrown unchanged.
 */
export async function measure<T>(store: StatsStore, key: string, action: () => Promise<T>): Promise<T> {
  const start = store.clock();
  try {
    return await action();
  } finally {
    store.append({ key, start, end: store.clock() });
  }
}

/** The three stores a compiler exposes. */
export interface CompilerStats {
  readonly parsing: StatsStore;
  readonly catalog: StatsStore;
  readonly templates: StatsStore;
}

export function createCompilerStats(clock?: Clock): CompilerStats {
  return {
    parsing: new StatsStore('parsing', clock),
    catalog: new StatsStore('catalog', clock),
    templates: new StatsStore('templates', clock),
  };
}
