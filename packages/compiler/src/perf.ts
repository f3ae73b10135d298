const COMPILER_PERF_ENV = "KEEL_COMPILER_PERF";

const readPerfEnv = (): string | undefined => {
  const processValue = (globalThis as {
    process?: { env?: Record<string, string | undefined> };
  }).process;
  return processValue?.env?.[COMPILER_PERF_ENV];
};

export const isCompilerPerfEnabled = (): boolean => {
  const raw = readPerfEnv();
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
};

export type CompilerPerfSummary = {
  label: string;
  success: boolean;
  phasesMs: Readonly<Record<string, number>>;
  counters: Readonly<Record<string, number>>;
  diagnostics: number;
};

/**
 * Counters and phase timings for one compilation. Recording is a no-op unless
 * `KEEL_COMPILER_PERF` was set when the recorder was created.
 */
export type CompilerPerf = {
  enabled: boolean;
  count: (name: string, amount?: number) => void;
  time: <T>(phase: string, run: () => T) => T;
  counters: () => Record<string, number>;
  phases: () => Record<string, number>;
};

const roundMs = (value: number): number =>
  Math.round(value * 1000) / 1000;

const toSortedRecord = (
  entries: ReadonlyMap<string, number>,
  map: (value: number) => number = (value) => value,
): Record<string, number> =>
  Object.fromEntries(
    Array.from(entries.entries())
      .sort(([left], [right]) => left.localeCompare(right))
      .map(([key, value]) => [key, map(value)]),
  );

export const createCompilerPerf = (
  enabled: boolean = isCompilerPerfEnabled(),
): CompilerPerf => {
  const counters = new Map<string, number>();
  const phases = new Map<string, number>();

  const count = (name: string, amount = 1): void => {
    if (!enabled || amount === 0) {
      return;
    }
    counters.set(name, (counters.get(name) ?? 0) + amount);
  };

  const time = <T>(phase: string, run: () => T): T => {
    if (!enabled) {
      return run();
    }
    const start = performance.now();
    try {
      return run();
    } finally {
      phases.set(phase, (phases.get(phase) ?? 0) + performance.now() - start);
    }
  };

  return {
    enabled,
    count,
    time,
    counters: () => toSortedRecord(counters),
    phases: () => toSortedRecord(phases, roundMs),
  };
};

export const reportCompilerPerf = ({
  perf,
  label,
  success,
  diagnostics,
}: {
  perf: CompilerPerf;
  label: string;
  success: boolean;
  diagnostics: number;
}): void => {
  if (!perf.enabled) {
    return;
  }

  const summary: CompilerPerfSummary = {
    label,
    success,
    diagnostics,
    phasesMs: perf.phases(),
    counters: perf.counters(),
  };

  console.error(`[keel:compiler:perf] ${JSON.stringify(summary)}`);
};
