// datelex/profiling - Performance instrumentation
// Enable with: DATELEX_PROFILE=1 or DATELEX_PROFILE=true

import { performance } from 'node:perf_hooks';

const ENABLE_PROFILING = process.env.DATELEX_PROFILE === '1' || process.env.DATELEX_PROFILE === 'true';

export const PERF_COUNTERS = {
  simplify: { calls: 0, time: 0 },
  split: { calls: 0, time: 0 },
  translate: { calls: 0, time: 0 },
  translateSearch: { calls: 0, time: 0 },
  isApplicable: { calls: 0, time: 0 },
  compilePattern: { calls: 0, time: 0 },
  buildDictionary: { calls: 0, time: 0 },
  buildSplitRegex: { calls: 0, time: 0 },
};

export type PerfCounter = keyof typeof PERF_COUNTERS;

// Inline profiling helper - no-op when profiling disabled
export function startTimer(counter: PerfCounter): () => void {
  if (!ENABLE_PROFILING) return () => {};

  const start = performance.now();
  PERF_COUNTERS[counter].calls++;

  return () => {
    PERF_COUNTERS[counter].time += performance.now() - start;
  };
}

export function time<T>(counter: PerfCounter, fn: () => T): T {
  const stop = startTimer(counter);
  try {
    return fn();
  } finally {
    stop();
  }
}

export function resetPerfCounters() {
  for (const stats of Object.values(PERF_COUNTERS)) {
    stats.calls = 0;
    stats.time = 0;
  }
}

export function printPerfCountersAndReset() {
  if (!ENABLE_PROFILING) return;

  console.log('\n' + '='.repeat(80));
  console.log('PERFORMANCE COUNTERS');
  console.log('='.repeat(80));

  const sorted = Object.entries(PERF_COUNTERS)
    .filter(([_, stats]) => stats.calls > 0)
    .sort((a, b) => b[1].time - a[1].time);

  for (const [name, stats] of sorted) {
    const avg = stats.time / stats.calls;
    console.log(`${name.padEnd(25)} ${stats.calls.toString().padEnd(8)} calls  ${stats.time.toFixed(2).padStart(10)}ms total  ${avg.toFixed(3).padStart(8)}ms avg`);
  }
  console.log('='.repeat(80) + '\n');

  resetPerfCounters();
}

export function isProfilingEnabled(): boolean {
  return ENABLE_PROFILING;
}
