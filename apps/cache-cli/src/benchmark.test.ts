import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  benchmarkGet,
  benchmarkMixed,
  benchmarkSet,
  benchmarkTtlExpiration,
  formatSummaryLine,
  runBenchmarks,
} from './benchmark.js';
import type { BenchmarkConfig } from './config.js';
import { createLogger } from './logger.js';
import { createRecordingSink, createSteppingTimer } from './test/mocks.js';

const SMALL_CONFIG: BenchmarkConfig = {
  cacheSize: 20,
  operations: 100,
  targetOpsPerSecond: 5000,
};

describe('benchmarks', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('benchmarkSet', () => {
    it('reports operations per second from the measured duration', () => {
      const result = benchmarkSet(SMALL_CONFIG, createSteppingTimer(10));

      expect(result).toEqual({
        name: 'set',
        operations: 100,
        durationMs: 10,
        opsPerSecond: 10000,
      });
    });
  });

  describe('benchmarkGet', () => {
    it('times the configured number of gets', () => {
      const result = benchmarkGet(SMALL_CONFIG, createSteppingTimer(50));

      expect(result.name).toBe('get');
      expect(result.operations).toBe(100);
      expect(result.opsPerSecond).toBe(2000);
    });
  });

  describe('benchmarkMixed', () => {
    it('times the configured number of mixed operations', () => {
      const result = benchmarkMixed(SMALL_CONFIG, createSteppingTimer(25));

      expect(result.name).toBe('mixed');
      expect(result.operations).toBe(100);
      expect(result.opsPerSecond).toBe(4000);
    });
  });

  describe('benchmarkTtlExpiration', () => {
    it('runs a fifth of the operations on a tenth of the capacity and hits while the clock stays put', () => {
      const { result, stats } = benchmarkTtlExpiration(SMALL_CONFIG, createSteppingTimer(10));

      expect(result.operations).toBe(20);
      expect(result.opsPerSecond).toBe(2000);
      expect(stats.maxSize).toBe(2);
      expect(stats.size).toBe(2);
      expect(stats.hits).toBe(20);
      expect(stats.evictions).toBe(0);
    });

    describe('given a capacity below ten', () => {
      it('still uses a cache of one entry', () => {
        const { stats } = benchmarkTtlExpiration(
          { cacheSize: 5, operations: 3, targetOpsPerSecond: 1 },
          createSteppingTimer(1)
        );

        expect(stats.maxSize).toBe(1);
        expect(stats.hits).toBe(1);
      });
    });

    describe('given a clock that passes the TTL between set and get', () => {
      it('expires every entry before it is read', () => {
        const { result, stats } = benchmarkTtlExpiration(
          SMALL_CONFIG,
          createSteppingTimer(10),
          createSteppingTimer(2)
        );

        expect(result.operations).toBe(20);
        expect(stats).toEqual({
          hits: 0,
          misses: 20,
          evictions: 0,
          expirations: 20,
          hitRate: '0.00%',
          size: 0,
          maxSize: 2,
        });
      });
    });
  });

  describe('given a timer that does not move', () => {
    it('reports an infinite rate', () => {
      const result = benchmarkSet(SMALL_CONFIG, () => 0);

      expect(result.durationMs).toBe(0);
      expect(result.opsPerSecond).toBe(Number.POSITIVE_INFINITY);
    });
  });
});

describe('formatSummaryLine', () => {
  it('pads the label and the rate and marks a pass', () => {
    expect(formatSummaryLine('set', 10000, 5000)).toBe('SET       :     10,000 ops/sec PASS');
  });

  it('marks a rate below the target as a failure', () => {
    expect(formatSummaryLine('ttl', 2000, 5000)).toBe('TTL       :      2,000 ops/sec FAIL');
  });

  it('describes an infinite rate as unmeasurable', () => {
    expect(formatSummaryLine('get', Number.POSITIVE_INFINITY, 1)).toBe(
      'GET       : unmeasurable ops/sec PASS'
    );
  });
});

describe('runBenchmarks', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs every benchmark in order and averages the rates', () => {
    const sink = createRecordingSink();

    const summary = runBenchmarks(
      SMALL_CONFIG,
      createLogger('benchmark', sink),
      createSteppingTimer(10)
    );

    expect(summary.results.map((result) => result.name)).toEqual(['set', 'get', 'mixed', 'ttl']);
    expect(summary.averageOpsPerSecond).toBe(8000);
    expect(summary.passed).toBe(true);
    expect(summary.ttlStats.hits).toBe(20);
  });

  it('logs a summary line per benchmark and an overall line', () => {
    const sink = createRecordingSink();

    runBenchmarks(SMALL_CONFIG, createLogger('benchmark', sink), createSteppingTimer(10));

    const lines = sink.lines();
    const start = lines.indexOf('[larder:benchmark] SUMMARY');
    expect(lines.slice(start + 1)).toEqual([
      '[larder:benchmark] SET       :     10,000 ops/sec PASS',
      '[larder:benchmark] GET       :     10,000 ops/sec PASS',
      '[larder:benchmark] MIXED     :     10,000 ops/sec PASS',
      '[larder:benchmark] TTL       :      2,000 ops/sec FAIL',
      '[larder:benchmark] OVERALL   :      8,000 ops/sec PASS',
    ]);
  });

  describe('given a target above the average', () => {
    it('reports the run as failed', () => {
      const sink = createRecordingSink();

      const summary = runBenchmarks(
        { ...SMALL_CONFIG, targetOpsPerSecond: 9000 },
        createLogger('benchmark', sink),
        createSteppingTimer(10)
      );

      expect(summary.passed).toBe(false);
    });
  });
});
