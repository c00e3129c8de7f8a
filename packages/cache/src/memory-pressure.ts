import os from 'node:os';

export type MemoryPressure = 'low' | 'medium' | 'high' | 'critical';

export const PRESSURE_LEVELS: Record<MemoryPressure, number> = {
  low: 0,
  medium: 1,
  high: 2,
  critical: 3,
};

export interface PressureThresholds {
  medium: number;
  high: number;
  critical: number;
}

export const DEFAULT_PRESSURE_THRESHOLDS: PressureThresholds = {
  medium: 0.7,
  high: 0.85,
  critical: 0.95,
};

/** Reports memory in use as a ratio in [0, 1]. */
export interface MemoryProbe {
  readonly source: string;
  sample(): number;
}

const clampRatio = (value: number): number => {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
};

export function hostMemoryProbe(): MemoryProbe {
  return {
    source: 'host',
    sample: () => {
      const total = os.totalmem();
      return total > 0 ? clampRatio(1 - os.freemem() / total) : 0;
    },
  };
}

/**
 * RSS against a fixed allowance. Suits containers where the host figures say
 * little about the memory this process may actually use.
 */
export function processMemoryProbe(limitBytes: number): MemoryProbe {
  return {
    source: 'process',
    sample: () => {
      const usage = process.memoryUsage();
      if (usage.rss > 0) return clampRatio(usage.rss / limitBytes);
      return usage.heapTotal > 0 ? clampRatio(usage.heapUsed / usage.heapTotal) : 0;
    },
  };
}

export function classifyPressure(
  ratio: number,
  thresholds: PressureThresholds = DEFAULT_PRESSURE_THRESHOLDS,
): MemoryPressure {
  if (ratio > thresholds.critical) return 'critical';
  if (ratio > thresholds.high) return 'high';
  if (ratio > thresholds.medium) return 'medium';
  return 'low';
}
