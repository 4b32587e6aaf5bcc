/**
 * Metrics Summary
 *
 * Picks the headline VM metrics out of a handler output object: network
 * egress, memory cache, and the per-CPU 60-second averages with their mean.
 * Keys are matched by pattern first and by well-known names second, so
 * handlers are free to name their outputs loosely.
 *
 * @module kv-function-runtime/cli/metrics
 */

import type { Payload } from '../runtime/types.js';

/**
 * One per-CPU reading, labelled `CPU <n>`
 */
export interface CpuMetric {
  cpu: number;
  label: string;
  value: number;
}

export interface MetricsSummary {
  networkEgress: number | null;
  memoryCache: number | null;
  /** Sorted by CPU number */
  cpus: CpuMetric[];
  /** Mean of `cpus`, or a precomputed average when no per-CPU keys exist */
  cpuAverage: number | null;
}

const NETWORK_EGRESS_PATTERN = /network.*egress|egress/;
const NETWORK_EGRESS_KEYS = ['percent-network-egress', 'network-egress'];
const MEMORY_CACHE_PATTERN = /memory.*cache|memory.*caching|cache/;
const MEMORY_CACHE_KEYS = ['percent-memory-cache', 'percent-memory-caching'];
const CPU_AVERAGE_PATTERN = /avg.*cpu.*60/;
const CPU_ID_PATTERN = /cpu(\d+)/i;

/**
 * Reads a metric value as a number; numbers, booleans and numeric strings count
 */
export function toMetricValue(value: unknown): number | null {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') {
      return null;
    }
    const parsed = Number(trimmed);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

/**
 * First numeric value under a key matching the pattern, then under one of the
 * fallback keys. Non-numeric matches are skipped.
 */
export function findMetric(data: Payload, pattern: RegExp, fallbackKeys: readonly string[] = []): number | null {
  for (const [key, value] of Object.entries(data)) {
    if (!pattern.test(key)) {
      continue;
    }
    const metric = toMetricValue(value);
    if (metric !== null) {
      return metric;
    }
  }

  for (const key of fallbackKeys) {
    if (!Object.hasOwn(data, key)) {
      continue;
    }
    const metric = toMetricValue(data[key]);
    if (metric !== null) {
      return metric;
    }
  }
  return null;
}

/**
 * Per-CPU 60-second averages: keys holding `avg`, `60` and `cpu<n>`
 */
export function extractCpuMetrics(data: Payload): CpuMetric[] {
  const byCpu = new Map<number, number>();
  for (const [key, value] of Object.entries(data)) {
    if (!key.includes('avg') || !key.includes('60')) {
      continue;
    }
    const match = CPU_ID_PATTERN.exec(key);
    const id = match?.[1];
    if (id === undefined) {
      continue;
    }
    const metric = toMetricValue(value);
    if (metric !== null) {
      byCpu.set(Number.parseInt(id, 10), metric);
    }
  }

  return [...byCpu.entries()]
    .sort(([a], [b]) => a - b)
    .map(([cpu, value]) => ({ cpu, label: `CPU ${cpu}`, value }));
}

export function summarizeMetrics(data: Payload): MetricsSummary {
  const cpus = extractCpuMetrics(data);
  const cpuAverage =
    cpus.length > 0
      ? cpus.reduce((sum, metric) => sum + metric.value, 0) / cpus.length
      : findMetric(data, CPU_AVERAGE_PATTERN);

  return {
    networkEgress: findMetric(data, NETWORK_EGRESS_PATTERN, NETWORK_EGRESS_KEYS),
    memoryCache: findMetric(data, MEMORY_CACHE_PATTERN, MEMORY_CACHE_KEYS),
    cpus,
    cpuAverage,
  };
}
