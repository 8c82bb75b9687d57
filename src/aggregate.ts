import type { ZabbixHistoryRecord } from './types/zabbix.js';

export interface Sample {
  readonly clock: number;
  readonly value: number;
}

export interface Aggregate {
  readonly min: number;
  readonly avg: number;
  readonly max: number;
  readonly sampleCount: number;
}

export interface DailyAggregate extends Aggregate {
  readonly date: string;
  readonly itemName: string;
}

export interface TotalAggregate extends Aggregate {
  readonly itemName: string;
}

/** Fewer samples than this produce no aggregate for the period. */
export const MIN_SAMPLES = 2;

/**
 * Round to one decimal, ties to even. `toFixed` rounds an exact tie away from
 * zero; a tie at one decimal is exactly an odd multiple of 0.25.
 */
export function roundOneDecimal(value: number): number {
  if (Number.isInteger(value * 4) && !Number.isInteger(value * 2)) {
    const lower = Math.floor(value * 10);
    return (lower % 2 === 0 ? lower : lower + 1) / 10;
  }
  return Number(value.toFixed(1));
}

export function toSamples(records: readonly ZabbixHistoryRecord[]): Sample[] {
  return records.map((record) => ({
    clock: Number(record.clock),
    value: parseFloat(record.value),
  }));
}

/**
 * min/avg/max over the values, each rounded to one decimal.
 * Returns null below MIN_SAMPLES.
 */
export function aggregateSamples(values: readonly number[]): Aggregate | null {
  if (values.length < MIN_SAMPLES) return null;

  let min = Infinity;
  let max = -Infinity;
  let sum = 0;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
    sum += value;
  }

  return {
    min: roundOneDecimal(min),
    avg: roundOneDecimal(sum / values.length),
    max: roundOneDecimal(max),
    sampleCount: values.length,
  };
}

export function dailyAggregate(
  date: string,
  itemName: string,
  samples: readonly Sample[],
): DailyAggregate | null {
  const aggregate = aggregateSamples(samples.map((s) => s.value));
  return aggregate ? { date, itemName, ...aggregate } : null;
}

export function totalAggregate(itemName: string, samples: readonly Sample[]): TotalAggregate | null {
  const aggregate = aggregateSamples(samples.map((s) => s.value));
  return aggregate ? { itemName, ...aggregate } : null;
}
