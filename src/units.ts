import type { Aggregate } from './aggregate.js';

export type UnitLabel = 'Mbps' | '%' | 'count';

const NETWORK_PATTERN = /Bits (received|sent)/;
const UTILIZATION_PATTERN = /(Disk|CPU|Memory) utilization/;

const BITS_PER_MEGABIT = 1_000_000;

export interface ReportRow {
  /** Host display name as requested */
  server: string;
  /** Item display name */
  type: string;
  unit: UnitLabel;
  min: number;
  avg: number;
  max: number;
}

export type ReportRowValues = [server: string, type: string, unit: string, min: number, avg: number, max: number];

export function bpsToMbps(bps: number): number {
  return bps / BITS_PER_MEGABIT;
}

// Matched against the item display name, not its key or value type.
export function classifyUnit(itemName: string): UnitLabel {
  if (NETWORK_PATTERN.test(itemName)) return 'Mbps';
  if (UTILIZATION_PATTERN.test(itemName)) return '%';
  return 'count';
}

export function toReportRow(server: string, itemName: string, total: Aggregate): ReportRow {
  const unit = classifyUnit(itemName);
  const convert = unit === 'Mbps' ? bpsToMbps : (value: number) => value;
  return {
    server,
    type: itemName,
    unit,
    min: convert(total.min),
    avg: convert(total.avg),
    max: convert(total.max),
  };
}

export function toRowValues(row: ReportRow): ReportRowValues {
  return [row.server, row.type, row.unit, row.min, row.avg, row.max];
}
