import { describe, it, expect } from 'vitest';
import { bpsToMbps, classifyUnit, toReportRow, toRowValues } from '../src/units.js';

describe('classifyUnit', () => {
  it.each([
    ['Interface eth0: Bits received', 'Mbps'],
    ['Interface Ethernet0: Bits sent', 'Mbps'],
    ['CPU utilization', '%'],
    ['Memory utilization', '%'],
    ['Disk utilization', '%'],
    ['PhysicalDisk(0 C:) Disk utilization', '%'],
    ['% Idle Time', 'count'],
    ['Number of processes', 'count'],
  ] as const)('%s → %s', (name, unit) => {
    expect(classifyUnit(name)).toBe(unit);
  });

  it('matches the exact capitalisation only', () => {
    expect(classifyUnit('bits received')).toBe('count');
    expect(classifyUnit('cpu utilization')).toBe('count');
    expect(classifyUnit('CPU Utilization')).toBe('count');
  });
});

describe('toReportRow', () => {
  it('converts network counters from bit/s to Mbit/s', () => {
    const row = toReportRow('web-01', 'Interface eth0: Bits received', {
      min: 1_200_000,
      avg: 25_300_000,
      max: 98_765_432.1,
      sampleCount: 10,
    });

    expect(row).toEqual({
      server: 'web-01',
      type: 'Interface eth0: Bits received',
      unit: 'Mbps',
      min: 1.2,
      avg: 25.3,
      max: 98_765_432.1 / 1_000_000,
    });
  });

  it('leaves utilisation values unconverted', () => {
    const row = toReportRow('web-01', 'CPU utilization', { min: 10, avg: 15.5, max: 20, sampleCount: 40 });
    expect(toRowValues(row)).toEqual(['web-01', 'CPU utilization', '%', 10, 15.5, 20]);
  });

  it('labels anything else as count', () => {
    const row = toReportRow('web-01', 'Free disk space', { min: 1, avg: 2, max: 3, sampleCount: 3 });
    expect(toRowValues(row)).toEqual(['web-01', 'Free disk space', 'count', 1, 2, 3]);
  });
});

describe('bpsToMbps', () => {
  it('divides by exactly one million', () => {
    expect(bpsToMbps(1_000_000)).toBe(1);
    expect(bpsToMbps(500)).toBe(0.0005);
  });
});
