import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import ExcelJS from 'exceljs';
import { DATA_COLUMNS, SHEET_NAME, ensureReportDependencies, writeReport } from '../src/report.js';
import type { ReportRow } from '../src/units.js';

async function readSheet(path: string): Promise<unknown[][]> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(path);
  const sheet = workbook.getWorksheet(SHEET_NAME);
  if (!sheet) throw new Error(`worksheet ${SHEET_NAME} missing`);

  const rows: unknown[][] = [];
  sheet.eachRow((row) => {
    const values: unknown[] = [];
    for (let col = 1; col <= DATA_COLUMNS.length; col++) {
      values.push(row.getCell(col).value);
    }
    rows.push(values);
  });
  return rows;
}

describe('writeReport', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'workhours-report-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the header and one row per report row, in order', async () => {
    const path = join(dir, 'metrics.xlsx');
    const rows: ReportRow[] = [
      { server: 'KDC (10.0.0.3)', type: 'CPU utilization', unit: '%', min: 10, avg: 15.5, max: 20 },
      { server: 'KDC (10.0.0.3)', type: 'Interface eth0: Bits received', unit: 'Mbps', min: 0.5, avg: 25.3, max: 80 },
    ];

    await writeReport(path, rows);

    expect(await readSheet(path)).toEqual([
      ['Server', 'Type', 'unit measurements', 'Min', 'Avg', 'Max'],
      ['KDC (10.0.0.3)', 'CPU utilization', '%', 10, 15.5, 20],
      ['KDC (10.0.0.3)', 'Interface eth0: Bits received', 'Mbps', 0.5, 25.3, 80],
    ]);
  });

  it('creates missing parent directories', async () => {
    const path = join(dir, 'nested', 'deeper', 'metrics.xlsx');

    await writeReport(path, []);

    expect((await stat(path)).isFile()).toBe(true);
  });

  it('writes a header-only sheet when there are no rows', async () => {
    const path = join(dir, 'empty.xlsx');

    await writeReport(path, []);

    expect(await readSheet(path)).toEqual([[...DATA_COLUMNS]]);
  });

  it('overwrites an existing report', async () => {
    const path = join(dir, 'metrics.xlsx');
    await writeReport(path, [{ server: 'a', type: 'CPU utilization', unit: '%', min: 1, avg: 2, max: 3 }]);

    await writeReport(path, []);

    expect(await readSheet(path)).toHaveLength(1);
  });
});

describe('ensureReportDependencies', () => {
  it('loads the spreadsheet library', async () => {
    const excel = await ensureReportDependencies();
    expect(typeof excel.Workbook).toBe('function');
  });
});
