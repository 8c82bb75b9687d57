import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { MissingDependencyError } from './errors.js';
import { toRowValues } from './units.js';
import type { ReportRow } from './units.js';

export const DATA_COLUMNS = ['Server', 'Type', 'unit measurements', 'Min', 'Avg', 'Max'] as const;

export const SHEET_NAME = 'Sheet1';

async function loadExcel() {
  const mod = await import('exceljs');
  return mod.default;
}

type ExcelModule = Awaited<ReturnType<typeof loadExcel>>;

let excel: ExcelModule | null = null;

/**
 * Load the spreadsheet library. Called before any API work so a broken
 * install fails the run up front.
 */
export async function ensureReportDependencies(): Promise<ExcelModule> {
  if (excel) return excel;
  try {
    excel = await loadExcel();
    return excel;
  } catch (err) {
    throw new MissingDependencyError('exceljs', { cause: err });
  }
}

/**
 * Write the rows as an .xlsx workbook at `outputPath`, creating parent
 * directories. An empty row list still produces the header row.
 */
export async function writeReport(outputPath: string, rows: readonly ReportRow[]): Promise<void> {
  const ExcelJS = await ensureReportDependencies();

  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(SHEET_NAME);
  sheet.addRow([...DATA_COLUMNS]);
  for (const row of rows) {
    sheet.addRow(toRowValues(row));
  }

  const dir = dirname(outputPath);
  if (dir) {
    await mkdir(dir, { recursive: true });
  }
  await workbook.xlsx.writeFile(outputPath);
}
