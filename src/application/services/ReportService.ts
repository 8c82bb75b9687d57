/**
 * ReportService — one report run from validated parameters to module result.
 * The entry point stays thin: load parameters → ReportService.run → print.
 */
import { collectHostMetrics } from '../../collector.js';
import type { ReportParameters } from '../../config.js';
import { MissingDependencyError, errorMessage } from '../../errors.js';
import type { Logger } from '../../logger.js';
import { ensureReportDependencies, writeReport } from '../../report.js';
import { toRowValues } from '../../units.js';
import type { ReportRow, ReportRowValues } from '../../units.js';
import { generateWorkingWindows } from '../../windows.js';
import type { ZabbixApi } from '../../zabbix/base.js';

export interface ReportSuccess {
  changed: true;
  excel_file: string;
  metrics: ReportRowValues[];
  msg: string;
}

export interface ReportFailure {
  failed: true;
  msg: string;
}

export type ModuleResult = ReportSuccess | ReportFailure;

export type ClientFactory = (server: string) => ZabbixApi;

export class ReportService {
  constructor(
    private readonly createClient: ClientFactory,
    private readonly log: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Log in, then collect rows host by host. Any failure aborts the whole
   * collection; there is no partial result.
   */
  async collect(params: ReportParameters): Promise<ReportRow[]> {
    const windows = generateWorkingWindows(params.timezone, params.days_back, this.now());
    this.log.info(
      { timezone: params.timezone, days: windows.length, from: windows[windows.length - 1]?.date, till: windows[0]?.date },
      'Generated working-hour windows',
    );

    const client = this.createClient(params.zabbix_server);
    await client.login(params.username, params.password);

    const rows: ReportRow[] = [];
    for (const hostName of params.host_names) {
      const collection = await collectHostMetrics(client, hostName, windows, this.log);
      rows.push(...collection.rows);
    }
    return rows;
  }

  async run(params: ReportParameters): Promise<ModuleResult> {
    try {
      await ensureReportDependencies();
    } catch (err) {
      if (err instanceof MissingDependencyError) {
        this.log.error({ library: err.library }, 'Required library missing');
        return { failed: true, msg: err.message };
      }
      throw err;
    }

    try {
      const rows = await this.collect(params);
      await writeReport(params.output_path, rows);
      this.log.info({ path: params.output_path, rows: rows.length }, 'Report written');

      return {
        changed: true,
        excel_file: params.output_path,
        metrics: rows.map(toRowValues),
        msg: `Successfully collected metrics for ${params.host_names.length} hosts`,
      };
    } catch (err) {
      this.log.error({ err }, 'Metric collection failed');
      return { failed: true, msg: `Error collecting metrics: ${errorMessage(err)}` };
    }
  }
}
