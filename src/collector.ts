import { dailyAggregate, toSamples, totalAggregate } from './aggregate.js';
import type { DailyAggregate, Sample, TotalAggregate } from './aggregate.js';
import type { Logger } from './logger.js';
import { historyStorageClass, resolveHost, resolveMetricItems } from './metrics.js';
import type { MetricItem } from './metrics.js';
import { toReportRow } from './units.js';
import type { ReportRow } from './units.js';
import type { TimeWindow } from './windows.js';
import type { ZabbixApi } from './zabbix/base.js';

export interface ItemAggregation {
  readonly item: MetricItem;
  readonly daily: readonly DailyAggregate[];
  readonly samples: readonly Sample[];
  readonly total: TotalAggregate | null;
}

export interface HostCollection {
  readonly hostName: string;
  readonly items: readonly ItemAggregation[];
  readonly rows: ReportRow[];
}

export async function fetchWindowSamples(
  client: ZabbixApi,
  item: MetricItem,
  window: TimeWindow,
): Promise<Sample[]> {
  const history = await client.getHistory({
    itemids: item.itemId,
    time_from: window.timeFrom,
    time_till: window.timeTill,
    output: ['clock', 'value'],
    history: historyStorageClass(item.key),
    sortfield: 'clock',
    sortorder: 'DESC',
  });
  return toSamples(history);
}

/**
 * Build the final per-item record from the samples of each window, in window
 * order. Days under two samples get no daily entry but still count toward the
 * total.
 */
export function buildItemAggregation(
  item: MetricItem,
  perWindow: ReadonlyArray<{ window: TimeWindow; samples: readonly Sample[] }>,
): ItemAggregation {
  const daily: DailyAggregate[] = [];
  for (const { window, samples } of perWindow) {
    const day = dailyAggregate(window.date, item.name, samples);
    if (day) daily.push(day);
  }
  const samples = perWindow.flatMap((entry) => entry.samples);
  return {
    item,
    daily,
    samples,
    total: totalAggregate(item.name, samples),
  };
}

/**
 * Collect report rows for one host: resolve the host and its items, pull
 * history for every window (windows outer, items inner), then reduce.
 */
export async function collectHostMetrics(
  client: ZabbixApi,
  hostName: string,
  windows: readonly TimeWindow[],
  log?: Logger,
): Promise<HostCollection> {
  const host = await resolveHost(client, hostName);
  const items = await resolveMetricItems(client, host);
  log?.info({ host: hostName, hostId: host.hostId, items: items.length }, 'Resolved metric items');

  if (items.length === 0) {
    return { hostName, items: [], rows: [] };
  }

  const perItem: Array<Array<{ window: TimeWindow; samples: Sample[] }>> = items.map(() => []);

  for (const window of windows) {
    for (const [index, item] of items.entries()) {
      const samples = await fetchWindowSamples(client, item, window);
      perItem[index].push({ window, samples });
    }
  }

  const aggregations = items.map((item, index) => buildItemAggregation(item, perItem[index]));

  const rows: ReportRow[] = [];
  for (const aggregation of aggregations) {
    log?.debug(
      { host: hostName, item: aggregation.item.name, daily: aggregation.daily, samples: aggregation.samples.length },
      'Item aggregated',
    );
    if (aggregation.total) {
      rows.push(toReportRow(hostName, aggregation.item.name, aggregation.total));
    }
  }

  return { hostName, items: aggregations, rows };
}
