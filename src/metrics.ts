import { HostNotFoundError } from './errors.js';
import type { HistoryStorageClass, ZabbixItem } from './types/zabbix.js';
import type { ZabbixApi } from './zabbix/base.js';

/**
 * Item key fragments collected for every host. Matched as substrings of the
 * keys a host exposes, so `net.if.in` picks up every interface.
 */
export const METRIC_KEY_TEMPLATES: readonly string[] = [
  'system.cpu.util',
  'vm.memory.util',
  'perf_counter_en["\\PhysicalDisk(0 C:)\\% Idle Time",60]',
  'net.if.in',
  'net.if.out',
];

const NETWORK_KEY_FRAGMENT = 'net.if.';

export interface ResolvedHost {
  hostId: string;
  technicalName: string;
  /** Name as requested by the caller */
  displayName: string;
}

export interface MetricItem {
  itemId: string;
  name: string;
  key: string;
  host: ResolvedHost;
}

// Interface counters live in the unsigned history table; everything else here is float.
export function historyStorageClass(key: string): HistoryStorageClass {
  return key.includes(NETWORK_KEY_FRAGMENT) ? 3 : 0;
}

export function matchesTemplate(key: string, templates: readonly string[] = METRIC_KEY_TEMPLATES): boolean {
  return templates.some((template) => key.includes(template));
}

export async function resolveHost(client: ZabbixApi, displayName: string): Promise<ResolvedHost> {
  const hosts = await client.getHosts({
    filter: { name: displayName },
    output: ['hostid', 'host'],
  });

  const [host] = hosts;
  if (!host) {
    throw new HostNotFoundError(displayName);
  }
  return { hostId: host.hostid, technicalName: host.host, displayName };
}

/**
 * Enabled items of the host whose key matches a template, each re-read by
 * key to get the authoritative record.
 */
export async function resolveMetricItems(
  client: ZabbixApi,
  host: ResolvedHost,
  templates: readonly string[] = METRIC_KEY_TEMPLATES,
): Promise<MetricItem[]> {
  const allItems = await client.getItems({
    hostids: host.hostId,
    output: ['itemid', 'name', 'key_'],
    searchWildcardsEnabled: true,
    filter: { status: 0 },
  });

  const keys = new Set<string>();
  for (const item of allItems) {
    if (matchesTemplate(item.key_, templates)) {
      keys.add(item.key_);
    }
  }

  const resolved: MetricItem[] = [];
  for (const key of keys) {
    const [item] = await client.getItems({
      hostids: host.hostId,
      search: { key_: key },
      output: ['itemid', 'name', 'key_'],
    });
    if (item) {
      resolved.push(toMetricItem(item, host));
    }
  }
  return resolved;
}

function toMetricItem(item: ZabbixItem, host: ResolvedHost): MetricItem {
  return {
    itemId: item.itemid,
    name: item.name,
    key: item.key_,
    host,
  };
}
