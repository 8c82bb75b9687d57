import type {
  HistoryGetParams,
  HostGetParams,
  ItemGetParams,
  ZabbixHistoryRecord,
  ZabbixHost,
  ZabbixItem,
} from '../types/zabbix.js';

/**
 * The subset of the Zabbix API a report run needs. The collector and the
 * resolver depend on this interface only.
 */
export interface ZabbixApi {
  login(username: string, password: string): Promise<void>;
  getHosts(params: HostGetParams): Promise<ZabbixHost[]>;
  getItems(params: ItemGetParams): Promise<ZabbixItem[]>;
  getHistory(params: HistoryGetParams): Promise<ZabbixHistoryRecord[]>;
}

export interface ApiVersion {
  major: number;
  minor: number;
}

export function parseApiVersion(raw: string): ApiVersion {
  const match = /^(\d+)\.(\d+)/.exec(raw.trim());
  if (!match) {
    throw new Error(`Unrecognised Zabbix API version '${raw}'`);
  }
  return { major: Number(match[1]), minor: Number(match[2]) };
}

export function isAtLeast(version: ApiVersion, major: number, minor: number): boolean {
  return version.major > major || (version.major === major && version.minor >= minor);
}

/**
 * Accepts the server as users write it ("zabbix.example.com/zabbix") and
 * returns the JSON-RPC endpoint.
 */
export function normalizeApiUrl(server: string): string {
  let url = server.trim();
  if (!/^https?:\/\//i.test(url)) {
    url = `https://${url}`;
  }
  if (!url.endsWith('api_jsonrpc.php')) {
    url = `${url.replace(/\/+$/, '')}/api_jsonrpc.php`;
  }
  return url;
}
