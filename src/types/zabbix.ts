export interface JsonRpcRequest {
  jsonrpc: '2.0';
  method: string;
  params: Record<string, unknown> | unknown[];
  id: number;
  auth?: string;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: string;
}

export interface JsonRpcResponse<T> {
  jsonrpc: '2.0';
  result?: T;
  error?: JsonRpcError;
  id: number | null;
}

export interface ZabbixClientConfig {
  /** Server URL as configured, e.g. "zabbix.example.com/zabbix" */
  url: string;
  /** Request timeout in milliseconds applied to headers and body. */
  timeoutMs?: number;
}

export interface ZabbixHost {
  hostid: string;
  /** Technical host name; lookups filter on the visible name. */
  host: string;
}

export interface ZabbixItem {
  itemid: string;
  name: string;
  key_: string;
}

export interface ZabbixHistoryRecord {
  clock: string;
  value: string;
}

/** Typed history table selector: 0 = numeric float, 3 = numeric unsigned. */
export type HistoryStorageClass = 0 | 1 | 2 | 3 | 4;

export interface HostGetParams {
  filter?: Record<string, string | string[]>;
  output?: string[];
}

export interface ItemGetParams {
  hostids: string;
  output?: string[];
  search?: Record<string, string>;
  filter?: Record<string, string | number>;
  searchWildcardsEnabled?: boolean;
}

export interface HistoryGetParams {
  itemids: string;
  time_from: number;
  time_till: number;
  history: HistoryStorageClass;
  output?: string[];
  sortfield?: string;
  sortorder?: 'ASC' | 'DESC';
}
