import { request } from 'undici';
import { z } from 'zod';
import { ZabbixApiError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type {
  HistoryGetParams,
  HostGetParams,
  ItemGetParams,
  JsonRpcRequest,
  ZabbixClientConfig,
  ZabbixHistoryRecord,
  ZabbixHost,
  ZabbixItem,
} from '../types/zabbix.js';
import { isAtLeast, normalizeApiUrl, parseApiVersion } from './base.js';
import type { ApiVersion, ZabbixApi } from './base.js';

const DEFAULT_TIMEOUT_MS = 30_000;

const envelopeSchema = z.object({
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.string().optional(),
    })
    .optional(),
});

const hostSchema = z.object({
  hostid: z.string(),
  host: z.string(),
});

const itemSchema = z.object({
  itemid: z.string(),
  name: z.string(),
  key_: z.string(),
});

const historySchema = z.object({
  clock: z.string(),
  value: z.string(),
});

/**
 * Zabbix JSON-RPC client.
 *
 * Session handling follows the server version:
 * - 5.4+ takes `username` in user.login (older servers take `user`)
 * - 6.4+ takes the session token as `Authorization: Bearer` (older servers
 *   expect it in the request's `auth` field)
 */
export class ZabbixClient implements ZabbixApi {
  readonly url: string;
  private readonly timeoutMs: number;
  private apiVersion: ApiVersion | null = null;
  private token: string | null = null;
  private nextId = 1;

  constructor(config: ZabbixClientConfig, private readonly log?: Logger) {
    this.url = normalizeApiUrl(config.url);
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async version(): Promise<string> {
    const raw = await this.call('apiinfo.version', {}, z.string(), false);
    this.apiVersion = parseApiVersion(raw);
    return raw;
  }

  async login(username: string, password: string): Promise<void> {
    const raw = await this.version();
    const version = this.apiVersion ?? parseApiVersion(raw);
    const params = isAtLeast(version, 5, 4)
      ? { username, password }
      : { user: username, password };

    this.token = await this.call('user.login', params, z.string(), false);
    this.log?.info({ url: this.url, username, apiVersion: raw }, 'Logged in to Zabbix API');
  }

  async getHosts(params: HostGetParams): Promise<ZabbixHost[]> {
    return this.call('host.get', { ...params }, z.array(hostSchema));
  }

  async getItems(params: ItemGetParams): Promise<ZabbixItem[]> {
    return this.call('item.get', { ...params }, z.array(itemSchema));
  }

  async getHistory(params: HistoryGetParams): Promise<ZabbixHistoryRecord[]> {
    return this.call('history.get', { ...params }, z.array(historySchema));
  }

  private async call<T>(
    method: string,
    params: Record<string, unknown>,
    schema: z.ZodType<T>,
    authenticated = true,
  ): Promise<T> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json-rpc',
    };
    const payload: JsonRpcRequest = {
      jsonrpc: '2.0',
      method,
      params,
      id: this.nextId++,
    };

    if (authenticated) {
      if (!this.token) {
        throw new ZabbixApiError(`Cannot call ${method} before login`);
      }
      if (this.apiVersion && isAtLeast(this.apiVersion, 6, 4)) {
        headers['Authorization'] = `Bearer ${this.token}`;
      } else {
        payload.auth = this.token;
      }
    }

    let body: unknown;
    try {
      const response = await request(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify(payload),
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
      });
      const { statusCode } = response;
      if (statusCode < 200 || statusCode >= 300) {
        await response.body.text();
        throw new ZabbixApiError(`Zabbix API returned HTTP ${statusCode} for ${method}`);
      }
      body = await response.body.json();
    } catch (err) {
      if (err instanceof ZabbixApiError) throw err;
      throw new ZabbixApiError(`Zabbix API request ${method} failed: ${errorMessage(err)}`, undefined, { cause: err });
    }

    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new ZabbixApiError(`Malformed JSON-RPC response for ${method}`);
    }
    if (envelope.data.error) {
      const { code, message, data } = envelope.data.error;
      throw new ZabbixApiError(data ? `${message} ${data}` : message, code);
    }

    const result = schema.safeParse(envelope.data.result);
    if (!result.success) {
      throw new ZabbixApiError(`Unexpected result shape for ${method}: ${result.error.issues[0]?.message ?? 'invalid'}`);
    }
    return result.data;
  }
}
