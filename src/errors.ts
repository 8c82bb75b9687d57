/**
 * Error taxonomy for a report run.
 *
 * Every failure that ends a run is one of these; the service turns it into a
 * `{ failed: true, msg }` result. Too few samples is never an error.
 */

export type ReportErrorCode =
  | 'MISSING_DEPENDENCY'
  | 'HOST_NOT_FOUND'
  | 'ZABBIX_API'
  | 'INVALID_TIMEZONE'
  | 'CONFIG';

export class ReportError extends Error {
  constructor(readonly code: ReportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MissingDependencyError extends ReportError {
  constructor(readonly library: string, options?: { cause?: unknown }) {
    super('MISSING_DEPENDENCY', `The ${library} library is required for this module`, options);
  }
}

export class HostNotFoundError extends ReportError {
  constructor(readonly hostName: string) {
    super('HOST_NOT_FOUND', `Host '${hostName}' not found`);
  }
}

export class ZabbixApiError extends ReportError {
  constructor(message: string, readonly rpcCode?: number, options?: { cause?: unknown }) {
    super('ZABBIX_API', message, options);
  }
}

export class InvalidTimezoneError extends ReportError {
  constructor(readonly timezone: string) {
    super('INVALID_TIMEZONE', `Invalid timezone '${timezone}'`);
  }
}

export class ConfigError extends ReportError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
