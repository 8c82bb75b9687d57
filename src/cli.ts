import { ReportService } from './application/services/ReportService.js';
import type { ClientFactory, ModuleResult } from './application/services/ReportService.js';
import { loadParameters } from './config.js';
import { ConfigError } from './errors.js';
import type { Logger } from './logger.js';
import { ZabbixClient } from './zabbix/client.js';

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  log: Logger;
  createClient?: ClientFactory;
  now?: () => Date;
}

export interface CliOutcome {
  result: ModuleResult;
  exitCode: number;
}

/**
 * argv[0], when present, is a JSON arguments file; everything else comes
 * from the environment.
 */
export async function runCli(argv: readonly string[], options: CliOptions): Promise<CliOutcome> {
  const { log } = options;
  const createClient: ClientFactory =
    options.createClient ?? ((server) => new ZabbixClient({ url: server }, log));

  let result: ModuleResult;
  try {
    const params = await loadParameters(argv[0], options.env ?? process.env);
    log.info(
      { server: params.zabbix_server, username: params.username, hosts: params.host_names, daysBack: params.days_back },
      'Starting metrics report',
    );
    result = await new ReportService(createClient, log, options.now).run(params);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    result = { failed: true, msg: err.message };
  }

  return { result, exitCode: 'failed' in result ? 1 : 0 };
}
