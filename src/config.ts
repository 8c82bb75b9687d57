import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';

export const DEFAULT_DAYS_BACK = 31;
export const DEFAULT_TIMEZONE = 'Asia/Yekaterinburg';
export const DEFAULT_OUTPUT_PATH = '/tmp/server_metrics.xlsx';

const hostNamesSchema = z.preprocess(
  (value) =>
    typeof value === 'string'
      ? value.split(',').map((name) => name.trim()).filter((name) => name.length > 0)
      : value,
  z.array(z.string().min(1)).min(1, 'at least one host name is required'),
);

// Optional parameters given as null fall back to their default.
function optional<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === null ? undefined : value), schema);
}

export const parametersSchema = z
  .object({
    zabbix_server: z.string().min(1, 'zabbix_server is required'),
    username: z.string().min(1, 'username is required'),
    password: z.string().min(1, 'password is required'),
    host_names: hostNamesSchema,
    days_back: optional(z.coerce.number().int().nonnegative().default(DEFAULT_DAYS_BACK)),
    timezone: optional(z.string().min(1).default(DEFAULT_TIMEZONE)),
    output_path: optional(z.string().min(1).default(DEFAULT_OUTPUT_PATH)),
  })
  .strip();

export type ReportParameters = z.infer<typeof parametersSchema>;

/** Environment variable for each parameter. */
export const ENV_KEYS: Record<keyof ReportParameters, string> = {
  zabbix_server: 'ZABBIX_SERVER',
  username: 'ZABBIX_USERNAME',
  password: 'ZABBIX_PASSWORD',
  host_names: 'ZABBIX_HOST_NAMES',
  days_back: 'REPORT_DAYS_BACK',
  timezone: 'REPORT_TIMEZONE',
  output_path: 'REPORT_OUTPUT_PATH',
};

export function parametersFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const params: Record<string, string> = {};
  for (const [param, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      params[param] = value;
    }
  }
  return params;
}

/**
 * Read a JSON arguments file as handed over by an automation framework.
 * Framework-internal keys are dropped later by the schema.
 */
export async function readArgsFile(path: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read arguments file ${path}: ${errorMessage(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Arguments file ${path} is not valid JSON: ${errorMessage(err)}`);
  }

  const record = z.record(z.unknown()).safeParse(parsed);
  if (!record.success) {
    throw new ConfigError(`Arguments file ${path} must contain a JSON object`);
  }
  return record.data;
}

export function parseParameters(input: Record<string, unknown>): ReportParameters {
  const result = parametersSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid parameters: ${details}`);
  }
  return result.data;
}

/**
 * Environment first, then the arguments file (if given) on top. A null in the
 * file leaves the environment value in place.
 */
export async function loadParameters(
  argsFile: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ReportParameters> {
  const fromFile = argsFile ? await readArgsFile(argsFile) : {};
  const merged: Record<string, unknown> = { ...parametersFromEnv(env) };
  for (const [key, value] of Object.entries(fromFile)) {
    if (value !== null) merged[key] = value;
  }
  return parseParameters(merged);
}
