// Relay Config - Types and loader
//
// Layers, lowest precedence first: JSON config file, environment, positional argument.

import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import { DEFAULT_QUEUE_CAPACITY } from './bounded-queue.js';
import { StartupError, errorMessage } from './errors.js';

const DEFAULT_CONFIG_PATH = 'wsline.config.json';

const RelayConfigSchema = z.object({
  url: z
    .string({ required_error: 'Remote URL is required (first argument or WSLINE_URL)' })
    .min(1, 'Remote URL is required (first argument or WSLINE_URL)'),
  queueCapacity: z.number().int().positive().default(DEFAULT_QUEUE_CAPACITY),
  authToken: z.string().min(1).optional(),
  headers: z.record(z.string()).default({}),
  protocols: z.array(z.string()).default([]),
  closeOnInputEnd: z.boolean().default(true),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type RelayConfig = z.infer<typeof RelayConfigSchema>;

export function loadConfig(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  configPath?: string,
): RelayConfig {
  const [positionalUrl, ...extra] = argv;
  if (extra.length > 0) {
    throw new StartupError(`Unexpected arguments: ${extra.join(' ')} (usage: wsline <url>)`);
  }

  const fileConfig = readConfigFile(configPath ?? env.WSLINE_CONFIG, configPath !== undefined || env.WSLINE_CONFIG !== undefined);

  const merged: Record<string, unknown> = { ...fileConfig };

  const url = positionalUrl ?? env.WSLINE_URL;
  if (url !== undefined) merged.url = url;

  if (env.WSLINE_QUEUE_CAPACITY !== undefined) {
    merged.queueCapacity = Number(env.WSLINE_QUEUE_CAPACITY);
  }
  if (env.WSLINE_AUTH_TOKEN !== undefined) {
    merged.authToken = env.WSLINE_AUTH_TOKEN;
  }
  const closeOnInputEnd = env.WSLINE_CLOSE_ON_INPUT_END;
  if (closeOnInputEnd !== undefined) {
    if (closeOnInputEnd !== 'true' && closeOnInputEnd !== 'false') {
      throw new StartupError(`WSLINE_CLOSE_ON_INPUT_END must be 'true' or 'false', got '${closeOnInputEnd}'`);
    }
    merged.closeOnInputEnd = closeOnInputEnd === 'true';
  }
  if (env.WSLINE_LOG_LEVEL !== undefined) {
    merged.logLevel = env.WSLINE_LOG_LEVEL;
  } else if (env.DEBUG) {
    merged.logLevel = 'debug';
  }

  const result = RelayConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new StartupError(`Invalid configuration: ${issues}`);
  }

  return { ...result.data, url: normalizeUrl(result.data.url) };
}

/** Accept http(s) URLs for convenience and map them onto the WebSocket schemes. */
export function normalizeUrl(raw: string): string {
  const rewritten = raw.replace(/^http:/i, 'ws:').replace(/^https:/i, 'wss:');

  let parsed: URL;
  try {
    parsed = new URL(rewritten);
  } catch (err) {
    throw new StartupError(`Invalid remote URL "${raw}": ${errorMessage(err)}`, { cause: err });
  }

  if (parsed.protocol !== 'ws:' && parsed.protocol !== 'wss:') {
    throw new StartupError(`Unsupported URL protocol "${parsed.protocol}" (expected ws:, wss:, http: or https:)`);
  }

  return parsed.toString();
}

export function connectionHeaders(config: RelayConfig): Record<string, string> {
  const headers: Record<string, string> = { ...config.headers };
  if (config.authToken) {
    headers.Authorization = `Bearer ${config.authToken}`;
  }
  return headers;
}

function readConfigFile(path: string | undefined, explicit: boolean): Record<string, unknown> {
  const resolved = path ?? DEFAULT_CONFIG_PATH;

  // The default file is optional; a named one is not
  if (!explicit && !existsSync(resolved)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(resolved, 'utf-8'));
  } catch (err) {
    throw new StartupError(`Failed to read config file ${resolved}: ${errorMessage(err)}`, { cause: err });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new StartupError(`Config file ${resolved} must contain a JSON object`);
  }

  return { ...parsed };
}
