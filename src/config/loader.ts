import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { ConfigSource, MountwatchConfig, ResolvedConfig } from './types.js';
import { CONFIG_CONSTANTS, SERVER_CONSTANTS, WATCHER_CONSTANTS } from './constants.js';
import { ConfigError } from '../utils/errors.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';

const ServerConfigSchema = z
  .object({
    port: z.number().int('Port must be an integer').min(0).max(65535).optional(),
    host: z.string().trim().min(1, 'Host cannot be empty').optional(),
    route: z.string().startsWith('/', 'Route must start with "/"').optional(),
    contentType: z.string().trim().min(1, 'Content type cannot be empty').optional()
  })
  .strict();

const WatchConfigSchema = z
  .object({
    pollIntervalMs: z
      .number()
      .int('Poll interval must be an integer')
      .min(WATCHER_CONSTANTS.MIN_POLL_INTERVAL_MS, `Poll interval must be at least ${WATCHER_CONSTANTS.MIN_POLL_INTERVAL_MS}ms`)
      .optional(),
    rewatchDelayMs: z.number().int('Rewatch delay must be an integer').min(0).optional()
  })
  .strict();

export const MountwatchConfigSchema = z
  .object({
    file: z.string().trim().min(1, 'File path cannot be empty').optional(),
    server: ServerConfigSchema.optional(),
    watch: WatchConfigSchema.optional()
  })
  .strict();

const ResolvedConfigSchema = MountwatchConfigSchema.extend({
  file: z.string({ required_error: 'No file to serve: pass one or set MOUNTWATCH_FILE' }).trim().min(1)
});

export interface LoadConfigOptions {
  /** Explicit config file; must exist when given */
  configPath?: string;
  /** Values from command-line flags, highest priority */
  cli?: MountwatchConfig;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  // NaN is kept so validation reports the bad value instead of dropping it
  return Number(raw.trim());
}

/**
 * Locate the config file: explicit path, then MOUNTWATCH_CONFIG, then
 * mountwatch.json in the working directory if present.
 */
export function resolveConfigPath(options: LoadConfigOptions = {}): string | null {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  if (options.configPath) {
    return path.resolve(cwd, options.configPath);
  }
  if (env.MOUNTWATCH_CONFIG) {
    return path.resolve(cwd, env.MOUNTWATCH_CONFIG);
  }

  const fallback = path.join(cwd, CONFIG_CONSTANTS.DEFAULT_CONFIG_FILE);
  return fs.existsSync(fallback) ? fallback : null;
}

/**
 * Read and validate a JSON config file
 * @readonly Never modifies files
 */
export function readConfigFile(configPath: string): MountwatchConfig {
  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${configPath}: ${getErrorMessage(error)}`, [], { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON: ${getErrorMessage(error)}`, [], { cause: error });
  }

  const parsed = MountwatchConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${configPath}`, formatIssues(parsed.error));
  }

  log.debug('Loaded config file', { path: configPath });
  return parsed.data;
}

/**
 * Read configuration from environment variables
 * @readonly Never modifies files or environment
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): MountwatchConfig {
  const config: MountwatchConfig = {};

  if (env.MOUNTWATCH_FILE) {
    config.file = env.MOUNTWATCH_FILE;
  }

  const port = parseNumber(env.MOUNTWATCH_PORT);
  if (port !== undefined) {
    config.server = { ...config.server, port };
  }

  if (env.MOUNTWATCH_HOST) {
    config.server = { ...config.server, host: env.MOUNTWATCH_HOST };
  }

  if (env.MOUNTWATCH_ROUTE) {
    config.server = { ...config.server, route: env.MOUNTWATCH_ROUTE };
  }

  if (env.MOUNTWATCH_CONTENT_TYPE) {
    config.server = { ...config.server, contentType: env.MOUNTWATCH_CONTENT_TYPE };
  }

  const pollIntervalMs = parseNumber(env.MOUNTWATCH_POLL_INTERVAL_MS);
  if (pollIntervalMs !== undefined) {
    config.watch = { ...config.watch, pollIntervalMs };
  }

  const rewatchDelayMs = parseNumber(env.MOUNTWATCH_REWATCH_DELAY_MS);
  if (rewatchDelayMs !== undefined) {
    config.watch = { ...config.watch, rewatchDelayMs };
  }

  return config;
}

/**
 * Deep merge configuration objects
 * Later configs override earlier ones; undefined values never override
 */
export function mergeConfigs(...configs: (MountwatchConfig | null | undefined)[]): MountwatchConfig {
  const result: MountwatchConfig = {};

  for (const config of configs) {
    if (!config) continue;

    if (config.file !== undefined) {
      result.file = config.file;
    }

    if (config.server) {
      const { port, host, route, contentType } = config.server;
      result.server = {
        port: port ?? result.server?.port,
        host: host ?? result.server?.host,
        route: route ?? result.server?.route,
        contentType: contentType ?? result.server?.contentType
      };
    }

    if (config.watch) {
      const { pollIntervalMs, rewatchDelayMs } = config.watch;
      result.watch = {
        pollIntervalMs: pollIntervalMs ?? result.watch?.pollIntervalMs,
        rewatchDelayMs: rewatchDelayMs ?? result.watch?.rewatchDelayMs
      };
    }
  }

  return result;
}

/**
 * Get configuration sources for debugging
 * @readonly Never modifies files
 */
export function getConfigSources(options: LoadConfigOptions = {}): ConfigSource {
  const located = resolveConfigPath(options);

  return {
    file: located ? readConfigFile(located) : null,
    filePath: located,
    env: readEnvConfig(options.env ?? process.env),
    cli: options.cli ?? {}
  };
}

/**
 * Load merged configuration from all sources
 * Priority: cli > env > config file > defaults
 *
 * @readonly Never modifies config files
 * @throws ConfigError when a source is unreadable or the result is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolvedConfig {
  const sources = getConfigSources(options);
  const merged = mergeConfigs(sources.file, sources.env, sources.cli);

  const parsed = ResolvedConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', formatIssues(parsed.error));
  }

  const { file, server, watch } = parsed.data;

  return {
    file,
    server: {
      port: server?.port ?? SERVER_CONSTANTS.DEFAULT_PORT,
      host: server?.host ?? SERVER_CONSTANTS.DEFAULT_HOST,
      route: server?.route ?? SERVER_CONSTANTS.DEFAULT_ROUTE,
      contentType: server?.contentType ?? SERVER_CONSTANTS.DEFAULT_CONTENT_TYPE
    },
    watch: {
      pollIntervalMs: watch?.pollIntervalMs ?? WATCHER_CONSTANTS.CHAIN_POLL_INTERVAL_MS,
      rewatchDelayMs: watch?.rewatchDelayMs ?? WATCHER_CONSTANTS.REWATCH_DELAY_MS
    }
  };
}
