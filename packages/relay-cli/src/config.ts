/**
 * Relay configuration.
 *
 * Sources, lowest precedence first:
 * 1. built-in defaults
 * 2. an optional YAML file (kebab-case keys)
 * 3. environment variables (after `.env` has been loaded by the CLI)
 *
 * Environment variables:
 * - RELAY_BASE: root of the shared folder tree (default: ~/Downloads/folder-relay)
 * - RELAY_ROUTES: comma-separated route names, e.g. "dev,qa"
 * - RELAY_<ROUTE>: backend base URL of a route
 * - RELAY_CURL_TEMPLATE: command template used by every route
 * - RELAY_<ROUTE>_CURL_TEMPLATE: command template of one route
 * - RELAY_PORT / RELAY_HOST: local listener address (default: 0.0.0.0:19790)
 * - RELAY_CACHE_MODE: permissive | strict (default: permissive)
 * - RELAY_POLL_INTERVAL_MS: server scan interval (default: 1000)
 * - RELAY_WAIT_INTERVAL_MS: client presence check interval (default: 500)
 * - RELAY_WAIT_TIMEOUT_MS: client wait deadline, 0 = none (default: 0)
 * - LOG_LEVEL, NODE_ENV
 */

import { readFileSync } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import yaml from 'js-yaml';
import { CACHE_MODES, DEFAULT_HEADER_POLICY } from '@folder-relay/core';
import type { CacheMode, HeaderPolicy } from '@folder-relay/core';

export const DEFAULT_PORT = 19790;
export const DEFAULT_HOST = '0.0.0.0';

export interface RouteConfig {
  name: string;
  backendUrl: string;
  /** Absolute path of the command template; direct forwarding when absent */
  curlTemplatePath?: string;
}

export interface RelayConfig {
  baseDir: string;
  routes: RouteConfig[];
  port: number;
  host: string;
  cacheMode: CacheMode;
  pollIntervalMs: number;
  waitIntervalMs: number;
  /** 0 = wait forever */
  waitTimeoutMs: number;
  headerPolicy: HeaderPolicy;
  logLevel: string;
  nodeEnv: string;
}

export interface ConfigValidationError {
  field: string;
  message: string;
}

export type ConfigLoadResult =
  | { success: true; config: RelayConfig }
  | { success: false; errors: ConfigValidationError[] };

export interface LoadConfigOptions {
  /** YAML config file */
  configPath?: string;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Home directory for `~` expansion (default: os.homedir()) */
  homeDir?: string;
}

// ---------------------------------------------------------------------------
// Raw YAML shape (kebab-case keys)
// ---------------------------------------------------------------------------

/** `backend-url`, `curl-template` */
type RawRoute = Record<string, unknown>;

/** `hash`, `strict-hash`, `pass`, `reserved-prefixes` */
type RawHeaders = Record<string, unknown>;

/** Top-level scalar settings */
const SCALAR_KEYS = [
  'base-dir',
  'port',
  'host',
  'cache-mode',
  'poll-interval-ms',
  'wait-interval-ms',
  'wait-timeout-ms',
  'curl-template',
] as const;

type ScalarKey = (typeof SCALAR_KEYS)[number];

type RawConfig = Partial<Record<ScalarKey, unknown>> & {
  routes?: Record<string, RawRoute | null>;
  headers?: RawHeaders;
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function getEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/** Env variable name for a route, e.g. "my-api" -> "RELAY_MY_API" */
export function routeEnvKey(route: string, suffix = ''): string {
  return `RELAY_${route.toUpperCase().replace(/[^A-Z0-9]/g, '_')}${suffix}`;
}

/** Expand a leading `~` */
export function expandHome(value: string, homeDir: string): string {
  if (value === '~') return homeDir;
  if (value.startsWith('~/')) return path.join(homeDir, value.slice(2));
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function readStringList(
  value: unknown,
  field: string,
  errors: ConfigValidationError[]
): string[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    errors.push({ field, message: 'Must be a list of strings' });
    return undefined;
  }
  return value;
}

function readInteger(
  raw: unknown,
  field: string,
  errors: ConfigValidationError[],
  min: number
): number | undefined {
  if (raw === undefined || raw === null) return undefined;
  const parsed = typeof raw === 'number' ? raw : typeof raw === 'string' ? Number(raw.trim()) : NaN;
  if (!Number.isInteger(parsed) || parsed < min) {
    errors.push({ field, message: `Must be an integer >= ${min}, got '${String(raw)}'` });
    return undefined;
  }
  return parsed;
}

function readString(raw: unknown, field: string, errors: ConfigValidationError[]): string | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (typeof raw !== 'string' || raw.trim() === '') {
    errors.push({ field, message: 'Must be a non-empty string' });
    return undefined;
  }
  return raw.trim();
}

function isCacheMode(value: string): value is CacheMode {
  return CACHE_MODES.some((mode) => mode === value);
}

function readRawConfig(configPath: string, errors: ConfigValidationError[]): RawConfig | null {
  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch (err) {
    errors.push({
      field: 'configPath',
      message: `Failed to read config file: ${err instanceof Error ? err.message : String(err)}`,
    });
    return null;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (err) {
    errors.push({
      field: 'yaml',
      message: `Failed to parse YAML: ${err instanceof Error ? err.message : String(err)}`,
    });
    return null;
  }

  if (parsed === undefined || parsed === null) return {};
  if (!isRecord(parsed)) {
    errors.push({ field: 'yaml', message: 'Config file is not a YAML mapping' });
    return null;
  }

  const raw: RawConfig = {};
  for (const key of SCALAR_KEYS) {
    raw[key] = parsed[key];
  }
  const routes = parsed['routes'];
  if (routes !== undefined && routes !== null) {
    if (!isRecord(routes)) {
      errors.push({ field: 'routes', message: 'Must be a mapping of route name to settings' });
    } else {
      const typed: Record<string, RawRoute | null> = {};
      for (const [name, settings] of Object.entries(routes)) {
        typed[name] = isRecord(settings) ? settings : null;
      }
      raw.routes = typed;
    }
  }
  const headers = parsed['headers'];
  if (isRecord(headers)) {
    raw.headers = headers;
  }
  return raw;
}

function resolveHeaderPolicy(raw: RawHeaders | undefined, errors: ConfigValidationError[]): HeaderPolicy {
  return {
    hashHeaders: readStringList(raw?.hash, 'headers.hash', errors) ?? [...DEFAULT_HEADER_POLICY.hashHeaders],
    strictHashHeaders:
      readStringList(raw?.['strict-hash'], 'headers.strict-hash', errors) ?? [
        ...DEFAULT_HEADER_POLICY.strictHashHeaders,
      ],
    passHeaders: readStringList(raw?.pass, 'headers.pass', errors) ?? [...DEFAULT_HEADER_POLICY.passHeaders],
    reservedPrefixes:
      readStringList(raw?.['reserved-prefixes'], 'headers.reserved-prefixes', errors) ?? [
        ...DEFAULT_HEADER_POLICY.reservedPrefixes,
      ],
  };
}

function resolveRoutes(
  raw: RawConfig,
  env: NodeJS.ProcessEnv,
  homeDir: string,
  errors: ConfigValidationError[]
): RouteConfig[] {
  const envNames = (getEnv(env, 'RELAY_ROUTES') ?? '')
    .split(',')
    .map((name) => name.trim())
    .filter(Boolean);
  const yamlRoutes = raw.routes ?? {};
  const names = [...new Set([...Object.keys(yamlRoutes), ...envNames])];

  const sharedTemplate =
    getEnv(env, 'RELAY_CURL_TEMPLATE') ?? readString(raw['curl-template'], 'curl-template', errors);

  const routes: RouteConfig[] = [];
  for (const name of names) {
    if (!/^[A-Za-z0-9][A-Za-z0-9_-]*$/.test(name)) {
      errors.push({ field: `routes.${name}`, message: 'Route names may only contain letters, digits, _ and -' });
      continue;
    }

    const settings = yamlRoutes[name] ?? undefined;
    const backendUrl =
      getEnv(env, routeEnvKey(name)) ??
      readString(settings?.['backend-url'], `routes.${name}.backend-url`, errors);
    if (!backendUrl) {
      errors.push({
        field: `routes.${name}.backend-url`,
        message: `No backend URL for route '${name}': set ${routeEnvKey(name)}`,
      });
      continue;
    }
    if (!/^https?:\/\//i.test(backendUrl)) {
      errors.push({ field: `routes.${name}.backend-url`, message: `Not an http(s) URL: ${backendUrl}` });
      continue;
    }

    const template =
      getEnv(env, routeEnvKey(name, '_CURL_TEMPLATE')) ??
      readString(settings?.['curl-template'], `routes.${name}.curl-template`, errors) ??
      sharedTemplate;

    const route: RouteConfig = { name, backendUrl: backendUrl.replace(/\/+$/, '') };
    if (template) {
      route.curlTemplatePath = path.resolve(expandHome(template, homeDir));
    }
    routes.push(route);
  }

  if (names.length === 0) {
    errors.push({ field: 'routes', message: 'No routes configured; e.g. RELAY_ROUTES=dev,qa' });
  }
  return routes;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Load relay configuration from defaults, an optional YAML file and the
 * environment.
 */
export function loadConfig(options?: LoadConfigOptions): ConfigLoadResult {
  const env = options?.env ?? process.env;
  const homeDir = options?.homeDir ?? os.homedir();
  const errors: ConfigValidationError[] = [];

  let raw: RawConfig = {};
  if (options?.configPath) {
    const loaded = readRawConfig(options.configPath, errors);
    if (!loaded) return { success: false, errors };
    raw = loaded;
  }

  const baseSetting =
    getEnv(env, 'RELAY_BASE') ??
    readString(raw['base-dir'], 'base-dir', errors) ??
    path.join('~', 'Downloads', 'folder-relay');
  const baseDir = path.resolve(expandHome(baseSetting, homeDir));

  const cacheSetting = getEnv(env, 'RELAY_CACHE_MODE') ?? readString(raw['cache-mode'], 'cache-mode', errors);
  let cacheMode: CacheMode = 'permissive';
  if (cacheSetting !== undefined) {
    if (isCacheMode(cacheSetting)) {
      cacheMode = cacheSetting;
    } else {
      errors.push({ field: 'cache-mode', message: `Must be one of ${CACHE_MODES.join(', ')}` });
    }
  }

  const pick = (envKey: string, yamlKey: ScalarKey, min: number, fallback: number): number =>
    readInteger(getEnv(env, envKey), envKey, errors, min) ??
    readInteger(raw[yamlKey], yamlKey, errors, min) ??
    fallback;

  const config: RelayConfig = {
    baseDir,
    routes: resolveRoutes(raw, env, homeDir, errors),
    port: pick('RELAY_PORT', 'port', 0, DEFAULT_PORT),
    host: getEnv(env, 'RELAY_HOST') ?? readString(raw.host, 'host', errors) ?? DEFAULT_HOST,
    cacheMode,
    pollIntervalMs: pick('RELAY_POLL_INTERVAL_MS', 'poll-interval-ms', 1, 1000),
    waitIntervalMs: pick('RELAY_WAIT_INTERVAL_MS', 'wait-interval-ms', 1, 500),
    waitTimeoutMs: pick('RELAY_WAIT_TIMEOUT_MS', 'wait-timeout-ms', 0, 0),
    headerPolicy: resolveHeaderPolicy(raw.headers, errors),
    logLevel: getEnv(env, 'LOG_LEVEL') ?? 'info',
    nodeEnv: getEnv(env, 'NODE_ENV') ?? 'development',
  };

  if (config.port > 65535) {
    errors.push({ field: 'RELAY_PORT', message: 'Must not exceed 65535' });
  }

  if (errors.length > 0) {
    return { success: false, errors };
  }
  return { success: true, config };
}

/** One line per validation error, for printing */
export function formatConfigErrors(errors: ConfigValidationError[]): string {
  return errors.map((e) => `  ${e.field}: ${e.message}`).join('\n');
}
