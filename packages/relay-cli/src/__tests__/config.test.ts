import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { DEFAULT_HEADER_POLICY } from '@folder-relay/core';
import { expandHome, formatConfigErrors, loadConfig, routeEnvKey } from '../config.js';

const HOME = '/home/tester';

describe('routeEnvKey', () => {
  it('should upper-case the route and replace punctuation', () => {
    expect(routeEnvKey('dev')).toBe('RELAY_DEV');
    expect(routeEnvKey('my-api')).toBe('RELAY_MY_API');
    expect(routeEnvKey('qa', '_CURL_TEMPLATE')).toBe('RELAY_QA_CURL_TEMPLATE');
  });
});

describe('expandHome', () => {
  it('should only expand a leading tilde', () => {
    expect(expandHome('~', HOME)).toBe(HOME);
    expect(expandHome('~/relay', HOME)).toBe('/home/tester/relay');
    expect(expandHome('/srv/~relay', HOME)).toBe('/srv/~relay');
  });
});

describe('loadConfig from the environment', () => {
  it('should apply defaults around the required route settings', () => {
    const result = loadConfig({
      env: { RELAY_ROUTES: 'dev', RELAY_DEV: 'http://api.internal/' },
      homeDir: HOME,
    });

    expect(result).toEqual({
      success: true,
      config: {
        baseDir: '/home/tester/Downloads/folder-relay',
        routes: [{ name: 'dev', backendUrl: 'http://api.internal' }],
        port: 19790,
        host: '0.0.0.0',
        cacheMode: 'permissive',
        pollIntervalMs: 1000,
        waitIntervalMs: 500,
        waitTimeoutMs: 0,
        headerPolicy: DEFAULT_HEADER_POLICY,
        logLevel: 'info',
        nodeEnv: 'development',
      },
    });
  });

  it('should read every override', () => {
    const result = loadConfig({
      env: {
        RELAY_BASE: '~/shared',
        RELAY_ROUTES: 'dev, qa',
        RELAY_DEV: 'http://dev.internal',
        RELAY_QA: 'https://qa.internal:8443',
        RELAY_CURL_TEMPLATE: '~/tpl/curl.sh',
        RELAY_QA_CURL_TEMPLATE: '/etc/relay/qa.sh',
        RELAY_PORT: '8080',
        RELAY_HOST: '127.0.0.1',
        RELAY_CACHE_MODE: 'strict',
        RELAY_POLL_INTERVAL_MS: '250',
        RELAY_WAIT_INTERVAL_MS: '100',
        RELAY_WAIT_TIMEOUT_MS: '60000',
        LOG_LEVEL: 'debug',
        NODE_ENV: 'production',
      },
      homeDir: HOME,
    });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.config).toMatchObject({
      baseDir: '/home/tester/shared',
      routes: [
        { name: 'dev', backendUrl: 'http://dev.internal', curlTemplatePath: '/home/tester/tpl/curl.sh' },
        { name: 'qa', backendUrl: 'https://qa.internal:8443', curlTemplatePath: '/etc/relay/qa.sh' },
      ],
      port: 8080,
      host: '127.0.0.1',
      cacheMode: 'strict',
      pollIntervalMs: 250,
      waitIntervalMs: 100,
      waitTimeoutMs: 60000,
      logLevel: 'debug',
      nodeEnv: 'production',
    });
  });

  it('should require a backend URL for every route', () => {
    const result = loadConfig({
      env: { RELAY_ROUTES: 'dev,qa', RELAY_DEV: 'http://dev.internal' },
      homeDir: HOME,
    });

    expect(result).toEqual({
      success: false,
      errors: [{ field: 'routes.qa.backend-url', message: "No backend URL for route 'qa': set RELAY_QA" }],
    });
  });

  it('should require at least one route', () => {
    expect(loadConfig({ env: {}, homeDir: HOME })).toEqual({
      success: false,
      errors: [{ field: 'routes', message: 'No routes configured; e.g. RELAY_ROUTES=dev,qa' }],
    });
  });

  it('should reject a non-http backend URL', () => {
    const result = loadConfig({ env: { RELAY_ROUTES: 'dev', RELAY_DEV: 'ftp://x' }, homeDir: HOME });
    expect(result).toEqual({
      success: false,
      errors: [{ field: 'routes.dev.backend-url', message: 'Not an http(s) URL: ftp://x' }],
    });
  });

  it('should report invalid values', () => {
    const result = loadConfig({
      env: {
        RELAY_ROUTES: 'dev',
        RELAY_DEV: 'http://dev.internal',
        RELAY_CACHE_MODE: 'sometimes',
        RELAY_POLL_INTERVAL_MS: 'fast',
      },
      homeDir: HOME,
    });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.errors).toEqual([
      { field: 'cache-mode', message: 'Must be one of permissive, strict' },
      { field: 'RELAY_POLL_INTERVAL_MS', message: "Must be an integer >= 1, got 'fast'" },
    ]);
    expect(formatConfigErrors(result.errors)).toBe(
      "  cache-mode: Must be one of permissive, strict\n  RELAY_POLL_INTERVAL_MS: Must be an integer >= 1, got 'fast'"
    );
  });
});

describe('loadConfig from YAML', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(content: string): string {
    const file = path.join(tmpDir, 'relay.yaml');
    fs.writeFileSync(file, content);
    return file;
  }

  it('should read kebab-case settings and let the environment win', () => {
    const configPath = writeConfig(
      [
        'base-dir: /srv/relay',
        'cache-mode: strict',
        'port: 8080',
        'wait-timeout-ms: 30000',
        'routes:',
        '  dev:',
        '    backend-url: http://dev.internal',
        '  qa:',
        '    backend-url: http://qa.internal',
        '    curl-template: /opt/qa.sh',
        'headers:',
        '  pass: [content-type, accept]',
      ].join('\n')
    );

    const result = loadConfig({ configPath, env: { RELAY_PORT: '9000' }, homeDir: HOME });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.config.baseDir).toBe('/srv/relay');
    expect(result.config.cacheMode).toBe('strict');
    expect(result.config.port).toBe(9000);
    expect(result.config.waitTimeoutMs).toBe(30000);
    expect(result.config.routes).toEqual([
      { name: 'dev', backendUrl: 'http://dev.internal' },
      { name: 'qa', backendUrl: 'http://qa.internal', curlTemplatePath: '/opt/qa.sh' },
    ]);
    expect(result.config.headerPolicy).toEqual({
      ...DEFAULT_HEADER_POLICY,
      passHeaders: ['content-type', 'accept'],
    });
  });

  it('should add environment routes to YAML routes', () => {
    const configPath = writeConfig('routes:\n  dev:\n    backend-url: http://dev.internal\n');

    const result = loadConfig({
      configPath,
      env: { RELAY_ROUTES: 'prod', RELAY_PROD: 'http://prod.internal' },
      homeDir: HOME,
    });

    expect(result.success && result.config.routes.map((r) => r.name)).toEqual(['dev', 'prod']);
  });

  it('should reject a header list that is not a list of strings', () => {
    const configPath = writeConfig('routes:\n  dev:\n    backend-url: http://dev.internal\nheaders:\n  hash: content-type\n');

    expect(loadConfig({ configPath, env: {}, homeDir: HOME })).toEqual({
      success: false,
      errors: [{ field: 'headers.hash', message: 'Must be a list of strings' }],
    });
  });

  it('should report YAML syntax errors', () => {
    const configPath = writeConfig('routes: [unclosed');

    const result = loadConfig({ configPath, env: {}, homeDir: HOME });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.errors[0]?.field).toBe('yaml');
    expect(result.errors[0]?.message).toMatch(/^Failed to parse YAML: /);
  });

  it('should report a missing file', () => {
    const result = loadConfig({ configPath: path.join(tmpDir, 'missing.yaml'), env: {}, homeDir: HOME });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.field).toBe('configPath');
  });
});
