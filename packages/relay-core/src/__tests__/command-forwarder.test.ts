import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { Logger } from 'pino';
import {
  CommandForwarder,
  buildCurlOpts,
  buildHeaderFlags,
  renderCommand,
  shellQuote,
} from '../forward/command-forwarder.js';
import type { ShellExecutor } from '../forward/command-forwarder.js';
import { ForwardError } from '../forward/types.js';

function createMockLogger(): Logger {
  return {
    child: () => createMockLogger(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

describe('shellQuote', () => {
  it('should leave safe words bare', () => {
    expect(shellQuote('http://api.internal/items')).toBe('http://api.internal/items');
  });

  it('should single-quote anything else', () => {
    expect(shellQuote('http://api.internal/items?a=1&b=2')).toBe("'http://api.internal/items?a=1&b=2'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
    expect(shellQuote('')).toBe("''");
  });
});

describe('buildCurlOpts', () => {
  it('should only add -v for a plain GET', () => {
    expect(buildCurlOpts('GET', {}, undefined)).toBe('-v');
  });

  it('should add method, headers and data', () => {
    expect(buildCurlOpts('put', { 'Content-Type': 'text/plain', 'X-A': 'b' }, 'hi')).toBe(
      "-v -X PUT -H 'Content-Type: text/plain' -H 'X-A: b' -d 'hi'"
    );
  });
});

describe('buildHeaderFlags', () => {
  it('should keep quotes and substitutions in header names inside one shell word', () => {
    expect(buildHeaderFlags({ "x-a'`echo INJECTED`'": 'v' })).toBe(
      "-H 'x-a'\\''`echo INJECTED`'\\'': v'"
    );
  });

  it('should quote values the same way', () => {
    expect(buildHeaderFlags({ 'X-Note': "a'$(id)'" })).toBe("-H 'X-Note: a'\\''$(id)'\\'''");
  });
});

describe('renderCommand', () => {
  it('should fill the combined options placeholder', () => {
    const command = renderCommand('curl {{CURL_OPTS}} {{URL}}', {
      method: 'POST',
      url: 'http://api.internal/items?a=1&b=2',
      headers: { 'Content-Type': 'application/json' },
      body: `{"name":"it's"}`,
    });
    expect(command).toBe(
      `curl -v -X POST -H 'Content-Type: application/json' -d '{"name":"it'\\''s"}' 'http://api.internal/items?a=1&b=2'`
    );
  });

  it('should fill the individual placeholders', () => {
    const command = renderCommand(
      'docker exec box curl -v -X {{METHOD}} {{HEADERS}} {{DATA}} {{URL}}',
      { method: 'get', url: 'http://api.internal/items', headers: { Accept: 'text/html' } }
    );
    expect(command).toBe("docker exec box curl -v -X GET -H 'Accept: text/html'  http://api.internal/items");
  });

  it('should replace every occurrence of a placeholder', () => {
    expect(
      renderCommand('echo {{METHOD}} {{METHOD}}', { method: 'DELETE', url: 'http://x', headers: {} })
    ).toBe('echo DELETE DELETE');
  });

  it('should quote a method that is not a plain word', () => {
    expect(
      renderCommand('echo {{METHOD}} {{CURL_OPTS}}', { method: 'get;id', url: 'http://x', headers: {} })
    ).toBe("echo 'GET;ID' -v -X 'GET;ID'");
  });
});

describe('CommandForwarder', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-cmd-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should parse the trace from combined stdout and stderr', async () => {
    const execCommand = vi.fn<ShellExecutor>().mockResolvedValue({
      stdout: '{"ok":true}\n',
      stderr: '* Connected\n< HTTP/1.1 201 Created\n< Content-Type: application/json\n',
    });
    const forwarder = new CommandForwarder('curl {{CURL_OPTS}} {{URL}}', createMockLogger(), {
      execCommand,
    });

    const response = await forwarder.forward({
      method: 'GET',
      url: 'http://api.internal/items',
      headers: {},
    });

    expect(execCommand).toHaveBeenCalledWith('curl -v http://api.internal/items');
    expect(response).toEqual({
      statusCode: 201,
      statusText: 'Created',
      headers: { 'content-type': 'application/json' },
      body: '{"ok":true}',
    });
  });

  it('should raise a ForwardError carrying stderr on non-zero exit', async () => {
    const failure = Object.assign(new Error('Command failed'), {
      code: 7,
      stdout: '',
      stderr: 'curl: (7) Failed to connect\n',
    });
    const forwarder = new CommandForwarder('curl {{URL}}', createMockLogger(), {
      execCommand: vi.fn<ShellExecutor>().mockRejectedValue(failure),
    });

    const attempt = forwarder.forward({ method: 'GET', url: 'http://api.internal', headers: {} });

    await expect(attempt).rejects.toBeInstanceOf(ForwardError);
    await expect(attempt).rejects.toThrow('Command template failed (exit 7): curl: (7) Failed to connect');
  });

  it('should load its template from a file', async () => {
    const templatePath = path.join(tmpDir, 'curl.tpl');
    fs.writeFileSync(templatePath, 'curl {{CURL_OPTS}} {{URL}}');

    const forwarder = await CommandForwarder.fromTemplateFile(templatePath, createMockLogger());

    expect(forwarder.kind).toBe('command');
    expect(forwarder.template).toBe('curl {{CURL_OPTS}} {{URL}}');
  });
});
