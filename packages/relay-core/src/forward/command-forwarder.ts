/**
 * Command strategy: forward through a caller-supplied shell template.
 *
 * Useful when the backend is only reachable through another tool, e.g. a
 * container exec wrapper that runs curl on the far side. The template is
 * rendered with these placeholders:
 *
 *   {{METHOD}}     HTTP method
 *   {{URL}}        full URL, shell-quoted
 *   {{HEADERS}}    -H 'Name: value' flags
 *   {{DATA}}       -d '...' flag (empty without a body)
 *   {{CURL_OPTS}}  -v, -X METHOD (non-GET), headers and data combined
 *
 * The command's output must contain curl's verbose trace; see curl-trace.ts.
 */

import { exec } from 'node:child_process';
import { readFile } from 'node:fs/promises';
import { promisify } from 'node:util';
import type { Logger } from 'pino';
import { toUtf8OrBase64 } from '../codec/data-codec.js';
import type { RawBody } from '../codec/types.js';
import type { HeaderMap } from '../transaction/types.js';
import { parseCurlTrace } from './curl-trace.js';
import { ForwardError } from './types.js';
import type { Forwarder, ForwardRequest, ForwardResponse } from './types.js';

const execAsync = promisify(exec);

/** Output of a finished shell command */
export interface ShellResult {
  stdout: string;
  stderr: string;
}

/**
 * Runs a command line through the shell. Rejects when the command exits
 * non-zero; the rejection should carry `stdout`/`stderr` like child_process.exec.
 */
export type ShellExecutor = (command: string) => Promise<ShellResult>;

export interface CommandForwarderOptions {
  /** Custom command executor (for testing) */
  execCommand?: ShellExecutor;
}

/** Template placeholder names */
export type TemplatePlaceholder = 'METHOD' | 'URL' | 'HEADERS' | 'DATA' | 'CURL_OPTS';

const defaultExec: ShellExecutor = async (command) => {
  const { stdout, stderr } = await execAsync(command, {
    maxBuffer: 50 * 1024 * 1024, // 50MB output buffer
    encoding: 'utf-8',
  });
  return { stdout, stderr };
};

/** Escape a value for use inside single quotes */
export function escapeSingleQuotes(value: string): string {
  return value.replace(/'/g, "'\\''");
}

/**
 * Quote a string as one shell word.
 * Safe words are left bare; anything else is single-quoted.
 */
export function shellQuote(value: string): string {
  if (value === '') return "''";
  if (/^[\w@%+=:,./-]+$/.test(value)) return value;
  return `'${escapeSingleQuotes(value)}'`;
}

/** `-H 'Name: value'` flags for every header; name and value are both quoted */
export function buildHeaderFlags(headers: HeaderMap): string {
  return Object.entries(headers)
    .map(([name, value]) => `-H '${escapeSingleQuotes(`${name}: ${value}`)}'`)
    .join(' ');
}

/** `-d '...'` flag for a body, or '' without one */
export function buildDataFlag(body: RawBody | undefined): string {
  if (body === undefined || body.length === 0) return '';
  return `-d '${escapeSingleQuotes(toUtf8OrBase64(body))}'`;
}

/** All curl flags for a request */
export function buildCurlOpts(method: string, headers: HeaderMap, body: RawBody | undefined): string {
  const opts = ['-v'];
  const upper = method.toUpperCase();
  if (upper !== 'GET') {
    opts.push(`-X ${shellQuote(upper)}`);
  }
  const headerFlags = buildHeaderFlags(headers);
  if (headerFlags) opts.push(headerFlags);
  const dataFlag = buildDataFlag(body);
  if (dataFlag) opts.push(dataFlag);
  return opts.join(' ');
}

/**
 * Substitute every `{{NAME}}` placeholder in a template.
 */
export function renderTemplate(
  template: string,
  values: Record<TemplatePlaceholder, string>
): string {
  let rendered = template;
  for (const [key, value] of Object.entries(values)) {
    rendered = rendered.split(`{{${key}}}`).join(value);
  }
  return rendered;
}

/** Render the template for one request */
export function renderCommand(template: string, request: ForwardRequest): string {
  return renderTemplate(template, {
    METHOD: shellQuote(request.method.toUpperCase()),
    URL: shellQuote(request.url),
    HEADERS: buildHeaderFlags(request.headers),
    DATA: buildDataFlag(request.body),
    CURL_OPTS: buildCurlOpts(request.method, request.headers, request.body),
  });
}

function readOutputField(err: unknown, field: 'stdout' | 'stderr'): string {
  if (err === null || typeof err !== 'object' || !(field in err)) return '';
  const value: unknown = Reflect.get(err, field);
  return typeof value === 'string' ? value : '';
}

function readExitCode(err: unknown): string {
  if (err === null || typeof err !== 'object' || !('code' in err)) return 'unknown';
  const value: unknown = Reflect.get(err, 'code');
  return typeof value === 'number' || typeof value === 'string' ? String(value) : 'unknown';
}

export class CommandForwarder implements Forwarder {
  readonly kind = 'command' as const;
  readonly template: string;
  private readonly logger: Logger;
  private readonly exec: ShellExecutor;

  constructor(template: string, logger: Logger, options?: CommandForwarderOptions) {
    this.template = template;
    this.logger = logger.child({ component: 'command-forwarder' });
    this.exec = options?.execCommand ?? defaultExec;
  }

  /**
   * Load a template from disk and build a forwarder around it.
   */
  static async fromTemplateFile(
    templatePath: string,
    logger: Logger,
    options?: CommandForwarderOptions
  ): Promise<CommandForwarder> {
    const template = await readFile(templatePath, 'utf-8');
    return new CommandForwarder(template, logger, options);
  }

  async forward(request: ForwardRequest): Promise<ForwardResponse> {
    const command = renderCommand(this.template, request);
    this.logger.debug({ method: request.method, url: request.url, command }, 'Running command template');

    let result: ShellResult;
    try {
      result = await this.exec(command);
    } catch (err) {
      const detail =
        readOutputField(err, 'stderr') ||
        readOutputField(err, 'stdout') ||
        (err instanceof Error ? err.message : String(err));
      throw new ForwardError(
        `Command template failed (exit ${readExitCode(err)}): ${detail.trim()}`,
        request.url,
        { cause: err }
      );
    }

    const output = [result.stdout.trim(), result.stderr.trim()].filter(Boolean).join('\n');
    const parsed = parseCurlTrace(output);

    this.logger.debug(
      {
        status: parsed.statusCode,
        statusText: parsed.statusText,
        headers: Object.keys(parsed.headers),
        debugLines: parsed.debugLines.length,
      },
      'Parsed command output'
    );

    return {
      statusCode: parsed.statusCode,
      statusText: parsed.statusText,
      headers: parsed.headers,
      body: parsed.body,
    };
  }
}
