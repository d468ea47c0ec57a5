export { ForwardError } from './types.js';
export type {
  Forwarder,
  ForwarderKind,
  ForwardRequest,
  ForwardResponse,
} from './types.js';
export { DirectForwarder } from './direct-forwarder.js';
export type { DirectForwarderOptions } from './direct-forwarder.js';
export {
  CommandForwarder,
  renderCommand,
  renderTemplate,
  buildCurlOpts,
  buildHeaderFlags,
  buildDataFlag,
  shellQuote,
  escapeSingleQuotes,
} from './command-forwarder.js';
export type {
  CommandForwarderOptions,
  ShellExecutor,
  ShellResult,
  TemplatePlaceholder,
} from './command-forwarder.js';
export {
  parseCurlTrace,
  parseStatusLine,
  parseHeaderLine,
  NO_STATUS_LINE_STATUS,
} from './curl-trace.js';
export type { ParsedCurlTrace } from './curl-trace.js';
export { createForwarder } from './factory.js';
export type { CreateForwarderOptions } from './factory.js';
