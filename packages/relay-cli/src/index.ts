/**
 * folder-relay CLI - relay HTTP requests through a shared folder tree
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import { registerClientCommand } from './commands/client.js';
import { registerServerCommand } from './commands/server.js';
import { registerInspectCommand } from './commands/inspect.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = new Command();

program
  .name('folder-relay')
  .description('Relay HTTP requests between machines through a shared folder tree')
  .version(pkg.version)
  .option('-c, --config <file>', 'YAML config file')
  .option('--env-file <file>', 'Env file to load (default: .env)');

// folder-relay client | server
registerClientCommand(program);
registerServerCommand(program);

// folder-relay inspect <route> [name]
registerInspectCommand(program);

await program.parseAsync();
