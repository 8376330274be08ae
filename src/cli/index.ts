#!/usr/bin/env node
// halkit CLI

import { Command } from 'commander';
import { registerCurieCommand } from './commands/curie.js';
import { registerExpandCommands } from './commands/expand.js';
import { registerLinksCommand } from './commands/links.js';
import { registerRelCommand } from './commands/rel.js';
import { handleError } from './utils/error-handler.js';

const program = new Command();

program
  .name('halkit')
  .description('Hypermedia tooling: URI templates, relations, Link headers and curies')
  .version('0.1.0');

registerExpandCommands(program);
registerRelCommand(program);
registerLinksCommand(program);
registerCurieCommand(program);

program.parseAsync().catch(handleError);
