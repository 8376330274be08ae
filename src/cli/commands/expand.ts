// Expand and variables commands: URI template tooling

import { Command } from 'commander';
import { UriTemplate } from '../../services/uri-template/index.js';
import { withErrorHandling } from '../utils/error-handler.js';
import { collect, parseAssignments } from '../utils/options.js';

/**
 * Expands a template with `key=value` bindings
 */
export function expandTemplate(template: string, assignments: readonly string[] = []): string {
  return UriTemplate.of(template).expand(parseAssignments(assignments, 'param'));
}

export function listVariables(template: string): string[] {
  return UriTemplate.of(template).getVariableNames();
}

export function registerExpandCommands(program: Command): void {
  program
    .command('expand <template>')
    .description('Expand a URI template')
    .option('-p, --param <key=value>', 'Variable binding; repeat a key to bind a list', collect, [])
    .action(withErrorHandling((template: string, options: { param: string[] }) => {
      console.log(expandTemplate(template, options.param));
    }));

  program
    .command('variables <template>')
    .description('List the variables of a URI template')
    .action(withErrorHandling((template: string) => {
      for (const name of listVariables(template)) {
        console.log(name);
      }
    }));
}
