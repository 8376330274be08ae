// Curie command: namespaced relation names

import { Command } from 'commander';
import { ValidationError } from '../../core/errors.js';
import { validateRel } from '../../core/validation.js';
import { ConfigService } from '../../services/config/index.js';
import { DefaultCurieProvider, type CurieProvider } from '../../services/curie/index.js';
import { withErrorHandling } from '../utils/error-handler.js';
import { collect, parseAssignments } from '../utils/options.js';

/**
 * Curie provider from `name=template` pairs
 */
export function curiesFromAssignments(assignments: readonly string[], defaultName?: string): DefaultCurieProvider {
  const curies: Record<string, string> = {};
  for (const [name, template] of Object.entries(parseAssignments(assignments, 'curie'))) {
    if (typeof template !== 'string') {
      throw new ValidationError(`Curie "${name}" is given more than once`, 'curie');
    }
    curies[name] = template;
  }
  return new DefaultCurieProvider(curies, defaultName);
}

/**
 * The relation as rendered; unchanged without a curie provider
 */
export function namespaceRel(rel: string, provider: CurieProvider | undefined): string {
  const validated = validateRel(rel);
  return provider ? provider.getNamespacedRelFrom(validated) : validated;
}

export function registerCurieCommand(program: Command): void {
  program
    .command('curie <rel>')
    .description('Print a relation with the default curie applied')
    .option('-c, --curie <name=template>', 'Curie definition; defaults to halkit.yaml', collect, [])
    .option('--default <name>', 'Default curie name')
    .option('-d, --dir <path>', 'Directory containing halkit.yaml', process.cwd())
    .action(withErrorHandling(async (rel: string, options: { curie: string[]; default?: string; dir: string }) => {
      const provider = options.curie.length > 0
        ? curiesFromAssignments(options.curie, options.default)
        : await new ConfigService({ baseDir: options.dir }).getCurieProvider();
      console.log(namespaceRel(rel, provider));
    }));
}
