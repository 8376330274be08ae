// Rel command: relation names derived from type names

import { Command } from 'commander';
import { DelegatingLinkRelationProvider } from '../../services/relation/index.js';
import { withErrorHandling } from '../utils/error-handler.js';

export function deriveRelation(
  typeName: string,
  collection: boolean = false,
  provider: DelegatingLinkRelationProvider = new DelegatingLinkRelationProvider()
): string {
  return collection ? provider.getCollectionResourceRelFor(typeName) : provider.getItemResourceRelFor(typeName);
}

export function registerRelCommand(program: Command): void {
  program
    .command('rel <type-name>')
    .description('Print the relation derived from a type name')
    .option('--collection', 'Print the collection relation')
    .action(withErrorHandling((typeName: string, options: { collection?: boolean }) => {
      console.log(deriveRelation(typeName, options.collection ?? false));
    }));
}
