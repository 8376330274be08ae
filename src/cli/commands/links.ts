// Links command: Link header to HAL or JSON

import { Command } from 'commander';
import { ValidationError } from '../../core/errors.js';
import { Links } from '../../models/links.js';
import { ConfigService } from '../../services/config/index.js';
import { HalSerializer, type HalOptions } from '../../services/serialization/index.js';
import { withErrorHandling } from '../utils/error-handler.js';

export type LinksFormat = 'hal' | 'json';

export function parseFormat(value: string): LinksFormat {
  if (value === 'hal' || value === 'json') {
    return value;
  }
  throw new ValidationError(`Unknown format "${value}", expected hal or json`, 'format');
}

/**
 * Renders a Link header as a HAL `_links` object or a JSON array of links
 */
export function renderLinkHeader(header: string, format: LinksFormat, halOptions: Partial<HalOptions> = {}): string {
  const links = Links.parse(header);
  const output = format === 'hal' ? new HalSerializer(halOptions).renderLinks(links) ?? {} : links.toJSON();
  return JSON.stringify(output, null, 2);
}

export function registerLinksCommand(program: Command): void {
  program
    .command('links <header>')
    .description('Parse an RFC 8288 Link header')
    .option('-f, --format <format>', 'Output format (hal, json)', 'hal')
    .option('-d, --dir <path>', 'Directory containing halkit.yaml', process.cwd())
    .action(withErrorHandling(async (header: string, options: { format: string; dir: string }) => {
      const format = parseFormat(options.format);
      const config = new ConfigService({ baseDir: options.dir });
      await config.applyLogging();
      console.log(renderLinkHeader(header, format, await config.getHalOptions()));
    }));
}
