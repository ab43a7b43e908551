/**
 * Command line surface:
 *   --source <name>      scrape one source
 *   --all                scrape every registered source
 *   --max-stories <n>    limit detail pages per source
 *   --list               print the registered source names
 */

import { listAdapterNames } from './adapters';
import { ConfigurationError, errorMessage } from './types/errors';
import { loadEnvironmentConfig } from './config/environment';
import { logger } from './utils/logger';
import { runScrape, runScrapeAll, ScrapeOptions, ScrapeResult } from './scraper/runScrape';

export type CliCommand =
  | { kind: 'source'; source: string; maxStories?: number }
  | { kind: 'all'; maxStories?: number }
  | { kind: 'list' }
  | { kind: 'help' };

export const USAGE = [
  'Usage: newsroom-scrape (--source <name> | --all | --list) [--max-stories <n>]',
  '',
  '  --source <name>     Scrape a single source',
  '  --all               Scrape every available source',
  '  --max-stories <n>   Maximum number of stories to scrape per source',
  '  --list              Show available sources'
].join('\n');

function parsePositiveInt(flag: string, raw: string | undefined): number {
  const value = Number(raw);
  if (raw === undefined || !Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${flag} expects a positive integer, got "${raw ?? ''}"`);
  }
  return value;
}

/**
 * @throws ConfigurationError for unknown flags or invalid values
 */
export function parseCliArgs(argv: string[]): CliCommand {
  let source: string | undefined;
  let all = false;
  let list = false;
  let maxStories: number | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const [flag, inlineValue] = arg.startsWith('--') && arg.includes('=')
      ? [arg.slice(0, arg.indexOf('=')), arg.slice(arg.indexOf('=') + 1)]
      : [arg, undefined];
    const takeValue = () => inlineValue ?? argv[++i];

    switch (flag) {
      case '--source':
        source = takeValue();
        if (!source) throw new ConfigurationError('--source expects a source name');
        break;
      case '--all':
        all = true;
        break;
      case '--list':
        list = true;
        break;
      case '--max-stories':
        maxStories = parsePositiveInt('--max-stories', takeValue());
        break;
      case '--help':
      case '-h':
        return { kind: 'help' };
      default:
        throw new ConfigurationError(`Unknown argument: ${arg}`);
    }
  }

  if (list) return { kind: 'list' };
  if (source) return { kind: 'source', source, maxStories };
  if (all) return { kind: 'all', maxStories };
  return { kind: 'help' };
}

export function printSummary(results: ScrapeResult[]) {
  console.log('\n' + '═'.repeat(60));
  console.log('SCRAPING SUMMARY');
  console.log('═'.repeat(60));

  let total = 0;
  for (const result of results) {
    total += result.stories.length;
    console.log(`${result.name}: ${result.stories.length} stories (${result.discovered} discovered, ${result.failed} failed)`);
    if (result.outputPath) {
      console.log(`   Saved to ${result.outputPath}`);
    }
    for (const [index, story] of result.stories.slice(0, 3).entries()) {
      console.log(`   ${index + 1}. ${story.headline.slice(0, 80)}`);
    }
  }

  console.log(`Total stories across all sources: ${total}`);
}

/** Runs the CLI and resolves with the process exit code. */
export async function main(argv: string[], options: ScrapeOptions = {}): Promise<number> {
  try {
    const config = loadEnvironmentConfig();
    logger.setLevel(config.logging.level);

    const command = parseCliArgs(argv);
    switch (command.kind) {
      case 'help':
        console.log(USAGE);
        console.log(`\nAvailable sources: ${listAdapterNames().join(', ')}`);
        return 0;
      case 'list':
        for (const name of listAdapterNames()) console.log(name);
        return 0;
      case 'source': {
        const result = await runScrape(command.source, { ...options, maxStories: command.maxStories });
        printSummary([result]);
        return 0;
      }
      case 'all': {
        const results = await runScrapeAll({ ...options, maxStories: command.maxStories });
        printSummary(results);
        return 0;
      }
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    console.error(`Unexpected failure: ${errorMessage(error)}`);
    return 1;
  }
}
