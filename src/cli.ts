#!/usr/bin/env node
/**
 * cli.ts
 * Command-line entry point
 */
import 'reflect-metadata';
import { config, Config } from './config';
import { ProcessingPipeline } from './pipeline/ProcessingPipeline';
import { listResults } from './utils/resultStore';
import { emojiLogger } from './utils/emojiLogger';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logger';

export const USAGE = `Usage: research-doc-parser <command> [options]

Commands:
  parse-local <path>        Parse a local file, or every supported file in a directory
      --force               Reprocess files that already have a result
      --parse-mode <mode>   ParseX pdf_parse_mode (default from TEXTIN_PARSE_MODE)
  re-extract <sha-prefix>   Run metadata extraction again for a stored document
      --force               Redo an extraction that already completed
  status                    Summarise stored results
  help                      Show this message

Global options:
  --verbose                 Debug logging`;

export interface ParsedArgs {
  command?: string;
  positionals: string[];
  flags: Set<string>;
  options: Map<string, string>;
}

const VALUE_OPTIONS = new Set(['--parse-mode']);

export function parseArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Set<string>();
  const options = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith('--')) {
      const [name, inline] = arg.split(/=(.*)/s, 2);
      if (VALUE_OPTIONS.has(name)) {
        const value = inline ?? argv[++i];
        if (value !== undefined) {
          options.set(name, value);
        }
      } else {
        flags.add(name);
      }
    } else {
      positionals.push(arg);
    }
  }

  const [command, ...rest] = positionals;
  return { command, positionals: rest, flags, options };
}

function countBy<T>(items: T[], key: (item: T) => string): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const k = key(item);
    counts.set(k, (counts.get(k) ?? 0) + 1);
  }
  return [...counts].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}

async function parseLocal(pipeline: ProcessingPipeline, args: ParsedArgs): Promise<number> {
  const [target] = args.positionals;
  if (!target) {
    console.error('parse-local needs a file or directory path');
    return 1;
  }

  const { outcomes, stats } = await pipeline.processPath(target, {
    force: args.flags.has('--force'),
    parseMode: args.options.get('--parse-mode'),
  });

  for (const outcome of outcomes) {
    if (!outcome.success) {
      console.error(`Failed: ${outcome.filePath}: ${outcome.error?.message ?? 'unknown error'}`);
    } else if (outcome.record) {
      console.log(`Done. ${outcome.record.sha256} ${outcome.record.fileName}`);
    } else {
      console.log(`Skipped (already processed): ${outcome.filePath}`);
    }
  }

  if (outcomes.length > 1) {
    console.log(`${stats.successfulItems}/${stats.totalItems} succeeded`);
  }
  return stats.failedItems > 0 ? 1 : 0;
}

async function reExtract(pipeline: ProcessingPipeline, args: ParsedArgs): Promise<number> {
  const [prefix] = args.positionals;
  if (!prefix) {
    console.error('re-extract needs a hash prefix');
    return 1;
  }

  const record = await pipeline.reExtract(prefix, { force: args.flags.has('--force') });
  if (!record) {
    console.log(`Skipped (extraction already completed, use --force): ${prefix}`);
    return 0;
  }
  if (record.extraction?.status !== 'completed') {
    console.error(`Extraction failed: ${record.extraction?.errorMessage ?? 'unknown error'}`);
    return 1;
  }
  console.log(`Re-extracted ${record.sha256}`);
  console.log(`  Title:  ${record.title ?? '-'}`);
  console.log(`  Broker: ${record.broker ?? '-'}`);
  return 0;
}

async function status(settings: Config): Promise<number> {
  const records = await listResults(settings.paths.extractionDir);
  if (records.length === 0) {
    console.log('No results found.');
    return 0;
  }

  console.log(`Results: ${records.length}`);
  console.log('By source:');
  for (const [source, count] of countBy(records, r => r.source)) {
    console.log(`  ${source}: ${count}`);
  }
  console.log('Top brokers:');
  for (const [broker, count] of countBy(records, r => r.broker ?? '(unknown)').slice(0, 10)) {
    console.log(`  ${broker}: ${count}`);
  }
  const failed = records.filter(r => r.extraction?.status === 'failed').length;
  if (failed > 0) {
    console.log(`Extraction failed: ${failed}`);
  }
  return 0;
}

/**
 * Run one command and return the process exit code
 */
export async function runCli(
  argv: string[],
  settings: Config = config,
  createPipeline: () => ProcessingPipeline = () => new ProcessingPipeline(settings)
): Promise<number> {
  const args = parseArgs(argv);
  if (args.flags.has('--verbose')) {
    logger.setLogLevel('debug');
  }

  try {
    switch (args.command) {
      case 'parse-local':
        return await parseLocal(createPipeline(), args);
      case 're-extract':
        return await reExtract(createPipeline(), args);
      case 'status':
        return await status(settings);
      case undefined:
      case 'help':
        console.log(USAGE);
        return 0;
      default:
        console.error(`Unknown command: ${args.command}\n`);
        console.error(USAGE);
        return 1;
    }
  } catch (error) {
    emojiLogger.error(`${args.command} failed`, error);
    console.error(`Error: ${errorMessage(error)}`);
    return 1;
  }
}

// Run the main function if this file is executed directly
if (require.main === module) {
  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      emojiLogger.error('Unhandled error:', error);
      process.exitCode = 1;
    });
}
