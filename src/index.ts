import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import Anthropic from '@anthropic-ai/sdk';
import { ensureOutputDir } from './cache';
import { loadConfig, SCRAPING_CONFIG } from './constants';
import { AnthropicRelationExtractor } from './relations';
import { buildReport, formatReport, toCsv } from './report';
import { RelationsPipeline } from './scraper';

export type ScriptName = 'roster' | 'relations' | 'report' | 'csv';

export interface CliOptions {
  script: ScriptName;
  forceRefresh: boolean;
  workers?: number;
  maxRetries?: number;
}

const SCRIPTS: readonly ScriptName[] = ['roster', 'relations', 'report', 'csv'];

function isScriptName(value: string): value is ScriptName {
  return SCRIPTS.some((script) => script === value);
}

function readIntFlag(args: string[], flag: string): number | undefined {
  const index = args.indexOf(flag);
  if (index === -1) return undefined;
  const value = parseInt(args[index + 1] ?? '', 10);
  return Number.isNaN(value) ? undefined : value;
}

/**
 * Parse `<script> [--force-refresh] [--workers N] [--max-retries N]`.
 * Returns null for an unknown script name.
 */
export function parseCliArgs(args: string[]): CliOptions | null {
  const first = args[0];
  const scriptArg = first && !first.startsWith('--') ? first.toLowerCase() : 'report';
  if (!isScriptName(scriptArg)) {
    return null;
  }

  return {
    script: scriptArg,
    forceRefresh: args.includes('--force-refresh'),
    workers: readIntFlag(args, '--workers'),
    maxRetries: readIntFlag(args, '--max-retries'),
  };
}

function printUsage(): void {
  console.log('\n📖 Available scripts:');
  console.log('  roster     - Scrape (or load) the list of MPs only');
  console.log('  relations  - Extract family political relations for every MP');
  console.log('  report     - Extract relations, then print the summary by party (default)');
  console.log('  csv        - Extract relations, then write one CSV row per MP');
  console.log('\n🔧 Options:');
  console.log('  --force-refresh   - Ignore legislators.json and scrape the roster again');
  console.log('  --workers N       - Number of concurrent workers');
  console.log('  --max-retries N   - Retries per MP before giving up on it');
  console.log('\n📋 Examples:');
  console.log('  npm run dev -- roster --force-refresh');
  console.log('  npm run dev -- report --workers 20');
}

async function main(): Promise<void> {
  const cli = parseCliArgs(process.argv.slice(2));
  if (!cli) {
    console.error(`❌ Unknown script: ${process.argv[2]}`);
    printUsage();
    process.exitCode = 1;
    return;
  }

  const env = loadConfig();
  const config = {
    ...env,
    concurrency: cli.workers ?? env.concurrency,
    maxRetries: cli.maxRetries ?? env.maxRetries,
  };
  ensureOutputDir(config.outputDir);

  const pipeline = new RelationsPipeline({ config });

  try {
    await pipeline.initialize();

    console.log(`🚀 Running script: ${cli.script}`);
    const stubs = await pipeline.loadRoster({ forceRefresh: cli.forceRefresh });

    if (cli.script === 'roster') {
      console.log('\nSample data:');
      console.log(JSON.stringify(stubs.slice(0, 3), null, 2));
      return;
    }

    // The client reads ANTHROPIC_API_KEY and throws when it is missing
    const extractor = new AnthropicRelationExtractor(new Anthropic(), {
      model: config.model,
      maxTokens: config.maxTokens,
    });

    console.log(`📋 Extracting relations for ${stubs.length} MPs...`);
    const result = await pipeline.extractRelations(stubs, extractor);

    if (result.failures.length > 0) {
      console.error(`\n${result.failures.length} MPs failed; re-run to retry them:`);
      for (const { stub, error } of result.failures) {
        console.error(`  #${stub.id} ${stub.name} (${stub.url}): ${error.message}`);
      }
      process.exitCode = 1;
    }

    if (cli.script === 'report') {
      console.log(`\n${formatReport(buildReport(result.records))}`);
    } else if (cli.script === 'csv') {
      const outputPath = join(config.outputDir, SCRAPING_CONFIG.FILES.CSV);
      writeFileSync(outputPath, toCsv(result.records), 'utf-8');
      console.log(`CSV saved to ${outputPath}`);
    }
  } catch (error) {
    console.error('Error:', error);
    process.exitCode = 1;
  } finally {
    await pipeline.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}

export { RelationsPipeline } from './scraper';
export * from './types';
