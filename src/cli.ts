#!/usr/bin/env node
/**
 * CLI Entry Point
 * Usage: school-crawler <command>
 */

import { runBilingualNormalizeJob, runCrawlJob, runDetailsJob, runDirectoryJob, runNormalizeJob } from './jobs';

const COMMANDS: Record<string, { description: string; run: () => Promise<unknown> }> = {
  crawl: {
    description: 'Crawl every seed in the seeds file and write the page batch',
    run: () => runCrawlJob(),
  },
  normalize: {
    description: 'Aggregate the page batch into one record per site',
    run: () => runNormalizeJob(),
  },
  directory: {
    description: 'Scrape the directory listing pages, then fetch school details',
    run: async () => {
      await runDirectoryJob();
      console.log('Starting to update schools with detailed information...');
      await runDetailsJob();
    },
  },
  details: {
    description: 'Fetch details for saved school cards that have none yet',
    run: () => runDetailsJob(),
  },
  'normalize-bilingual': {
    description: 'Merge the English and Japanese directory exports',
    run: () => runBilingualNormalizeJob(),
  },
};

function printUsage(): void {
  console.log('Usage: school-crawler <command>\n\nCommands:');
  for (const [name, command] of Object.entries(COMMANDS)) {
    console.log(`  ${name.padEnd(22)}${command.description}`);
  }
}

const main = async (): Promise<void> => {
  const name = process.argv[2];
  const command = name ? COMMANDS[name] : undefined;

  if (!command) {
    printUsage();
    process.exitCode = name ? 1 : 0;
    return;
  }

  await command.run();
};

main().catch((error: unknown) => {
  console.error('❌ Fatal error', error);
  process.exitCode = 1;
});
