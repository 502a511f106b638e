#!/usr/bin/env node
/**
 * Application Entry Point
 *
 * Commands:
 *   run      scrape -> publish -> commit (default; the weekly scheduled job)
 *   publish  republish the latest snapshot to the sheet only
 *   scrape   scrape and write a snapshot, nothing else
 *   commit   commit scraper_results/ if the snapshot changed
 *
 * All environment access happens here: config loaders turn process.env into
 * typed config objects that are passed down explicitly.
 *
 * Exit code 0 on success (including "no changes to commit"), 1 on any failure.
 *
 * Usage:
 *   Production: node dist/index.js run
 *   Development: npx tsx src/index.ts run
 */

import 'dotenv/config';

import { loadAppConfig, type AppConfig } from './config.js';
import { consoleLogger } from './logger.js';
import { runScrape, loadScraperConfig } from './scraper/index.js';
import {
  createSheetsClient,
  createSpreadsheetGateway,
  loadSheetsConfig,
  publishLatestSnapshot,
  type SheetsConfig,
} from './sheets/index.js';
import { commitResults, createGitRunner } from './commit/index.js';
import { runPipeline, type PipelineStages, type RunMode } from './pipeline/index.js';

const COMMANDS = ['run', 'publish', 'scrape', 'commit'] as const;
type Command = typeof COMMANDS[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some(c => c === value);
}

function publishStage(app: AppConfig, sheets: SheetsConfig): PipelineStages['publish'] {
  return () => publishLatestSnapshot(app.resultsDir, {
    gateway: createSpreadsheetGateway(createSheetsClient(sheets.credentials)),
    spreadsheetId: sheets.spreadsheetId,
  });
}

function commitStage(app: AppConfig): PipelineStages['commit'] {
  return () => commitResults({
    git: createGitRunner(process.cwd()),
    resultsDir: app.resultsDir,
    authorName: app.git.authorName,
    authorEmail: app.git.authorEmail,
    push: app.git.push,
  });
}

async function main() {
  const arg = process.argv[2] ?? 'run';
  if (!isCommand(arg)) {
    throw new Error(`Unknown command "${arg}". Expected one of: ${COMMANDS.join(', ')}`);
  }

  const env = process.env;
  const app = loadAppConfig(env);
  console.log(`[startup] Trust events sync: ${arg}`, { resultsDir: app.resultsDir });

  switch (arg) {
    case 'scrape': {
      await runScrape(loadScraperConfig(env), app.resultsDir);
      return;
    }
    case 'commit': {
      await commitStage(app)();
      return;
    }
    case 'run':
    case 'publish': {
      // Credentials are checked before any scraping so a misconfigured run fails fast
      const sheets = loadSheetsConfig(env);
      const mode: RunMode = arg === 'run' ? 'full' : 'sheet-only';
      const scraperConfig = mode === 'full' ? loadScraperConfig(env) : null;

      await runPipeline({
        mode,
        lock: app.lock,
        stages: {
          scrape: async () => {
            if (!scraperConfig) throw new Error('Scrape stage is not part of a sheet-only run');
            return runScrape(scraperConfig, app.resultsDir);
          },
          publish: publishStage(app, sheets),
          commit: commitStage(app),
        },
      });
      return;
    }
  }
}

main().catch((err) => {
  consoleLogger.error('[startup] Fatal error', { error: err instanceof Error ? `${err.name}: ${err.message}` : String(err) });
  process.exit(1);
});
