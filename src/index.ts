#!/usr/bin/env node
import 'dotenv/config';
import path from 'node:path';
import readline from 'node:readline';
import { parseCommand, runCommand, formatStats, HELP } from './commands.js';
import { determineAutoWorkers, loadConfig } from './config.js';
import { Crawler } from './crawler.js';
import { buildPool, PoolDatabase } from './db.js';
import { PgFrontierStore } from './frontier.js';
import { HttpClient } from './http.js';
import { migrate } from './migrate.js';
import { JsonlSink } from './storage.js';

async function main() {
  const cmd = process.argv[2] || 'help';
  const args = process.argv.slice(3);
  switch (cmd) {
    case 'crawl':
      await runCrawl(args);
      break;
    case 'seed':
      await runSeed(args);
      break;
    case 'stats':
      await runStats();
      break;
    case 'migrate':
      await runMigrate();
      break;
    case 'help':
    default:
      printHelp();
  }
}

async function openCrawler(): Promise<Crawler> {
  const cfg = loadConfig();
  const db = new PoolDatabase(buildPool());
  await migrate(db);
  const store = new PgFrontierStore(db, { maxRetries: cfg.maxRetries });
  const fetcher = new HttpClient({ userAgent: cfg.userAgent, timeoutMs: cfg.timeoutMs });
  const sink = new JsonlSink(path.resolve(cfg.outputPath));
  return new Crawler(store, fetcher, sink, cfg);
}

async function runCrawl(seeds: string[]) {
  const crawler = await openCrawler();
  await crawler.init();
  for (const s of seeds) {
    for (const line of await runCommand(crawler, { name: 'seed', arg: s })) console.log(line);
  }
  crawler.start();
  console.log("Crawler started. Type 'help' for commands.");

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' });
  rl.on('SIGINT', () => rl.close());
  process.once('SIGINT', () => rl.close());
  rl.prompt();
  for await (const line of rl) {
    const parsed = parseCommand(line);
    if (parsed) {
      for (const out of await runCommand(crawler, parsed)) console.log(out);
      if (parsed.name === 'stop') break;
    }
    rl.prompt();
  }
  rl.close();
  // EOF, Ctrl-C or `stop`; stop() is idempotent
  await crawler.stop();
}

async function runSeed(urls: string[]) {
  const crawler = await openCrawler();
  try {
    for (const u of urls) {
      for (const line of await runCommand(crawler, { name: 'seed', arg: u })) console.log(line);
    }
  } finally {
    await crawler.stop();
  }
}

async function runStats() {
  const crawler = await openCrawler();
  try {
    for (const line of formatStats(await crawler.stats())) console.log(line);
  } finally {
    await crawler.stop();
  }
}

async function runMigrate() {
  const db = new PoolDatabase(buildPool());
  try {
    const applied = await migrate(db);
    console.log(`[migrate] ${applied.length} migration(s) applied`);
  } finally {
    await db.end();
  }
}

function printHelp() {
  console.log('Usage:');
  console.log('  npm run crawl -- [seed-url...]   # start workers, then read commands from stdin');
  console.log('  npm run seed -- <url...>         # register seed URLs (pages or sitemaps)');
  console.log('  npm run stats                    # print frontier statistics');
  console.log('  npm run migrate                  # create/upgrade the frontier tables');
  console.log('');
  for (const line of HELP) console.log(line);
  console.log('');
  console.log('Env:');
  console.log('  DATABASE_URL=postgres://... (or PGHOST/PGPORT/PGUSER/PGPASSWORD/PGDATABASE)');
  console.log(`  WORKERS=0 (auto: ${determineAutoWorkers()}) DELAY_MS=1000 MAX_RETRIES=3 RETRY_BACKOFF_MS=5000`);
  console.log('  TIMEOUT_MS=15000 USER_AGENT=... OUTPUT_PATH=data/scraped_data.jsonl EXCERPT_LENGTH=500');
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
