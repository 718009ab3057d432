/**
 * Torrent Forge CLI
 * Command-line interface for serving, parsing, generating and inspecting torrents
 */

import { readFile, writeFile } from 'fs/promises';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { createLogger } from '@torrent-forge/plugin-utils';
import { loadConfig } from './config.js';
import { createServer } from './server.js';
import { createPipeline } from './services.js';
import { FilenameParser } from './parsers/filename-parser.js';
import { inspectTorrent } from './torrent/inspect.js';

const logger = createLogger('torrent-forge:cli');
const program = new Command();

program
  .name('torrent-forge')
  .description('Serve synthetic .torrent files named after requested releases')
  .version('1.0.0');

function fail(message: string): never {
  console.error(chalk.red(message));
  process.exit(1);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatBytes(bytes: number | bigint): string {
  const value = Number(bytes);
  if (value < 1024 * 1024) return `${(value / 1024).toFixed(2)} KB`;
  if (value < 1024 * 1024 * 1024) return `${(value / (1024 * 1024)).toFixed(2)} MB`;
  return `${(value / (1024 * 1024 * 1024)).toFixed(2)} GB`;
}

// ============================================================================
// Server Command
// ============================================================================

program
  .command('server')
  .description('Start the HTTP server')
  .option('-p, --port <port>', 'Server port')
  .option('-H, --host <host>', 'Server host')
  .action(async (options: { port?: string; host?: string }) => {
    try {
      const config = loadConfig({
        ...(options.port !== undefined ? { port: parseInt(options.port, 10) } : {}),
        ...(options.host !== undefined ? { host: options.host } : {}),
      });
      logger.setLevel(config.logLevel);

      logger.info('Starting torrent forge server...', { mode: config.mode });
      const server = await createServer(config);
      await server.start();

      const shutdown = () => {
        server.stop().then(
          () => process.exit(0),
          (error: unknown) => fail(errorMessage(error))
        );
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    } catch (error) {
      logger.error('Server failed to start', { error: errorMessage(error) });
      process.exit(1);
    }
  });

// ============================================================================
// Parse Command
// ============================================================================

program
  .command('parse <filename>')
  .description('Show what the filename parser reads from a release name')
  .action((filename: string) => {
    const identity = FilenameParser.parse(filename);

    console.log(chalk.bold(`\n${identity.source}\n`));
    console.log(`  Title:   ${chalk.cyan(identity.title)}`);
    console.log(`  Kind:    ${identity.kind}`);
    if (identity.year !== undefined) console.log(`  Year:    ${identity.year}`);
    if (identity.season !== undefined) console.log(`  Season:  ${identity.season}`);
    if (identity.episode !== undefined) console.log(`  Episode: ${identity.episode}`);
    if (identity.quality.size > 0) console.log(`  Quality: ${[...identity.quality].join(', ')}`);
    if (identity.releaseGroup) console.log(`  Group:   ${identity.releaseGroup}`);
  });

// ============================================================================
// Generate Command
// ============================================================================

program
  .command('generate <filename>')
  .description('Run the pipeline once and write the torrent to disk')
  .option('-o, --output <file>', 'Output path (defaults to the generated file name)')
  .action(async (filename: string, options: { output?: string }) => {
    const spinner = ora(`Generating ${filename}`).start();

    try {
      const config = loadConfig();
      const pipeline = createPipeline(config);
      const requested = filename.toLowerCase().endsWith('.torrent') ? filename : `${filename}.torrent`;
      const outcome = await pipeline.run(requested);

      if (outcome.status === 'not_found') {
        spinner.fail('No torrent generated');
        fail(outcome.reason);
      }
      if (outcome.status === 'error') {
        spinner.fail('Generation failed');
        fail(outcome.reason);
      }

      const output = options.output ?? outcome.torrent.fileName;
      await writeFile(output, outcome.torrent.bytes);

      spinner.succeed(`Wrote ${output}`);
      console.log(chalk.green(`Infohash: ${outcome.torrent.infoHash}`));
      if (outcome.match) {
        console.log(chalk.green(`Matched:  ${outcome.match.candidate.name} (${outcome.match.score.toFixed(3)})`));
      }
    } catch (error) {
      spinner.fail('Generation failed');
      fail(errorMessage(error));
    }
  });

// ============================================================================
// Inspect Command
// ============================================================================

program
  .command('inspect <file>')
  .description('Decode a .torrent file and print its fields')
  .action(async (file: string) => {
    try {
      const summary = inspectTorrent(await readFile(file));

      console.log(chalk.bold(`\n${summary.name}\n`));
      console.log(`  Size:        ${formatBytes(summary.length)}`);
      console.log(`  Pieces:      ${summary.pieceCount} x ${formatBytes(summary.pieceLength)}`);
      console.log(`  Private:     ${summary.isPrivate ? 'yes' : 'no'}`);
      for (const url of summary.announceList) {
        console.log(`  Tracker:     ${url}`);
      }
      if (summary.creationDate) console.log(`  Created:     ${summary.creationDate.toISOString()}`);
      console.log(`  Computed:    ${summary.computedInfoHash}`);
      if (summary.carriedInfoHash !== undefined) {
        const color = summary.carriedInfoHash === summary.computedInfoHash ? chalk.green : chalk.yellow;
        console.log(`  Carried:     ${color(summary.carriedInfoHash)}`);
      }
    } catch (error) {
      fail(errorMessage(error));
    }
  });

// Parse command line
await program.parseAsync();
