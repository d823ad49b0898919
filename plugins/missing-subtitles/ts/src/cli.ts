#!/usr/bin/env -S node --import tsx
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { createLogger, setDefaultLogLevel } from '@subgap/plugin-utils';
import { applyCliOverrides, DEFAULT_PLEX_URL, loadConfig } from './config.js';
import type { CliOverrides } from './config.js';
import { createCatalogClient, createPlexLibrary, createRunContext, executeRun, initializeRun } from './runner.js';
import type { RunContext } from './runner.js';
import { isReady, StatusChecker } from './status.js';
import { LocalSubtitleStorage } from './storage.js';
import type { MissingSubtitlesConfig, RunStats } from './types.js';

const logger = createLogger('missing-subtitles:cli');
const program = new Command();

program
  .name('subgap')
  .description('Find media missing subtitles and download the best match')
  .version('1.0.0');

function withConnectionOptions(command: Command): Command {
  return command
    .option('--method <method>', 'local (save .srt files) or delegated (let Plex fetch them)')
    .option('--plex-url <url>', `Plex server URL (default ${DEFAULT_PLEX_URL})`)
    .option('--plex-token <token>', 'Plex authentication token')
    .option('--opensubtitles-api-key <key>', 'OpenSubtitles API key')
    .option('--opensubtitles-username <username>', 'OpenSubtitles username')
    .option('--opensubtitles-password <password>', 'OpenSubtitles password')
    .option('--languages <codes...>', 'Subtitle languages, e.g. en es fr')
    .option('--verbose', 'Enable debug logging');
}

function resolveConfig(options: CliOverrides): MissingSubtitlesConfig {
  try {
    const config = applyCliOverrides(loadConfig(), options);
    setDefaultLogLevel(config.log_level);
    return config;
  } catch (error) {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
    process.exit(1);
  }
}

function printStats(stats: RunStats): void {
  console.log(chalk.bold('\nRun summary'));
  console.log(`  Items scanned:       ${stats.total}`);
  console.log(`  Needing subtitles:   ${stats.needsSubtitles}`);
  console.log(`  Downloaded:          ${chalk.green(stats.downloaded)}`);
  console.log(`  Skipped (limit):     ${stats.skipped}`);
  console.log(`  Errors:              ${stats.errors > 0 ? chalk.red(stats.errors) : stats.errors}`);
  if (stats.librariesSkipped > 0) {
    console.log(`  Libraries skipped:   ${stats.librariesSkipped}`);
  }
}

withConnectionOptions(program.command('run', { isDefault: true }))
  .description('Download missing subtitles')
  .option('--library <name>', 'Only process this library')
  .option('--type <type>', 'Only process movie or episode libraries')
  .option('--max-downloads <n>', 'Stop after this many subtitles')
  .option('--report <file>', 'Report file path')
  .action(async (options: CliOverrides) => {
    const config = resolveConfig(options);
    const controller = new AbortController();

    const onSignal = () => {
      if (controller.signal.aborted) {
        process.exit(130);
      }
      console.log(chalk.yellow('\nInterrupted, finishing the current item...'));
      controller.abort();
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);

    const spinner = ora('Connecting to Plex').start();
    let context: RunContext;
    try {
      context = createRunContext(config);
      const server = await initializeRun(config, context);
      spinner.succeed(`Connected to ${server.name}`);
    } catch (error) {
      spinner.fail('Initialization failed');
      console.error(chalk.red(error instanceof Error ? error.message : String(error)));
      process.exit(1);
    }

    try {
      const outcome = await executeRun(config, context, { signal: controller.signal });

      console.log(`\n${outcome.report.render()}`);
      printStats(outcome.stats);

      if (outcome.report.count > 0) {
        await outcome.report.save(config.report_path);
        console.log(chalk.green(`\nReport saved to ${config.report_path}`));
      }
      if (outcome.interrupted) {
        console.log(chalk.yellow('Run was interrupted before finishing'));
      }
    } catch (error) {
      logger.error('Run failed', { error: error instanceof Error ? error.message : String(error) });
      console.error(chalk.red(error instanceof Error ? error.message : String(error)));
      process.exit(1);
    } finally {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    }
  });

withConnectionOptions(program.command('status'))
  .description('Check configuration and connectivity')
  .action(async (options: CliOverrides) => {
    const config = resolveConfig(options);
    const spinner = ora('Checking setup').start();

    try {
      const checker = new StatusChecker({
        config,
        storage: new LocalSubtitleStorage(),
        library: createPlexLibrary(config),
        catalog: createCatalogClient(config),
      });
      const report = await checker.checkAll();
      spinner.stop();

      console.log(chalk.bold('\nStatus'));
      for (const line of report.info) console.log(`  ${chalk.green('✓')} ${line}`);
      for (const line of report.warnings) console.log(`  ${chalk.yellow('!')} ${line}`);
      for (const line of report.issues) console.log(`  ${chalk.red('✗')} ${line}`);

      if (isReady(report)) {
        console.log(chalk.green.bold('\nREADY'));
      } else {
        console.log(chalk.red.bold(`\nISSUES FOUND (${report.issues.length})`));
        process.exitCode = 1;
      }
    } catch (error) {
      spinner.fail('Status check failed');
      console.error(chalk.red(error instanceof Error ? error.message : String(error)));
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
