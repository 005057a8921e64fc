import { createWriteStream } from 'node:fs';

import type { Command } from 'commander';

import { connectBrowser } from '../browser/connect.js';
import type { Connector } from '../browser/connect.js';
import { DEFAULT_CONFIG_PATH } from '../config/defaults.js';
import { ConfigError, loadConfigFile, resolveConfig } from '../config/loader.js';
import type { RuntimeConfig } from '../config/loader.js';
import { App } from '../core/app.js';
import type { AppOptions } from '../core/app.js';
import type { AppState, Variant } from '../core/state.js';
import { runOfferSweep } from '../core/offers.js';
import { renderFrame, renderSummary } from '../report/dashboard.js';
import * as log from '../utils/logger.js';
import { terminalInput } from './keys.js';

// ── Options ──────────────────────────────────────────────────

interface CommonOptions {
  config: string;
  browser?: string;
  profile?: string;
  port?: string;
  headless?: true;
  output?: string;
}

interface DashboardOptions extends CommonOptions {
  logFile?: string;
}

function withCommonOptions(command: Command): Command {
  return command
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--browser <path>', 'Browser binary to launch')
    .option('--profile <dir>', 'Browser profile directory to reuse')
    .option('--port <n>', 'Remote debugging port')
    .option('--headless', 'Run the browser headless')
    .option('--output <csv>', 'Listing store to merge into');
}

function parsePort(raw: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65_535) {
    throw new ConfigError(`Invalid port: ${raw}`);
  }
  return port;
}

async function prepare(url: string | undefined, opts: CommonOptions): Promise<RuntimeConfig> {
  const file = await loadConfigFile(opts.config);
  return resolveConfig(file, {
    storeUrl: url,
    output: opts.output,
    browser: opts.browser,
    profile: opts.profile,
    port: opts.port === undefined ? undefined : parsePort(opts.port),
    headless: opts.headless,
  });
}

function requireStoreUrl(config: RuntimeConfig): string {
  if (!config.storeUrl) {
    throw new ConfigError(
      'No store URL: pass one, set storeUrl in the config file or SHELFSCAN_STORE_URL',
    );
  }
  return config.storeUrl;
}

function makeConnector(config: RuntimeConfig): Connector {
  return () =>
    connectBrowser({
      binary: config.browser.binary,
      debugPort: config.browser.debugPort,
      headless: config.browser.headless,
      profileDir: config.browser.profileDir,
    });
}

type RunHooks = Pick<AppOptions, 'exitWhenSettled' | 'tickRateHz' | 'input' | 'onRender'>;

function createApp(config: RuntimeConfig, variant: Variant, hooks: RunHooks): App {
  return new App({
    variant,
    targetUrl: requireStoreUrl(config),
    outputPath: config.output,
    connector: makeConnector(config),
    challengeMarker: config.challengeMarker,
    challengePollMs: config.pacing.challengePoll,
    enrichDelayMs: config.pacing.enrichDelay,
    elementWaitMs: config.pacing.elementWait,
    ...hooks,
  });
}

function exitCodeFor(state: AppState): number {
  return state.pipeline.stage === 'done' ? 0 : 1;
}

function reportFailure(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Error: ${message}\n`);
  process.exitCode = err instanceof ConfigError ? err.exitCode : 1;
}

// ── Dashboard (interactive) ──────────────────────────────────

const CLEAR_SCREEN = '\x1b[2J\x1b[H';

export function registerDashboardCommand(program: Command): void {
  withCommonOptions(
    program
      .command('dashboard', { isDefault: true })
      .description('Scrape the store and browse it in a live terminal dashboard')
      .argument('[url]', 'Seller store URL'),
  )
    .option('--log-file <path>', 'Write log lines to a file instead of stderr')
    .action(async (url: string | undefined, opts: DashboardOptions) => {
      const logStream = opts.logFile ? createWriteStream(opts.logFile, { flags: 'a' }) : undefined;
      if (logStream) {
        log.setLogSink((line) => {
          logStream.write(line + '\n');
        });
      }

      try {
        const config = await prepare(url, opts);
        let lastFrame = '';
        const state = await createApp(config, 'inventory', {
          exitWhenSettled: false,
          input: terminalInput(),
          onRender: (current) => {
            const frame = renderFrame(current);
            if (frame === lastFrame) return;
            lastFrame = frame;
            process.stdout.write(CLEAR_SCREEN + frame + '\n');
          },
        }).run();

        process.stdout.write(CLEAR_SCREEN + renderSummary(state));
        process.exitCode = exitCodeFor(state);
      } catch (err) {
        reportFailure(err);
      } finally {
        log.setLogSink();
        logStream?.end();
      }
    });
}

// ── Inventory / stats (non-interactive) ──────────────────────

function registerPipelineCommand(
  program: Command,
  name: string,
  variant: Variant,
  description: string,
): void {
  withCommonOptions(
    program.command(name).description(description).argument('[url]', 'Seller store URL'),
  ).action(async (url: string | undefined, opts: CommonOptions) => {
    try {
      const config = await prepare(url, opts);
      log.section(`${name}: ${requireStoreUrl(config)}`);
      const state = await createApp(config, variant, {
        exitWhenSettled: true,
        tickRateHz: 0,
      }).run();

      process.stdout.write(renderSummary(state));
      process.exitCode = exitCodeFor(state);
    } catch (err) {
      reportFailure(err);
    }
  });
}

export function registerInventoryCommand(program: Command): void {
  registerPipelineCommand(
    program,
    'inventory',
    'inventory',
    'Scrape and enrich all listings, merge them into the CSV store and exit',
  );
}

export function registerStatsCommand(program: Command): void {
  registerPipelineCommand(
    program,
    'stats',
    'stats',
    'Read the seller stats card and available funds, then exit',
  );
}

// ── Offer sweep ──────────────────────────────────────────────

function parsePercentage(raw: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0 || value >= 100) {
    throw new ConfigError(`Percentage must be between 0 and 100 (exclusive), got ${raw}`);
  }
  return value;
}

export function registerOfferCommand(program: Command): void {
  withCommonOptions(
    program
      .command('offer')
      .description('Send a percentage discount offer to every eligible watcher')
      .argument('<percentage>', 'Discount in percent, e.g. 10'),
  ).action(async (percentage: string, opts: CommonOptions) => {
    try {
      const pct = parsePercentage(percentage);
      const config = await prepare(undefined, opts);
      log.section(`Offering ${String(pct)}% off`);

      const connection = await makeConnector(config)();
      try {
        const result = await runOfferSweep(connection.session, pct, {
          elementWaitMs: config.pacing.elementWait,
        });
        process.stdout.write(
          `Offers sent: ${String(result.sent)}, skipped: ${String(result.skipped)}\n`,
        );
      } finally {
        await connection.close();
      }
    } catch (err) {
      reportFailure(err);
    }
  });
}
