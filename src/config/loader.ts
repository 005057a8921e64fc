import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';

import { isNotFound } from '../utils/files.js';
import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';
import {
  DEFAULT_CONFIG_PATH,
  DEFAULT_OUTPUT_PATH,
  DRIVER,
  MARKERS,
  PACING,
  TIMEOUTS,
} from './defaults.js';

// ── Error ────────────────────────────────────────────────────

export class ConfigError extends Error {
  readonly exitCode = 4;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ── Resolved runtime config ──────────────────────────────────

export interface RuntimeConfig {
  storeUrl: string | undefined;
  output: string;
  challengeMarker: string;
  browser: {
    binary: string;
    profileDir: string | undefined;
    debugPort: number;
    headless: boolean;
  };
  pacing: {
    challengePoll: number;
    enrichDelay: number;
    elementWait: number;
  };
}

export interface CliOverrides {
  storeUrl?: string | undefined;
  output?: string | undefined;
  browser?: string | undefined;
  profile?: string | undefined;
  port?: number | undefined;
  headless?: boolean | undefined;
}

// ── File loading ─────────────────────────────────────────────

/**
 * Load and validate a `.shelfscan.yaml` (or JSON) config file.
 * A missing file is only tolerated at the default path.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (configPath === DEFAULT_CONFIG_PATH && isNotFound(err)) {
      return fileConfigSchema.parse({});
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config file ${configPath}: ${message}`);
  }

  try {
    const parsed: unknown = configPath.endsWith('.json')
      ? JSON.parse(raw)
      : parseYaml(raw);
    return fileConfigSchema.parse(parsed ?? {});
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = err.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ');
      throw new ConfigError(`Invalid config file ${configPath}: ${issues}`);
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot parse config file ${configPath}: ${message}`);
  }
}

// ── Merge ────────────────────────────────────────────────────

/**
 * Merge config sources. CLI flags take precedence, then the config file,
 * then the environment, then built-in defaults.
 */
export function resolveConfig(
  file: FileConfig,
  cli: CliOverrides,
  env: NodeJS.ProcessEnv = process.env,
): RuntimeConfig {
  return {
    storeUrl: cli.storeUrl ?? file.storeUrl ?? env['SHELFSCAN_STORE_URL'],
    output: cli.output ?? file.output ?? DEFAULT_OUTPUT_PATH,
    challengeMarker: file.challengeMarker ?? MARKERS.CHALLENGE,
    browser: {
      binary:
        cli.browser ??
        file.browser.binary ??
        env['SHELFSCAN_BROWSER'] ??
        DRIVER.BROWSER_BINARY,
      profileDir:
        cli.profile ?? file.browser.profileDir ?? env['SHELFSCAN_PROFILE_DIR'],
      debugPort: cli.port ?? file.browser.debugPort ?? DRIVER.DEBUG_PORT,
      headless: cli.headless ?? file.browser.headless ?? false,
    },
    pacing: {
      challengePoll: file.pacing.challengePoll ?? PACING.CHALLENGE_POLL,
      enrichDelay: file.pacing.enrichDelay ?? PACING.ENRICH_DELAY,
      elementWait: file.pacing.elementWait ?? TIMEOUTS.ELEMENT_WAIT,
    },
  };
}
