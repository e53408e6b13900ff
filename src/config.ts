/**
 * MailGuard Configuration
 *
 * Manages .mailguard/config.json in the current project directory.
 * Also supports global config at ~/.mailguard/config.json (or
 * $MAILGUARD_HOME/config.json), and the ENABLE_PII_VALIDATION /
 * PII_THRESHOLD environment variables.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import type { MailGuardConfig, ResolvedConfig } from './types.js';

/** Directory name for local MailGuard config */
export const MAILGUARD_DIR = '.mailguard';

/** Config filename */
export const CONFIG_FILE = 'config.json';

/** Global MailGuard home directory */
export const GLOBAL_MAILGUARD_DIR = join(homedir(), '.mailguard');

/** Replaces ~/.mailguard as the global config directory */
export const ENV_HOME = 'MAILGUARD_HOME';

export const ENV_ENABLED = 'ENABLE_PII_VALIDATION';
export const ENV_THRESHOLD = 'PII_THRESHOLD';

// ─── Schemas ─────────────────────────────────────────────────

export const ThresholdSchema = z.number().min(0).max(1);

/**
 * On-disk config. Every field is optional; missing ones keep their defaults.
 */
export const ConfigFileSchema = z.object({
  version: z.string().optional(),
  pii: z
    .object({
      enabled: z.boolean().optional(),
      threshold: ThresholdSchema.optional(),
    })
    .optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse a threshold given as text (env var or CLI flag).
 */
export function parseThreshold(raw: string, label: string): number {
  const trimmed = raw.trim();
  if (trimmed === '') {
    throw new Error(`Invalid ${label} "${raw}": expected a number`);
  }

  const parsed = ThresholdSchema.safeParse(Number(trimmed));
  if (!parsed.success) {
    throw new Error(`Invalid ${label} "${raw}": ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

// ─── Defaults & Paths ────────────────────────────────────────

/**
 * Default configuration for new projects.
 */
export function defaultConfig(): MailGuardConfig {
  return {
    version: '1.0.0',
    pii: {
      enabled: true,
      threshold: 0.8,
    },
  };
}

/**
 * Resolve the local .mailguard directory for the current project.
 */
export function localConfigDir(cwd?: string): string {
  return join(resolve(cwd ?? process.cwd()), MAILGUARD_DIR);
}

/**
 * Resolve the path to the local config file.
 */
export function localConfigPath(cwd?: string): string {
  return join(localConfigDir(cwd), CONFIG_FILE);
}

/**
 * Check if MailGuard is initialized in the given directory.
 */
export function isInitialized(cwd?: string): boolean {
  return existsSync(localConfigPath(cwd));
}

// ─── Loading ─────────────────────────────────────────────────

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Global config directory; defaults to $MAILGUARD_HOME, then ~/.mailguard */
  globalDir?: string;
}

/**
 * Read and validate a config file, merged over the defaults.
 */
export async function readConfigFile(configPath: string): Promise<MailGuardConfig> {
  const raw = await readFile(configPath, 'utf-8');

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(
      `Invalid config file ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const parsed = ConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Invalid config file ${configPath}: ${formatIssues(parsed.error)}`);
  }

  const defaults = defaultConfig();
  return {
    version: parsed.data.version ?? defaults.version,
    pii: { ...defaults.pii, ...parsed.data.pii },
  };
}

/**
 * Apply ENABLE_PII_VALIDATION and PII_THRESHOLD. Blank values are ignored.
 */
export function applyEnvOverrides(
  config: MailGuardConfig,
  env: NodeJS.ProcessEnv,
): { config: MailGuardConfig; overrides: string[] } {
  const overrides: string[] = [];
  const pii = { ...config.pii };

  const enabled = env[ENV_ENABLED]?.trim();
  if (enabled) {
    pii.enabled = enabled.toLowerCase() === 'true';
    overrides.push(ENV_ENABLED);
  }

  const threshold = env[ENV_THRESHOLD]?.trim();
  if (threshold) {
    pii.threshold = parseThreshold(threshold, ENV_THRESHOLD);
    overrides.push(ENV_THRESHOLD);
  }

  return { config: { ...config, pii }, overrides };
}

/**
 * Load the effective configuration: defaults, then the local
 * .mailguard/config.json (or the global one if there is no local file),
 * then environment overrides.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ResolvedConfig> {
  const env = options.env ?? process.env;
  const localPath = localConfigPath(options.cwd);
  const globalDir = options.globalDir ?? (env[ENV_HOME]?.trim() || GLOBAL_MAILGUARD_DIR);
  const globalPath = join(globalDir, CONFIG_FILE);

  let config = defaultConfig();
  let file: string | null = null;

  for (const configPath of [localPath, globalPath]) {
    if (existsSync(configPath)) {
      config = await readConfigFile(configPath);
      file = configPath;
      break;
    }
  }

  const { config: merged, overrides } = applyEnvOverrides(config, env);
  return { config: merged, file, envOverrides: overrides };
}

/**
 * Save the MailGuard config to the local .mailguard/ directory.
 */
export async function saveConfig(config: MailGuardConfig, cwd?: string): Promise<string> {
  const dir = localConfigDir(cwd);
  await mkdir(dir, { recursive: true });
  const configPath = join(dir, CONFIG_FILE);
  await writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  return configPath;
}

/**
 * Initialize MailGuard in the given directory.
 * Creates .mailguard/ and writes default config.
 */
export async function initializeProject(cwd?: string): Promise<MailGuardConfig> {
  const config = defaultConfig();
  await saveConfig(config, cwd);
  return config;
}
