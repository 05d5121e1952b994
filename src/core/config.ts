import fs from 'node:fs/promises';
import YAML from 'yaml';
import type { AgentCommandConfig, Config, ExpertConfig, TimeoutConfig } from '../types/config.js';
import { configPath, globalConfigPath } from '../lib/paths.js';
import { ConfigError, ExpertNotFoundError } from '../lib/errors.js';

export const DEFAULT_EXPERTS: readonly ExpertConfig[] = [
  { name: 'architect', role: 'architect', color: 'red' },
  { name: 'frontend', role: 'frontend', color: 'blue' },
  { name: 'backend', role: 'backend', color: 'green' },
  { name: 'tester', role: 'tester', color: 'yellow' },
];

export function defaultConfig(): Config {
  return {
    sessionPrefix: 'crewmux',
    numExperts: DEFAULT_EXPERTS.length,
    experts: DEFAULT_EXPERTS.map((e) => ({ ...e })),
    timeouts: {
      agentReady: 30,
      gracefulShutdown: 3,
      stuckAfter: 600,
    },
    agent: {
      command: 'claude',
      args: ['--dangerously-skip-permissions'],
      resumeFlag: '--resume',
      readyPattern: 'bypass permissions',
      exitCommand: '/exit',
      settingsFlag: '--settings',
      statusHooks: true,
    },
    tickMs: 100,
    statusRefreshMs: 500,
  };
}

export interface LoadConfigOptions {
  /** Explicit `--config` path. Must exist when given. */
  configFile?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load the first config file found in: `--config`, `$CREWMUX_CONFIG`,
 * `<project>/.crewmux/config.yaml`, `~/.config/crewmux/config.yaml`.
 * No file at all yields the defaults.
 */
export async function loadConfig(projectRoot: string, options: LoadConfigOptions = {}): Promise<Config> {
  const env = options.env ?? process.env;

  if (options.configFile) {
    const raw = await readConfigFile(options.configFile);
    if (raw === null) throw new ConfigError(options.configFile, 'file not found');
    return parseConfig(options.configFile, raw);
  }

  const candidates = [env.CREWMUX_CONFIG, configPath(projectRoot), globalConfigPath()];
  for (const candidate of candidates) {
    if (!candidate) continue;
    const raw = await readConfigFile(candidate);
    if (raw !== null) return parseConfig(candidate, raw);
  }
  return defaultConfig();
}

async function readConfigFile(file: string): Promise<string | null> {
  try {
    return await fs.readFile(file, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    throw err;
  }
}

export function parseConfig(file: string, raw: string): Config {
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err) {
    throw new ConfigError(file, err instanceof Error ? err.message : String(err));
  }
  if (parsed === null || parsed === undefined) return defaultConfig();
  if (!isRecord(parsed)) throw new ConfigError(file, 'top level must be a mapping');
  return mergeConfig(file, defaultConfig(), parsed);
}

function mergeConfig(file: string, defaults: Config, overrides: Record<string, unknown>): Config {
  const experts = overrides.experts === undefined
    ? defaults.experts
    : readExperts(file, overrides.experts);

  const merged: Config = {
    sessionPrefix: readString(file, 'sessionPrefix', overrides.sessionPrefix, defaults.sessionPrefix),
    numExperts: experts.length,
    experts,
    timeouts: mergeTimeouts(file, defaults.timeouts, overrides.timeouts),
    agent: mergeAgent(file, defaults.agent, overrides.agent),
    tickMs: readPositive(file, 'tickMs', overrides.tickMs, defaults.tickMs),
    statusRefreshMs: readPositive(file, 'statusRefreshMs', overrides.statusRefreshMs, defaults.statusRefreshMs),
  };

  if (overrides.numExperts !== undefined) {
    return withNumExperts(merged, readPositive(file, 'numExperts', overrides.numExperts, merged.numExperts));
  }
  return merged;
}

function mergeTimeouts(file: string, defaults: TimeoutConfig, raw: unknown): TimeoutConfig {
  if (raw === undefined) return defaults;
  if (!isRecord(raw)) throw new ConfigError(file, 'timeouts must be a mapping');
  return {
    agentReady: readPositive(file, 'timeouts.agentReady', raw.agentReady, defaults.agentReady),
    gracefulShutdown: readNonNegative(file, 'timeouts.gracefulShutdown', raw.gracefulShutdown, defaults.gracefulShutdown),
    stuckAfter: readPositive(file, 'timeouts.stuckAfter', raw.stuckAfter, defaults.stuckAfter),
  };
}

function mergeAgent(file: string, defaults: AgentCommandConfig, raw: unknown): AgentCommandConfig {
  if (raw === undefined) return defaults;
  if (!isRecord(raw)) throw new ConfigError(file, 'agent must be a mapping');
  let args = defaults.args;
  if (raw.args !== undefined) {
    if (!Array.isArray(raw.args) || !raw.args.every((a): a is string => typeof a === 'string')) {
      throw new ConfigError(file, 'agent.args must be a list of strings');
    }
    args = raw.args;
  }
  return {
    command: readString(file, 'agent.command', raw.command, defaults.command),
    args,
    resumeFlag: readString(file, 'agent.resumeFlag', raw.resumeFlag, defaults.resumeFlag),
    readyPattern: readString(file, 'agent.readyPattern', raw.readyPattern, defaults.readyPattern),
    exitCommand: readString(file, 'agent.exitCommand', raw.exitCommand, defaults.exitCommand),
    settingsFlag: readString(file, 'agent.settingsFlag', raw.settingsFlag, defaults.settingsFlag),
    statusHooks: readBoolean(file, 'agent.statusHooks', raw.statusHooks, defaults.statusHooks),
  };
}

function readExperts(file: string, raw: unknown): ExpertConfig[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new ConfigError(file, 'experts must be a non-empty list');
  }
  return raw.map((entry: unknown, i) => {
    if (!isRecord(entry)) throw new ConfigError(file, `experts[${i}] must be a mapping`);
    const name = readString(file, `experts[${i}].name`, entry.name, `expert${i}`);
    return {
      name,
      role: readString(file, `experts[${i}].role`, entry.role, 'general'),
      color: readString(file, `experts[${i}].color`, entry.color, 'white'),
    };
  });
}

function readString(file: string, field: string, value: unknown, fallback: string): string {
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(file, `${field} must be a non-empty string`);
  }
  return value;
}

function readBoolean(file: string, field: string, value: unknown, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') throw new ConfigError(file, `${field} must be true or false`);
  return value;
}

function readPositive(file: string, field: string, value: unknown, fallback: number): number {
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ConfigError(file, `${field} must be a positive number`);
  }
  return value;
}

function readNonNegative(file: string, field: string, value: unknown, fallback: number): number {
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(file, `${field} must be zero or a positive number`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Trim or pad the expert list to `n` entries. Padding uses `expertN` / `general`. */
export function withNumExperts(config: Config, n: number): Config {
  const count = Math.max(1, Math.floor(n));
  const experts = config.experts.slice(0, count);
  for (let i = experts.length; i < count; i++) {
    experts.push({ name: `expert${i}`, role: 'general', color: 'white' });
  }
  return { ...config, experts, numExperts: count };
}

/** Resolve an expert by numeric id or by name (case-insensitive). */
export function resolveExpertId(experts: readonly Pick<ExpertConfig, 'name'>[], ref: string): number {
  const trimmed = ref.trim();
  if (/^\d+$/.test(trimmed)) {
    const id = Number(trimmed);
    if (id < experts.length) return id;
    throw new ExpertNotFoundError(ref);
  }
  const lower = trimmed.toLowerCase();
  const id = experts.findIndex((e) => e.name.toLowerCase() === lower);
  if (id === -1) throw new ExpertNotFoundError(ref);
  return id;
}
