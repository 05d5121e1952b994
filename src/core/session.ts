import crypto from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { Config, SessionConfig } from '../types/config.js';

/** First 4 bytes of SHA-256 over the path, as 8 lowercase hex chars. */
export function hashPath(canonicalPath: string): string {
  return crypto.createHash('sha256').update(canonicalPath).digest('hex').slice(0, 8);
}

export async function canonicalize(projectPath: string): Promise<string> {
  return fs.realpath(path.resolve(projectPath));
}

export async function sessionHash(projectPath: string): Promise<string> {
  return hashPath(await canonicalize(projectPath));
}

export function sessionNameFor(prefix: string, hash: string): string {
  return `${prefix}-${hash}`;
}

export async function createSessionConfig(projectPath: string, config: Config): Promise<SessionConfig> {
  const projectRoot = await canonicalize(projectPath);
  return buildSessionConfig(projectRoot, config);
}

/** Synchronous form for a root that is already canonical. */
export function buildSessionConfig(projectRoot: string, config: Config): SessionConfig {
  const hash = hashPath(projectRoot);
  return deepFreeze({
    projectRoot,
    sessionHash: hash,
    sessionName: sessionNameFor(config.sessionPrefix, hash),
    experts: config.experts.map((e) => ({ ...e })),
    timeouts: { ...config.timeouts },
    agent: { ...config.agent, args: [...config.agent.args] },
    tickMs: config.tickMs,
    statusRefreshMs: config.statusRefreshMs,
  });
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
