import fs from 'node:fs/promises';
import { hooksSettingsDir, hooksSettingsFile } from '../lib/paths.js';
import { shellQuote } from '../lib/shell.js';
import { writeFileAtomically } from '../lib/cjs-compat.js';

export interface HookCommand {
  type: 'command';
  command: string;
}

export interface HookGroup {
  hooks: HookCommand[];
}

export interface HooksSettings {
  hooks: {
    UserPromptSubmit: HookGroup[];
    Stop: HookGroup[];
  };
}

function markerCommand(marker: 'processing' | 'pending', statusFile: string): HookCommand {
  return { type: 'command', command: `printf '%s' ${marker} >| ${shellQuote(statusFile)}` };
}

/**
 * Agent settings that keep the status marker current without the model's
 * help: a submitted prompt marks the expert busy, a finished turn marks it idle.
 */
export function buildHooksSettings(statusFile: string): HooksSettings {
  return {
    hooks: {
      UserPromptSubmit: [{ hooks: [markerCommand('processing', statusFile)] }],
      Stop: [{ hooks: [markerCommand('pending', statusFile)] }],
    },
  };
}

export async function writeHooksSettings(projectRoot: string, expertId: number, statusFile: string): Promise<string> {
  await fs.mkdir(hooksSettingsDir(projectRoot), { recursive: true });
  const file = hooksSettingsFile(projectRoot, expertId);
  await writeFileAtomically(file, `${JSON.stringify(buildHooksSettings(statusFile), null, 2)}\n`);
  return file;
}
