import fs from 'node:fs/promises';
import path from 'node:path';
import { bundledRoles } from '../bundled/roles.js';
import { instructionsDir, renderedInstructionFile, renderedInstructionsDir } from '../lib/paths.js';
import { writeFileAtomically } from '../lib/cjs-compat.js';

export interface InstructionVars {
  EXPERT_ID: string;
  EXPERT_NAME: string;
  ROLE: string;
  WORKING_DIR: string;
  STATUS_FILE: string;
  REPORT_FILE: string;
  PROJECT_ROOT: string;
  [key: string]: string | undefined;
}

export interface RoleTemplate {
  content: string;
  source: 'project' | 'bundled' | 'general';
}

export function renderTemplate(content: string, vars: InstructionVars): string {
  return content.replace(/\{\{(\w+)\}\}/g, (_match, key: string) => {
    return vars[key] ?? `{{${key}}}`;
  });
}

/**
 * Project override in `.crewmux/instructions/<role>.md`, then the bundled
 * template for the role, then the bundled `general` template.
 */
export async function loadRoleTemplate(projectRoot: string, role: string): Promise<RoleTemplate> {
  const override = path.join(instructionsDir(projectRoot), `${role}.md`);
  try {
    return { content: await fs.readFile(override, 'utf-8'), source: 'project' };
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) throw err;
  }
  const bundled = bundledRoles[role];
  if (bundled !== undefined) return { content: bundled, source: 'bundled' };
  return { content: bundledRoles.general, source: 'general' };
}

/** Returns '' when the rendered text is only whitespace. */
export async function renderRoleInstruction(projectRoot: string, role: string, vars: InstructionVars): Promise<string> {
  const template = await loadRoleTemplate(projectRoot, role);
  const rendered = renderTemplate(template.content, vars);
  return rendered.trim() === '' ? '' : rendered;
}

export async function writeRenderedInstruction(projectRoot: string, expertId: number, content: string): Promise<string> {
  await fs.mkdir(renderedInstructionsDir(projectRoot), { recursive: true });
  const file = renderedInstructionFile(projectRoot, expertId);
  await writeFileAtomically(file, content);
  return file;
}
