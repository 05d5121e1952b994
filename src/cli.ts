#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { CrewError } from './lib/errors.js';
import { outputError } from './lib/output.js';

const program = new Command();

program
  .name('crewmux')
  .description('Run a crew of long-lived coding agents in tmux panes, with a control tower that never blocks')
  .version('0.1.0');

program
  .command('start')
  .description('Create or reuse the session, launch every expert and wait until they are ready')
  .argument('[path]', 'Project directory (default: current directory)')
  .option('-n, --num-experts <n>', 'Number of experts', parsePositiveInt)
  .option('-c, --config <file>', 'Config file')
  .option('--json', 'Output as JSON')
  .action(async (projectPath, options) => {
    const { startCommand } = await import('./commands/start.js');
    await startCommand(projectPath, options);
  });

program
  .command('launch')
  .description('Create or reuse the session and open the tower while experts launch in the background')
  .argument('[path]', 'Project directory (default: current directory)')
  .option('-n, --num-experts <n>', 'Number of experts', parsePositiveInt)
  .option('-c, --config <file>', 'Config file')
  .action(async (projectPath, options) => {
    const { launchCommand } = await import('./commands/launch.js');
    await launchCommand(projectPath, options);
  });

program
  .command('tower')
  .description('Open the tower for a running session')
  .argument('[path]', 'Project directory (default: current directory)')
  .option('-c, --config <file>', 'Config file')
  .action(async (projectPath, options) => {
    const { towerCommand } = await import('./commands/tower.js');
    await towerCommand(projectPath, options);
  });

program
  .command('status')
  .description('Show session info and expert status')
  .argument('[session]', 'Session name (default: the session for the current project)')
  .option('-c, --config <file>', 'Config file')
  .option('--json', 'Output as JSON')
  .action(async (session, options) => {
    const { statusCommand } = await import('./commands/status.js');
    await statusCommand(session, options);
  });

program
  .command('sessions')
  .description('List running crewmux sessions')
  .option('-c, --config <file>', 'Config file')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    const { sessionsCommand } = await import('./commands/sessions.js');
    await sessionsCommand(options);
  });

program
  .command('down')
  .description('Ask experts to exit and stop the session')
  .argument('[session]', 'Session name (default: the session for the current project)')
  .option('-f, --force', 'Kill the session without asking agents to exit')
  .option('--cleanup', 'Also remove stored contexts, markers and reports, and prune stale worktrees')
  .option('-c, --config <file>', 'Config file')
  .option('--json', 'Output as JSON')
  .action(async (session, options) => {
    const { downCommand } = await import('./commands/down.js');
    await downCommand(session, options);
  });

program
  .command('reports')
  .description('List the reports experts left for their last tasks')
  .argument('[path]', 'Project directory (default: current directory)')
  .option('-c, --config <file>', 'Config file')
  .option('--json', 'Output as JSON')
  .action(async (projectPath, options) => {
    const { reportsCommand } = await import('./commands/reports.js');
    await reportsCommand(projectPath, options);
  });

program
  .command('decide')
  .description('Record a decision in the shared context so every expert can follow it')
  .argument('<expert>', 'Expert id or name that made the decision')
  .argument('<topic>', 'What the decision is about')
  .argument('<decision>', 'The decision itself')
  .option('-r, --rationale <text>', 'Why it was made')
  .option('-a, --affects <experts>', 'Comma-separated expert ids or names it affects')
  .option('-p, --path <dir>', 'Project directory (default: current directory)')
  .option('-c, --config <file>', 'Config file')
  .option('--json', 'Output as JSON')
  .action(async (expert, topic, decision, options) => {
    const { decideCommand } = await import('./commands/decisions.js');
    await decideCommand(expert, topic, decision, options);
  });

program
  .command('decisions')
  .description('List decisions recorded in the shared context')
  .argument('[path]', 'Project directory (default: current directory)')
  .option('-c, --config <file>', 'Config file')
  .option('--json', 'Output as JSON')
  .action(async (projectPath, options) => {
    const { decisionsCommand } = await import('./commands/decisions.js');
    await decisionsCommand(projectPath, options);
  });

program
  .command('reset')
  .description('Restart one expert with a cleared context')
  .argument('<expert>', 'Expert id or name')
  .option('-s, --session <name>', 'Session name (default: the session for the current project)')
  .option('--full', 'Also return the expert to the project root')
  .option('--keep-history', 'Resume the same conversation, forgetting only recorded knowledge')
  .option('-c, --config <file>', 'Config file')
  .option('--json', 'Output as JSON')
  .action(async (expert, options) => {
    const { resetCommand } = await import('./commands/reset.js');
    await resetCommand(expert, options);
  });

// Error handling
program.exitOverride();

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return n;
}

function wantsJson(): boolean {
  return process.argv.includes('--json');
}

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CrewError) {
      outputError(err, wantsJson());
      process.exit(err.exitCode);
    }
    if (err instanceof Error && 'code' in err) {
      const code = err.code;
      if (code === 'commander.helpDisplayed' || code === 'commander.version') {
        process.exit(0);
      }
      if (typeof code === 'string' && code.startsWith('commander.')) {
        process.exit(1);
      }
    }
    outputError(err, wantsJson());
    process.exit(1);
  }
}

void main();
