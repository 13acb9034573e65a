#!/usr/bin/env tsx

import chalk from 'chalk';
import { Command } from 'commander';
import { config } from 'dotenv';

// Load .env file before anything reads the configuration
config({ quiet: true });

const { configService } = await import('@/backend/services/config.service');
const { getLogFilePath } = await import('@/backend/services/logger.service');
const { runPromptCommand, runReplayCommand, runWireCommand } = await import('./commands');

interface SessionCommandOptions {
  workDir?: string;
  session?: string;
  yolo?: boolean;
}

const program = new Command();

program
  .name('loom')
  .description('Agent runtime: a turn/step engine driven over a JSON-RPC wire')
  .version(configService.getVersion());

// ============================================================================
// wire command
// ============================================================================

program
  .command('wire')
  .description('Serve the JSON-RPC wire protocol on stdin/stdout')
  .option('-w, --work-dir <dir>', 'Working directory of the session (default: cwd)')
  .option('-s, --session <id>', 'Resume or create the session with this id')
  .option('--yolo', 'Auto-approve every action')
  .action(async (options: SessionCommandOptions) => {
    await runWireCommand(options, { input: process.stdin, output: process.stdout });
  });

// ============================================================================
// prompt command
// ============================================================================

program
  .command('prompt')
  .description('Run a single turn and print the reply')
  .argument('<text>', 'What to ask the agent')
  .option('-w, --work-dir <dir>', 'Working directory of the session (default: cwd)')
  .option('-s, --session <id>', 'Resume or create the session with this id')
  .option('--yolo', 'Auto-approve every action')
  .action(async (text: string, options: SessionCommandOptions) => {
    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());
    process.exitCode = await runPromptCommand(
      text,
      options,
      { stdout: process.stdout, stderr: process.stderr },
      controller.signal
    );
  });

// ============================================================================
// replay command
// ============================================================================

program
  .command('replay')
  .description('Print the recorded wire log of a session')
  .argument('<session-dir>', 'Session directory holding wire.jsonl')
  .action(async (sessionDir: string) => {
    process.exitCode = await runReplayCommand(sessionDir, {
      stdout: process.stdout,
      stderr: process.stderr,
    });
  });

// ============================================================================
// Parse and run
// ============================================================================

try {
  await program.parseAsync();
} catch (error) {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  console.error(chalk.gray(`Logs: ${getLogFilePath()}`));
  process.exitCode = 1;
}
