/**
 * Slash commands handled by the agent loop itself. A command replaces the model turn: its
 * replies are sent as text ContentParts between TurnBegin and TurnEnd.
 */

import { homedir } from 'node:os';
import { resolve } from 'node:path';
import { toErrorMessage } from '../lib/error-utils';
import { isDirectory, isWithinDirectory, listDirectory, pathExists } from '../lib/file-helpers';
import { systemPart, textPart } from '../llm/message';
import { createLogger } from '../services/logger.service';
import type { Soul } from './soul';
import type { WireSink } from './toolset';

const logger = createLogger('slash-commands');

export interface SlashCommandInfo {
  name: string;
  description: string;
  aliases: string[];
}

export interface SlashCommandCall {
  name: string;
  args: string;
}

export interface SlashCommandContext {
  soul: Soul;
  args: string;
  wire: WireSink;
  signal?: AbortSignal;
}

export interface SlashCommand extends SlashCommandInfo {
  run(context: SlashCommandContext): Promise<void>;
}

const SLASH_COMMAND_PATTERN = /^\/([a-zA-Z0-9_-]+)(?:\s+([\s\S]*))?$/;

/** `/name args` or null. Paths such as `/usr/bin` are not commands. */
export function parseSlashCommand(text: string): SlashCommandCall | null {
  const match = SLASH_COMMAND_PATTERN.exec(text.trim());
  if (!match?.[1]) {
    return null;
  }
  return { name: match[1], args: (match[2] ?? '').trim() };
}

export class SlashCommandRegistry {
  private readonly commands = new Map<string, SlashCommand>();
  private readonly lookup = new Map<string, SlashCommand>();

  register(command: SlashCommand): this {
    this.commands.set(command.name, command);
    for (const name of [command.name, ...command.aliases]) {
      this.lookup.set(name, command);
    }
    return this;
  }

  find(name: string): SlashCommand | undefined {
    return this.lookup.get(name);
  }

  list(): SlashCommandInfo[] {
    return [...this.commands.values()].map(({ name, description, aliases }) => ({
      name,
      description,
      aliases: [...aliases],
    }));
  }
}

export function sendText(wire: WireSink, text: string): void {
  wire.send({ type: 'ContentPart', payload: textPart(text) });
}

function sendStatus(soul: Soul, wire: WireSink): void {
  wire.send({
    type: 'StatusUpdate',
    payload: { context_usage: soul.status.contextUsage, token_usage: null, message_id: null },
  });
}

// =============================================================================
// Commands
// =============================================================================

const compact: SlashCommand = {
  name: 'compact',
  description: 'Compact the context. Optionally say what the summary should keep.',
  aliases: [],
  async run({ soul, args, wire, signal }) {
    if (soul.context.checkpointCount === 0) {
      sendText(wire, 'The context is empty.');
      return;
    }
    logger.info('Running /compact');
    await soul.compactContext(wire, signal, args || undefined);
    sendText(wire, 'The context has been compacted.');
    sendStatus(soul, wire);
  },
};

const clear: SlashCommand = {
  name: 'clear',
  description: 'Clear the context',
  aliases: ['reset'],
  async run({ soul, wire }) {
    logger.info('Running /clear');
    await soul.context.clear();
    sendText(wire, 'The context has been cleared.');
    sendStatus(soul, wire);
  },
};

const yolo: SlashCommand = {
  name: 'yolo',
  description: 'Toggle YOLO mode (auto-approve all actions)',
  aliases: [],
  async run({ soul, wire }) {
    const { approval } = soul.runtime;
    if (approval.isYolo) {
      approval.setYolo(false);
      sendText(wire, 'You only die once! Actions will require approval.');
    } else {
      approval.setYolo(true);
      sendText(wire, 'You only live once! All actions will be auto-approved.');
    }
  },
};

function expandHome(input: string): string {
  if (input === '~') {
    return homedir();
  }
  return input.startsWith('~/') ? resolve(homedir(), input.slice(2)) : input;
}

const addDir: SlashCommand = {
  name: 'add-dir',
  description: 'Add a directory to the workspace. Without a path, list the added directories.',
  aliases: [],
  async run({ soul, args, wire }) {
    const { runtime } = soul;
    if (!args) {
      sendText(
        wire,
        runtime.additionalDirs.length === 0
          ? 'No additional directories. Usage: /add-dir <path>'
          : ['Additional directories:', ...runtime.additionalDirs.map((d) => `  - ${d}`)].join(
              '\n'
            )
      );
      return;
    }

    const dir = resolve(runtime.session.workDir, expandHome(args));
    if (!(await pathExists(dir))) {
      sendText(wire, `Directory does not exist: ${dir}`);
      return;
    }
    if (!(await isDirectory(dir))) {
      sendText(wire, `Not a directory: ${dir}`);
      return;
    }
    if (runtime.additionalDirs.includes(dir)) {
      sendText(wire, `Directory already in workspace: ${dir}`);
      return;
    }
    if (isWithinDirectory(dir, runtime.session.workDir)) {
      sendText(wire, `Directory is already within the working directory: ${dir}`);
      return;
    }
    const parent = runtime.additionalDirs.find((existing) => isWithinDirectory(dir, existing));
    if (parent) {
      sendText(wire, `Directory is already within an added directory \`${parent}\`: ${dir}`);
      return;
    }

    let listing: string;
    try {
      listing = await listDirectory(dir);
    } catch (error) {
      sendText(wire, `Cannot read directory: ${dir} (${toErrorMessage(error)})`);
      return;
    }

    runtime.additionalDirs.push(dir);
    runtime.session.state.additional_dirs.push(dir);
    await runtime.session.saveState();

    await soul.context.appendMessage({
      role: 'user',
      content: [
        systemPart(
          `The user has added an additional directory to the workspace: \`${dir}\`\n\n` +
            `Directory listing:\n\`\`\`\n${listing}\n\`\`\`\n\n` +
            'You can now read, write, search, and glob files in this directory ' +
            'as if it were part of the working directory.'
        ),
      ],
    });
    sendText(wire, `Added directory to workspace: ${dir}`);
    logger.info('Added additional directory', { dir });
  },
};

export const soulSlashCommands = new SlashCommandRegistry()
  .register(compact)
  .register(clear)
  .register(yolo)
  .register(addDir);
