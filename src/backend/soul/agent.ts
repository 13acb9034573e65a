import * as fs from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { toErrorMessage } from '../lib/error-utils';
import { isDirectory, isMissingFileError, listDirectory } from '../lib/file-helpers';
import type { LLM } from '../llm/provider';
import { buildSubagentSystemPrompt, type SystemPromptArgs } from '../prompts/agent';
import { configService, type LoopControl } from '../services/config.service';
import { createLogger } from '../services/logger.service';
import type { Session } from '../session/session';
import type { DynamicSubagentSpec } from '../session/session-state';
import { Approval, ApprovalState } from './approval';
import type { Toolset } from './toolset';

const logger = createLogger('agent');

const AGENTS_MD_NAMES = ['AGENTS.md', 'agents.md'];

export async function loadAgentsMd(workDir: string): Promise<string | null> {
  for (const name of AGENTS_MD_NAMES) {
    const file = join(workDir, name);
    try {
      const content = (await fs.readFile(file, 'utf-8')).trim();
      logger.info('Loaded AGENTS.md', { file });
      return content;
    } catch (error) {
      if (!isMissingFileError(error)) {
        throw error;
      }
    }
  }
  return null;
}

/** Markdown listing of each additional directory, for the system prompt. */
export async function describeAdditionalDirs(dirs: readonly string[]): Promise<string> {
  const parts: string[] = [];
  for (const dir of dirs) {
    let listing: string;
    try {
      listing = await listDirectory(dir);
    } catch (error) {
      logger.warn('Cannot list additional directory', { dir, error: toErrorMessage(error) });
      listing = '[directory not readable]';
    }
    parts.push(`### \`${dir}\`\n\n\`\`\`\n${listing}\n\`\`\``);
  }
  return parts.join('\n\n');
}

/** A loaded agent: its prompt, its tools and the runtime it shares with its family. */
export interface Agent {
  readonly name: string;
  readonly systemPrompt: string;
  readonly toolset: Toolset;
  readonly runtime: Runtime;
}

interface FixedSubagent {
  agent: Agent;
  description: string;
}

/**
 * Subagents a main agent can delegate to. Fixed subagents come with the agent definition;
 * dynamic ones are created at run time and persisted in the session state.
 */
export class SubagentRegistry {
  private readonly fixed = new Map<string, FixedSubagent>();
  private readonly dynamic = new Map<string, Agent>();

  get(name: string): Agent | undefined {
    return this.fixed.get(name)?.agent ?? this.dynamic.get(name);
  }

  has(name: string): boolean {
    return this.fixed.has(name) || this.dynamic.has(name);
  }

  get names(): string[] {
    return [...this.fixed.keys(), ...this.dynamic.keys()];
  }

  addFixed(name: string, agent: Agent, description: string): void {
    this.fixed.set(name, { agent, description });
  }

  addDynamic(name: string, agent: Agent): void {
    this.dynamic.set(name, agent);
  }

  /** One `- name: description` line per subagent. */
  describe(): string {
    const lines: string[] = [];
    for (const [name, { description }] of this.fixed) {
      lines.push(`- ${name}: ${description}`);
    }
    for (const name of this.dynamic.keys()) {
      lines.push(`- ${name}: (created in this session)`);
    }
    return lines.join('\n');
  }
}

export interface RuntimeInit {
  llm: LLM | null;
  loopControl: LoopControl;
  session: Session;
  approval: Approval;
  subagents: SubagentRegistry;
  promptArgs: SystemPromptArgs;
  /** Shared by reference with every derived runtime. */
  additionalDirs: string[];
}

export interface CreateRuntimeOptions {
  llm: LLM | null;
  session: Session;
  yolo?: boolean;
  loopControl?: LoopControl;
}

/**
 * What an agent runs against: the model, the loop limits, the session and the approval
 * state. Subagents get derived runtimes that share the approval state.
 */
export class Runtime {
  llm: LLM | null;
  readonly loopControl: LoopControl;
  readonly session: Session;
  readonly approval: Approval;
  readonly subagents: SubagentRegistry;
  readonly promptArgs: SystemPromptArgs;
  readonly additionalDirs: string[];

  constructor(init: RuntimeInit) {
    this.llm = init.llm;
    this.loopControl = init.loopControl;
    this.session = init.session;
    this.approval = init.approval;
    this.subagents = init.subagents;
    this.promptArgs = init.promptArgs;
    this.additionalDirs = init.additionalDirs;
  }

  static async create(options: CreateRuntimeOptions): Promise<Runtime> {
    const { session } = options;
    const [workDirListing, agentsMd] = await Promise.all([
      listDirectory(session.workDir),
      loadAgentsMd(session.workDir),
    ]);

    const additionalDirs: string[] = [];
    for (const dir of session.state.additional_dirs) {
      if (await isDirectory(dir)) {
        additionalDirs.push(resolve(dir));
      } else {
        logger.warn('Additional directory no longer exists, removing it from state', { dir });
      }
    }
    if (additionalDirs.length !== session.state.additional_dirs.length) {
      session.state.additional_dirs = [...additionalDirs];
      await session.saveState();
    }

    const approvalState = new ApprovalState({
      yolo: (options.yolo ?? false) || session.state.approval.yolo,
      autoApproveActions: session.state.approval.auto_approve_actions,
    });
    approvalState.onChange = () => {
      session.state.approval = {
        yolo: approvalState.yolo,
        auto_approve_actions: [...approvalState.autoApproveActions],
      };
      session.scheduleSave();
    };

    return new Runtime({
      llm: options.llm,
      loopControl: options.loopControl ?? configService.getLoopControl(),
      session,
      approval: new Approval(approvalState),
      subagents: new SubagentRegistry(),
      promptArgs: {
        now: new Date().toISOString(),
        workDir: session.workDir,
        workDirListing,
        agentsMd: agentsMd ?? '',
        additionalDirsInfo: await describeAdditionalDirs(additionalDirs),
      },
      additionalDirs,
    });
  }

  /** Runtime of a fixed subagent: shared approval state, its own subagent registry. */
  forFixedSubagent(): Runtime {
    return this.derive(new SubagentRegistry());
  }

  /** Runtime of a dynamic subagent: shared approval state and subagent registry. */
  forDynamicSubagent(): Runtime {
    return this.derive(this.subagents);
  }

  private derive(subagents: SubagentRegistry): Runtime {
    return new Runtime({
      llm: this.llm,
      loopControl: this.loopControl,
      session: this.session,
      approval: this.approval.share(),
      subagents,
      promptArgs: this.promptArgs,
      additionalDirs: this.additionalDirs,
    });
  }
}

/** Re-create the dynamic subagents recorded in the session state. */
export function restoreDynamicSubagents(runtime: Runtime, toolset: Toolset): number {
  let restored = 0;
  for (const spec of runtime.session.state.dynamic_subagents) {
    if (runtime.subagents.has(spec.name)) {
      continue;
    }
    runtime.subagents.addDynamic(spec.name, dynamicSubagent(runtime, toolset, spec));
    restored += 1;
  }
  if (restored > 0) {
    logger.debug('Restored dynamic subagents', { count: restored });
  }
  return restored;
}

export function dynamicSubagent(
  runtime: Runtime,
  toolset: Toolset,
  spec: DynamicSubagentSpec
): Agent {
  return {
    name: spec.name,
    systemPrompt: buildSubagentSystemPrompt(runtime.promptArgs, spec.system_prompt),
    toolset,
    runtime: runtime.forDynamicSubagent(),
  };
}
