/**
 * System prompts of the main agent and of subagents.
 */

import { PromptBuilder } from './builder';

export interface SystemPromptArgs {
  /** ISO timestamp of when the runtime started. */
  now: string;
  workDir: string;
  workDirListing: string;
  /** Contents of AGENTS.md, or empty. */
  agentsMd: string;
  /** Listings of directories added with /add-dir, or empty. */
  additionalDirsInfo: string;
}

function replacements(args: SystemPromptArgs): Record<string, string> {
  return {
    '${LOOM_NOW}': args.now,
    '${LOOM_WORK_DIR}': args.workDir,
    '${LOOM_WORK_DIR_LS}': args.workDirListing,
  };
}

function projectSections(builder: PromptBuilder, args: SystemPromptArgs): PromptBuilder {
  builder.addFile('workspace.md');
  if (args.additionalDirsInfo) {
    builder.addRaw(`## Additional Directories\n\n${args.additionalDirsInfo}`);
  }
  if (args.agentsMd) {
    builder.addRaw(`## Project Notes (AGENTS.md)\n\n${args.agentsMd}`);
  }
  return builder;
}

export function buildAgentSystemPrompt(args: SystemPromptArgs): string {
  const prompt = projectSections(new PromptBuilder().addFile('agent-role.md'), args).build();
  return PromptBuilder.applyReplacements(prompt, replacements(args));
}

/** Prompt for a subagent; `instructions` describe its specialty. */
export function buildSubagentSystemPrompt(args: SystemPromptArgs, instructions: string): string {
  const builder = new PromptBuilder()
    .addFile('agent-role.md')
    .addFile('subagent-role.md')
    .addRaw(instructions);
  const prompt = projectSections(builder, args).build();
  return PromptBuilder.applyReplacements(prompt, replacements(args));
}
