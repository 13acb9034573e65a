/**
 * Prompts for summarizing older conversation history.
 */

export const COMPACTION_SYSTEM_PROMPT =
  'You are a helpful assistant that compacts conversation context.';

export const COMPACTION_NOTICE = 'Previous context has been compacted. Here is the compaction output:';

export const COMPACTION_INSTRUCTION = `---

The messages above are the earlier part of a conversation between a user and a coding agent.
Write a compact summary that lets the agent continue the work without the original messages.

Keep:
- the user's goals, constraints and preferences, in their own words where precise wording matters
- decisions made and the reasons the user gave for them
- files, functions and commands that were touched or inspected, with their current state
- errors that were hit and how they were resolved, or that they are still open
- the work in progress and the next planned steps

Drop pleasantries, repeated tool output and anything superseded by later messages.
Answer with the summary only.`;

export function buildCustomInstructionBlock(instruction: string): string {
  return `\n\nThe user asked the summary to pay particular attention to the following:\n${instruction}`;
}
