import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { writeFileAtomic } from '../lib/atomic-file';
import { toErrorMessage } from '../lib/error-utils';
import { isMissingFileError } from '../lib/file-helpers';
import { createLogger } from '../services/logger.service';

const logger = createLogger('session-state');

export const STATE_FILE_NAME = 'state.json';

export const DynamicSubagentSpecSchema = z.object({
  name: z.string().min(1),
  system_prompt: z.string(),
});

export const SessionStateSchema = z.object({
  version: z.literal(1),
  approval: z
    .object({
      yolo: z.boolean().default(false),
      auto_approve_actions: z.array(z.string()).default([]),
    })
    .default({}),
  dynamic_subagents: z.array(DynamicSubagentSpecSchema).default([]),
  additional_dirs: z.array(z.string()).default([]),
});

export type DynamicSubagentSpec = z.infer<typeof DynamicSubagentSpecSchema>;
export type SessionState = z.infer<typeof SessionStateSchema>;

export function defaultSessionState(): SessionState {
  return {
    version: 1,
    approval: { yolo: false, auto_approve_actions: [] },
    dynamic_subagents: [],
    additional_dirs: [],
  };
}

/**
 * Read `state.json`. A missing file yields defaults silently; anything unreadable or
 * invalid yields defaults with a warning.
 */
export async function loadSessionState(file: string): Promise<SessionState> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (!isMissingFileError(error)) {
      logger.warn('Failed to read session state, using defaults', {
        file,
        error: toErrorMessage(error),
      });
    }
    return defaultSessionState();
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    logger.warn('Session state is not valid JSON, using defaults', {
      file,
      error: toErrorMessage(error),
    });
    return defaultSessionState();
  }

  const parsed = SessionStateSchema.safeParse(data);
  if (!parsed.success) {
    logger.warn('Session state failed validation, using defaults', {
      file,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    return defaultSessionState();
  }
  return parsed.data;
}

export async function saveSessionState(file: string, state: SessionState): Promise<void> {
  await writeFileAtomic(file, `${JSON.stringify(state, null, 2)}\n`, { fsync: true });
}
