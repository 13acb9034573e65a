import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { createLLM, type ModelCapability } from '../llm/provider';
import type { ToolReturnValue } from '../llm/tooling';
import { DEFAULT_LOOP_CONTROL, type LoopControl } from '../services/config.service';
import { Session } from '../session/session';
import { type Agent, Runtime } from '../soul/agent';
import { Context } from '../soul/context';
import { Soul } from '../soul/soul';
import { type Tool, type ToolCallScope, Toolset, ZodTool } from '../soul/toolset';
import {
  isRequest,
  type WireEvent,
  type WireEventType,
  type WireMessage,
  type WireRequestMessage,
} from '../wire/types';
import type { Wire } from '../wire/wire';
import { ScriptedChatProvider, type ScriptedResponse } from './scripted-provider';

export const TEST_SYSTEM_PROMPT = 'You are a test agent.';

const AnyArgsSchema = z.record(z.string(), z.unknown());

export interface TestAgentOptions {
  loopControl?: Partial<LoopControl>;
  maxContextSize?: number;
  capabilities?: ModelCapability[];
  tools?: (runtime: Runtime) => Tool[];
}

export interface TestAgent {
  provider: ScriptedChatProvider;
  session: Session;
  runtime: Runtime;
  agent: Agent;
  soul: Soul;
}

/** Temporary work and sessions directories, removed by `cleanup()`. */
export async function createTestDirs(): Promise<{
  workDir: string;
  sessionsDir: string;
  cleanup: () => Promise<void>;
}> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'loom-agent-'));
  const workDir = path.join(root, 'work');
  const sessionsDir = path.join(root, 'sessions');
  await fs.mkdir(workDir);
  return {
    workDir,
    sessionsDir,
    cleanup: () => fs.rm(root, { recursive: true, force: true }),
  };
}

/** A main agent on a scripted provider with a fresh session in `workDir`. */
export async function createTestAgent(
  dirs: { workDir: string; sessionsDir: string },
  script: ScriptedResponse[],
  options: TestAgentOptions = {}
): Promise<TestAgent> {
  const provider = new ScriptedChatProvider(script);
  const session = await Session.create(dirs.workDir, { sessionsDir: dirs.sessionsDir });
  const runtime = await Runtime.create({
    llm: createLLM(provider, {
      maxContextSize: options.maxContextSize ?? 1000,
      capabilities: options.capabilities,
    }),
    session,
    loopControl: { ...DEFAULT_LOOP_CONTROL, ...options.loopControl },
  });
  const agent: Agent = {
    name: 'main',
    systemPrompt: TEST_SYSTEM_PROMPT,
    toolset: new Toolset(options.tools?.(runtime) ?? []),
    runtime,
  };
  const soul = new Soul(agent, new Context(session.contextFile), {
    sleep: () => Promise.resolve(),
  });
  return { provider, session, runtime, agent, soul };
}

/**
 * Attach a request-handling side and collect everything it receives until the wire shuts
 * down. `onRequest` answers requests as they arrive.
 */
export function collectWire(
  wire: Wire,
  onRequest?: (request: WireRequestMessage) => void
): Promise<WireMessage[]> {
  const side = wire.attach();
  return (async () => {
    const received: WireMessage[] = [];
    for await (const message of side) {
      received.push(message);
      if (isRequest(message)) {
        onRequest?.(message);
      }
    }
    return received;
  })();
}

export function messageTypes(messages: readonly WireMessage[]): string[] {
  return messages.map((message) => message.type);
}

/** Payloads of every event of `type`, in arrival order. */
export function eventsOf<T extends WireEventType>(
  messages: readonly WireMessage[],
  type: T
): Array<Extract<WireEvent, { type: T }>['payload']> {
  const matches = (message: WireMessage): message is Extract<WireEvent, { type: T }> =>
    message.type === type;
  return messages.filter(matches).map((event) => event.payload);
}

/** Tool backed by a function, accepting any arguments object. */
export class FunctionTool extends ZodTool<typeof AnyArgsSchema> {
  readonly description: string;
  readonly parameters = { type: 'object', properties: {} };
  protected readonly schema = AnyArgsSchema;

  constructor(
    readonly name: string,
    private readonly fn: (
      params: Record<string, unknown>,
      scope: ToolCallScope
    ) => Promise<ToolReturnValue>
  ) {
    super();
    this.description = `Test tool ${name}`;
  }

  protected execute(
    params: Record<string, unknown>,
    scope: ToolCallScope
  ): Promise<ToolReturnValue> {
    return this.fn(params, scope);
  }
}
