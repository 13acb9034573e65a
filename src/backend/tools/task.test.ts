import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { textPart, userMessage } from '../llm/message';
import { toolOk } from '../llm/tooling';
import { Runtime } from '../soul/agent';
import { CONTINUE_PROMPT } from '../soul/subagent';
import { Toolset } from '../soul/toolset';
import {
  collectWire,
  createTestAgent,
  createTestDirs,
  eventsOf,
  FunctionTool,
  type TestAgent,
} from '../testing/agent-fixture';
import {
  type ScriptedResponse,
  textResponse,
  toolCallResponse,
} from '../testing/scripted-provider';
import { Wire } from '../wire/wire';
import { TaskTool } from './task';

const REPORT = 'Implemented the parser and covered it with tests. '.repeat(5);

const taskCall = (subagentName: string) =>
  toolCallResponse([
    {
      id: 'call-task',
      name: 'Task',
      args: { description: 'Write parser', subagent_name: subagentName, prompt: 'write it' },
    },
  ]);

describe('TaskTool', () => {
  let dirs: Awaited<ReturnType<typeof createTestDirs>>;

  beforeEach(async () => {
    dirs = await createTestDirs();
  });

  afterEach(async () => {
    await dirs.cleanup();
  });

  async function createWithCoder(
    script: ScriptedResponse[],
    coderRuntime?: (runtime: Runtime) => Runtime
  ): Promise<TestAgent> {
    const testAgent = await createTestAgent(dirs, script, {
      tools: (runtime) => [new TaskTool(runtime)],
    });
    const { runtime } = testAgent;
    runtime.subagents.addFixed(
      'coder',
      {
        name: 'coder',
        systemPrompt: 'You are a coder.',
        toolset: new Toolset([
          new FunctionTool('Echo', () => Promise.resolve(toolOk({ output: 'echo' }))),
        ]),
        runtime: coderRuntime?.(runtime) ?? runtime.forFixedSubagent(),
      },
      'Writes code'
    );
    return testAgent;
  }

  async function runTurn(testAgent: TestAgent) {
    const wire = new Wire();
    const received = collectWire(wire);
    await testAgent.soul.run('delegate', wire);
    wire.shutdown();
    return received;
  }

  it('lists the available subagents in its description', async () => {
    const { agent } = await createWithCoder([]);

    const definition = agent.toolset.definitions.find((tool) => tool.name === 'Task');

    expect(definition?.description).toContain('Available subagents:\n- coder: Writes code');
  });

  it('runs the subagent and returns its final answer', async () => {
    const testAgent = await createWithCoder([
      taskCall('coder'),
      textResponse(REPORT),
      textResponse('main done'),
    ]);

    const messages = await runTurn(testAgent);

    expect(eventsOf(messages, 'ToolResult')).toEqual([
      { tool_call_id: 'call-task', return_value: toolOk({ output: REPORT }) },
    ]);
    const calls = testAgent.provider.calls;
    expect(calls[1]?.systemPrompt).toBe('You are a coder.');
    expect(calls[1]?.history).toEqual([userMessage('write it')]);
    expect(calls[1]?.tools).toEqual(['Echo']);
    expect(calls).toHaveLength(3);

    const wrapped = eventsOf(messages, 'SubagentEvent');
    expect(wrapped.every((payload) => payload.task_tool_call_id === 'call-task')).toBe(true);
    expect(wrapped.map((payload) => payload.event.type)).toEqual([
      'TurnBegin',
      'StepBegin',
      'ContentPart',
      'StatusUpdate',
      'TurnEnd',
    ]);

    const contextFile = path.join(testAgent.session.dir, 'context_sub_1.jsonl');
    expect((await fs.readFile(contextFile, 'utf-8')).split('\n')).toContain(
      JSON.stringify({ role: 'user', content: [textPart('write it')] })
    );
  });

  it('asks a brief subagent for more detail once', async () => {
    const testAgent = await createWithCoder([
      taskCall('coder'),
      textResponse('done'),
      textResponse('The parser lives in src/parser.ts.'),
      textResponse('main done'),
    ]);

    const messages = await runTurn(testAgent);

    expect(testAgent.provider.calls[2]?.history.at(-1)).toEqual(userMessage(CONTINUE_PROMPT));
    expect(eventsOf(messages, 'ToolResult')).toEqual([
      {
        tool_call_id: 'call-task',
        return_value: toolOk({ output: 'The parser lives in src/parser.ts.' }),
      },
    ]);
  });

  it('reports an unknown subagent', async () => {
    const testAgent = await createWithCoder([taskCall('ghost'), textResponse('main done')]);

    const messages = await runTurn(testAgent);

    const [result] = eventsOf(messages, 'ToolResult');
    expect(result?.return_value.is_error).toBe(true);
    expect(result?.return_value.message).toBe('Subagent not found: ghost');
  });

  it('turns a subagent hitting its step limit into a tool error', async () => {
    const testAgent = await createWithCoder(
      [
        taskCall('coder'),
        toolCallResponse([{ id: 'call-echo', name: 'Echo' }]),
        textResponse('main done'),
      ],
      (runtime) =>
        new Runtime({
          llm: runtime.llm,
          loopControl: { ...runtime.loopControl, maxStepsPerTurn: 1 },
          session: runtime.session,
          approval: runtime.approval.share(),
          subagents: runtime.subagents,
          promptArgs: runtime.promptArgs,
          additionalDirs: runtime.additionalDirs,
        })
    );

    const messages = await runTurn(testAgent);

    const result = eventsOf(messages, 'ToolResult').find(
      (payload) => payload.tool_call_id === 'call-task'
    );
    expect(result?.return_value.is_error).toBe(true);
    expect(result?.return_value.message).toBe(
      'Max steps 1 reached when running subagent. ' +
        'Please try splitting the task into smaller subtasks.'
    );
  });
});
