import { createInterface } from 'node:readline';
import { PassThrough } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { isRecord } from '../lib/error-utils';
import { APIStatusError } from '../llm/errors';
import { toolOk } from '../llm/tooling';
import {
  createTestAgent,
  createTestDirs,
  FunctionTool,
  type TestAgentOptions,
} from '../testing/agent-fixture';
import {
  type ScriptedResponse,
  textResponse,
  toolCallResponse,
} from '../testing/scripted-provider';
import { AskUserQuestionTool, QUESTION_NOT_SUPPORTED_MESSAGE } from '../tools/ask-user-question';
import { WireServer } from './server';

const mockWarn = vi.hoisted(() => vi.fn());

vi.mock('../services/logger.service', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: mockWarn,
    error: vi.fn(),
  }),
}));

type JsonObject = Record<string, unknown>;

/** The client end of a server running on in-memory streams. */
class TestClient {
  readonly input = new PassThrough();
  readonly output = new PassThrough();
  readonly received: JsonObject[] = [];
  private listeners: Array<() => void> = [];

  constructor() {
    const lines = createInterface({ input: this.output, crlfDelay: Number.POSITIVE_INFINITY });
    lines.on('line', (line) => {
      const parsed: unknown = JSON.parse(line);
      if (isRecord(parsed)) {
        this.received.push(parsed);
      }
      for (const listener of this.listeners.splice(0)) {
        listener();
      }
    });
  }

  send(message: JsonObject): void {
    this.sendRaw(JSON.stringify({ jsonrpc: '2.0', ...message }));
  }

  sendRaw(line: string): void {
    this.input.write(`${line}\n`);
  }

  async waitFor(predicate: (message: JsonObject) => boolean): Promise<JsonObject> {
    while (true) {
      const match = this.received.find(predicate);
      if (match) {
        return match;
      }
      await new Promise<void>((resolve) => this.listeners.push(resolve));
    }
  }

  response(id: string | number | null): Promise<JsonObject> {
    return this.waitFor((message) => message.id === id && !Object.hasOwn(message, 'method'));
  }

  event(type: string): Promise<JsonObject> {
    return this.waitFor((message) => message.method === 'event' && typeOf(message) === type);
  }

  request(): Promise<JsonObject> {
    return this.waitFor((message) => message.method === 'request');
  }

  eventTypes(): unknown[] {
    return this.received.filter((message) => message.method === 'event').map(typeOf);
  }
}

function typeOf(message: JsonObject): unknown {
  return isRecord(message.params) ? message.params.type : undefined;
}

const lookupTool = {
  name: 'Lookup',
  description: 'Look things up',
  parameters: { type: 'object', properties: { q: { type: 'string' } } },
};

describe('WireServer', () => {
  let dirs: Awaited<ReturnType<typeof createTestDirs>>;
  let client: TestClient;
  let serving: Promise<void> | null;

  beforeEach(async () => {
    dirs = await createTestDirs();
    client = new TestClient();
    serving = null;
  });

  afterEach(async () => {
    if (!client.input.writableEnded) {
      client.input.end();
    }
    await serving;
    await dirs.cleanup();
  });

  async function startServer(script: ScriptedResponse[], options: TestAgentOptions = {}) {
    const testAgent = await createTestAgent(dirs, script, options);
    const server = new WireServer({
      soul: testAgent.soul,
      input: client.input,
      output: client.output,
      wireFile: testAgent.session.wireFile,
      version: '1.2.3',
    });
    serving = server.serve();
    return testAgent;
  }

  describe('initialize', () => {
    it('describes the server and registers external tools', async () => {
      const { agent } = await startServer([], {
        tools: () => [new FunctionTool('Echo', () => Promise.resolve(toolOk()))],
      });

      client.send({
        id: 1,
        method: 'initialize',
        params: {
          protocol_version: '1.1',
          client: { name: 'test-client' },
          external_tools: [{ ...lookupTool, name: 'Echo' }, lookupTool],
        },
      });
      const response = await client.response(1);

      expect(response.result).toMatchObject({
        protocol_version: '1.1',
        server: { name: 'loom', version: '1.2.3' },
        capabilities: { supports_question: true },
        external_tools: {
          accepted: ['Lookup'],
          rejected: [{ name: 'Echo', reason: 'conflicts with builtin tool' }],
        },
      });
      expect(response.result).toHaveProperty(
        'slash_commands',
        expect.arrayContaining([expect.objectContaining({ name: 'compact', aliases: [] })])
      );
      expect(agent.toolset.has('Lookup')).toBe(true);
      expect(agent.toolset.isBuiltin('Lookup')).toBe(false);
    });

    it('omits external_tools when none were offered', async () => {
      await startServer([]);

      client.send({ id: 1, method: 'initialize', params: { protocol_version: '1.1' } });
      const response = await client.response(1);

      expect(response.result).not.toHaveProperty('external_tools');
    });
  });

  describe('protocol errors', () => {
    it('answers unparsable lines with a parse error', async () => {
      await startServer([]);

      client.sendRaw('{not json');

      expect(await client.response(null)).toEqual({
        jsonrpc: '2.0',
        id: null,
        error: { code: -32_700, message: 'Invalid JSON format' },
      });
    });

    it('rejects messages that are not JSON-RPC 2.0', async () => {
      await startServer([]);

      client.sendRaw(JSON.stringify({ jsonrpc: '1.0', id: 1, method: 'prompt' }));

      expect(await client.response(null)).toMatchObject({
        error: { code: -32_600, message: 'Invalid request' },
      });
    });

    it('rejects responses without a result or an error', async () => {
      await startServer([]);

      client.send({ id: 'unknown' });

      expect(await client.response(null)).toMatchObject({
        error: { code: -32_600, message: 'Invalid response' },
      });
    });

    it('reports unknown methods', async () => {
      await startServer([]);

      client.send({ id: 'x', method: 'dance' });

      expect(await client.response('x')).toMatchObject({
        error: { code: -32_601, message: 'Unexpected method received: dance' },
      });
    });

    it('reports invalid params', async () => {
      await startServer([]);

      client.send({ id: 1, method: 'prompt', params: {} });

      expect(await client.response(1)).toMatchObject({
        error: { code: -32_602, message: 'Invalid parameters for method `prompt`' },
      });
    });

    it.each(['steer', 'cancel'])('rejects %s without a running turn', async (method) => {
      await startServer([]);

      client.send({ id: 1, method, params: { user_input: 'hi' } });

      expect(await client.response(1)).toMatchObject({
        error: { code: -32_000, message: 'No agent turn is in progress' },
      });
    });
  });

  describe('prompt', () => {
    it('streams the turn as events and then finishes', async () => {
      await startServer([textResponse('Hello')]);

      client.send({ id: 1, method: 'prompt', params: { user_input: 'hi' } });
      const response = await client.response(1);

      expect(response.result).toEqual({ status: 'finished' });
      expect(client.eventTypes()).toEqual([
        'TurnBegin',
        'StepBegin',
        'ContentPart',
        'StatusUpdate',
        'TurnEnd',
      ]);
      expect(await client.event('TurnBegin')).toEqual({
        jsonrpc: '2.0',
        method: 'event',
        params: { type: 'TurnBegin', payload: { user_input: 'hi' } },
      });
      expect(await client.event('ContentPart')).toMatchObject({
        params: { payload: { type: 'text', text: 'Hello' } },
      });
    });

    it('reports max_steps_reached with the step count', async () => {
      await startServer(
        [toolCallResponse([{ id: 'call-1', name: 'Echo' }]), textResponse('unreachable')],
        {
          loopControl: { maxStepsPerTurn: 1 },
          tools: () => [new FunctionTool('Echo', () => Promise.resolve(toolOk()))],
        }
      );

      client.send({ id: 1, method: 'prompt', params: { user_input: 'hi' } });

      expect((await client.response(1)).result).toEqual({
        status: 'max_steps_reached',
        steps: 1,
      });
    });

    it('maps provider failures to CHAT_PROVIDER_ERROR', async () => {
      const failure = new APIStatusError(400, 'bad request');
      await startServer([{ error: failure }]);

      client.send({ id: 1, method: 'prompt', params: { user_input: 'hi' } });

      expect((await client.response(1)).error).toEqual({
        code: -32_003,
        message: 'bad request',
      });
    });

    it('steers and cancels a running turn', async () => {
      await startServer([{ hang: true }]);

      client.send({ id: 1, method: 'prompt', params: { user_input: 'hi' } });
      await client.event('StepBegin');

      client.send({ id: 2, method: 'prompt', params: { user_input: 'again' } });
      expect((await client.response(2)).error).toEqual({
        code: -32_000,
        message: 'An agent turn is already in progress',
      });

      client.send({ id: 3, method: 'steer', params: { user_input: 'also this' } });
      expect((await client.response(3)).result).toEqual({ status: 'steered' });

      client.send({ id: 4, method: 'cancel' });
      expect((await client.response(4)).result).toEqual({});
      expect((await client.response(1)).result).toEqual({ status: 'cancelled' });
    });
  });

  describe('external tools', () => {
    async function startWithLookup() {
      const testAgent = await startServer([
        toolCallResponse([{ id: 'call-1', name: 'Lookup', args: { q: 'loom' } }]),
        textResponse('done'),
      ]);
      client.send({
        id: 'init',
        method: 'initialize',
        params: { protocol_version: '1.1', external_tools: [lookupTool] },
      });
      await client.response('init');
      client.send({ id: 1, method: 'prompt', params: { user_input: 'look it up' } });
      return testAgent;
    }

    it('forwards calls as requests and returns the client result', async () => {
      await startWithLookup();

      expect(await client.request()).toEqual({
        jsonrpc: '2.0',
        method: 'request',
        id: 'call-1',
        params: {
          type: 'ToolCallRequest',
          payload: { id: 'call-1', name: 'Lookup', arguments: '{"q":"loom"}' },
        },
      });
      client.send({
        id: 'call-1',
        result: {
          tool_call_id: 'call-1',
          return_value: { is_error: false, output: 'found', message: '' },
        },
      });

      expect((await client.response(1)).result).toEqual({ status: 'finished' });
      expect(await client.event('ToolResult')).toMatchObject({
        params: {
          payload: {
            tool_call_id: 'call-1',
            return_value: { is_error: false, output: 'found' },
          },
        },
      });
    });

    it('turns a client error into a tool error', async () => {
      await startWithLookup();

      await client.request();
      client.send({ id: 'call-1', error: { code: 1, message: 'lookup service down' } });

      expect((await client.response(1)).result).toEqual({ status: 'finished' });
      expect(await client.event('ToolResult')).toMatchObject({
        params: {
          payload: {
            return_value: {
              is_error: true,
              message: 'lookup service down',
              display: [{ type: 'brief', text: 'External tool error' }],
            },
          },
        },
      });
    });

    it('turns a malformed result into a tool error', async () => {
      await startWithLookup();

      await client.request();
      client.send({ id: 'call-1', result: { tool_call_id: 'call-1' } });

      expect((await client.response(1)).result).toEqual({ status: 'finished' });
      expect(await client.event('ToolResult')).toMatchObject({
        params: {
          payload: {
            return_value: {
              is_error: true,
              message: 'Invalid tool result payload from client.',
            },
          },
        },
      });
    });

    it('treats a reply to a request settled by cancel as unknown', async () => {
      await startWithLookup();

      await client.request();
      client.send({ id: 2, method: 'cancel' });
      expect((await client.response(1)).result).toEqual({ status: 'cancelled' });
      mockWarn.mockClear();

      client.send({
        id: 'call-1',
        result: {
          tool_call_id: 'call-1',
          return_value: { is_error: false, output: 'late', message: '' },
        },
      });
      client.send({ id: 3, method: 'cancel' });
      await client.response(3);

      expect(mockWarn).toHaveBeenCalledWith('No pending request for response', { id: 'call-1' });
    });

    it('cancels the turn when the input closes mid-call', async () => {
      await startWithLookup();

      await client.request();
      client.input.end();
      await serving;

      expect((await client.response(1)).result).toEqual({ status: 'cancelled' });
    });
  });

  describe('questions', () => {
    const askCall = toolCallResponse([
      {
        id: 'call-q',
        name: 'AskUserQuestion',
        args: {
          questions: [
            { question: 'Which database?', options: [{ label: 'Postgres' }, { label: 'SQLite' }] },
          ],
        },
      },
    ]);

    it('forwards questions to clients that support them', async () => {
      await startServer([askCall, textResponse('ok')], {
        tools: () => [new AskUserQuestionTool()],
      });
      client.send({
        id: 'init',
        method: 'initialize',
        params: { protocol_version: '1.1', capabilities: { supports_question: true } },
      });
      await client.response('init');
      client.send({ id: 1, method: 'prompt', params: { user_input: 'pick one' } });

      const question = await client.request();
      expect(question).toMatchObject({
        params: { type: 'QuestionRequest', payload: { tool_call_id: 'call-q' } },
      });
      client.send({
        id: question.id,
        result: { request_id: question.id, answers: { 'Which database?': 'Postgres' } },
      });

      expect((await client.response(1)).result).toEqual({ status: 'finished' });
      expect(await client.event('ToolResult')).toMatchObject({
        params: {
          payload: {
            return_value: {
              is_error: false,
              output: '{"answers":{"Which database?":"Postgres"}}',
            },
          },
        },
      });
    });

    it('fails the question tool for clients without question support', async () => {
      await startServer([askCall, textResponse('ok')], {
        tools: () => [new AskUserQuestionTool()],
      });

      client.send({ id: 1, method: 'prompt', params: { user_input: 'pick one' } });

      expect((await client.response(1)).result).toEqual({ status: 'finished' });
      expect(client.received.some((message) => message.method === 'request')).toBe(false);
      expect(await client.event('ToolResult')).toMatchObject({
        params: {
          payload: { return_value: { is_error: true, message: QUESTION_NOT_SUPPORTED_MESSAGE } },
        },
      });
    });
  });

  describe('replay', () => {
    it('streams the recorded wire log', async () => {
      await startServer([textResponse('Hello')]);
      client.send({ id: 1, method: 'prompt', params: { user_input: 'hi' } });
      await client.response(1);

      client.send({ id: 2, method: 'replay' });
      const response = await client.response(2);

      expect(response.result).toEqual({ status: 'finished', events: 5, requests: 0 });
      expect(client.eventTypes()).toEqual([
        'TurnBegin',
        'StepBegin',
        'ContentPart',
        'StatusUpdate',
        'TurnEnd',
        'TurnBegin',
        'StepBegin',
        'ContentPart',
        'StatusUpdate',
        'TurnEnd',
      ]);
    });
  });
});
