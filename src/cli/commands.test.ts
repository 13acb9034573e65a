import { join } from 'node:path';
import { Writable } from 'node:stream';
import { Chalk } from 'chalk';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { APIStatusError } from '@/backend/llm/errors';
import { createLLM } from '@/backend/llm/provider';
import { createTestDirs } from '@/backend/testing/agent-fixture';
import { ScriptedChatProvider, textResponse } from '@/backend/testing/scripted-provider';
import { WireFile } from '@/backend/wire/wire-file';
import { formatWireRecord, runPromptCommand, runReplayCommand } from './commands';

const plain = new Chalk({ level: 0 });

function capture() {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

describe('formatWireRecord', () => {
  it('prints the time, the type and the text of content parts', () => {
    const line = formatWireRecord(
      {
        timestamp: 1.5,
        message: { type: 'ContentPart', payload: { type: 'text', text: 'Hello\n  world' } },
      },
      plain
    );

    expect(line).toBe('00:00:01.500 ContentPart Hello world');
  });

  it('prints events without a payload summary on their own', () => {
    const record = { timestamp: 0, message: { type: 'TurnEnd', payload: {} } };

    const line = formatWireRecord(record, plain);

    expect(line).toBe('00:00:00.000 TurnEnd');
  });

  it('summarizes other payloads as shortened JSON', () => {
    const line = formatWireRecord(
      { timestamp: 0, message: { type: 'StatusUpdate', payload: { context_usage: 0.5 } } },
      plain
    );

    expect(line).toBe('00:00:00.000 StatusUpdate {"context_usage":0.5}');
  });

  it('truncates long summaries', () => {
    const line = formatWireRecord(
      { timestamp: 0, message: { type: 'ContentPart', payload: { text: 'x'.repeat(200) } } },
      plain
    );

    expect(line).toBe(`00:00:00.000 ContentPart ${'x'.repeat(117)}...`);
  });
});

describe('CLI commands', () => {
  let dirs: Awaited<ReturnType<typeof createTestDirs>>;

  beforeEach(async () => {
    dirs = await createTestDirs();
  });

  afterEach(async () => {
    await dirs.cleanup();
  });

  describe('runReplayCommand', () => {
    it('prints every record of the wire log', async () => {
      const wireFile = new WireFile(join(dirs.workDir, 'wire.jsonl'));
      await wireFile.append({ type: 'TurnBegin', payload: { user_input: 'hi' } }, 1);
      await wireFile.append({ type: 'StepBegin', payload: { n: 1 } }, 2);
      const stdout = capture();
      const stderr = capture();

      const code = await runReplayCommand(dirs.workDir, {
        stdout: stdout.stream,
        stderr: stderr.stream,
        chalk: plain,
      });

      expect(code).toBe(0);
      expect(stdout.text()).toBe(
        '00:00:01.000 TurnBegin {"user_input":"hi"}\n00:00:02.000 StepBegin step 1\n'
      );
      expect(stderr.text()).toBe('');
    });

    it('fails when the directory has no wire log', async () => {
      const stdout = capture();
      const stderr = capture();

      const code = await runReplayCommand(dirs.workDir, {
        stdout: stdout.stream,
        stderr: stderr.stream,
        chalk: plain,
      });

      expect(code).toBe(1);
      expect(stderr.text()).toBe(`No wire log found in ${dirs.workDir}\n`);
    });
  });

  describe('runPromptCommand', () => {
    async function prompt(llm: ReturnType<typeof createLLM> | null) {
      const stdout = capture();
      const stderr = capture();
      const code = await runPromptCommand(
        'hello',
        { workDir: dirs.workDir, sessionsDir: dirs.sessionsDir, llm },
        { stdout: stdout.stream, stderr: stderr.stream, chalk: plain }
      );
      return { code, stdout: stdout.text(), stderr: stderr.text() };
    }

    it('prints the streamed reply', async () => {
      const provider = new ScriptedChatProvider([textResponse('Hello there')]);

      const result = await prompt(createLLM(provider, { maxContextSize: 1000 }));

      expect(result).toEqual({ code: 0, stdout: 'Hello there\n', stderr: '' });
    });

    it('exits with 1 when the provider fails', async () => {
      const provider = new ScriptedChatProvider([
        { error: new APIStatusError(400, 'bad request') },
      ]);

      const result = await prompt(createLLM(provider, { maxContextSize: 1000 }));

      expect(result.code).toBe(1);
      expect(result.stderr).toBe('Error: bad request\n');
    });

    it('exits with 1 without a model', async () => {
      const result = await prompt(null);

      expect(result.code).toBe(1);
      expect(result.stderr).toBe('Error: LLM is not set\n');
    });
  });
});
