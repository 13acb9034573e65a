import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { type Message, systemPart, textPart } from '../llm/message';
import { Context } from './context';

const user = (text: string): Message => ({ role: 'user', content: [textPart(text)] });
const assistant = (text: string): Message => ({ role: 'assistant', content: [textPart(text)] });

describe('Context', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'loom-context-'));
    file = path.join(dir, 'context.jsonl');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('restores messages, token count and checkpoints', async () => {
    const context = new Context(file);
    await context.checkpoint();
    await context.appendMessage(user('hi'));
    await context.appendMessage(assistant('hello'));
    await context.updateTokenCount(42);

    const restored = new Context(file);
    await expect(restored.restore()).resolves.toBe(true);

    expect(restored.history).toEqual([user('hi'), assistant('hello')]);
    expect(restored.tokenCount).toBe(42);
    expect(restored.checkpointCount).toBe(1);
  });

  it('omits absent optional fields when persisting', async () => {
    const context = new Context(file);
    await context.appendMessage(user('hi'));

    const line = (await fs.readFile(file, 'utf-8')).trim();
    expect(JSON.parse(line)).toEqual({ role: 'user', content: [{ type: 'text', text: 'hi' }] });
  });

  it('reports nothing to restore for a missing or empty file', async () => {
    await expect(new Context(file).restore()).resolves.toBe(false);
    await fs.writeFile(file, '\n', 'utf-8');
    await expect(new Context(file).restore()).resolves.toBe(false);
  });

  it('skips corrupt lines on restore', async () => {
    await fs.writeFile(
      file,
      ['{"role":"user","content":"plain"}', '{broken', '{"role":"wizard","content":[]}', ''].join(
        '\n'
      ),
      'utf-8'
    );

    const context = new Context(file);
    await context.restore();

    expect(context.history).toEqual([user('plain')]);
  });

  it('keeps memory unchanged when the file write fails', async () => {
    const blocker = path.join(dir, 'blocker');
    await fs.writeFile(blocker, '', 'utf-8');
    const context = new Context(path.join(blocker, 'context.jsonl'));

    await expect(context.appendMessage(user('lost'))).rejects.toThrow();
    await expect(context.updateTokenCount(10)).rejects.toThrow();
    await expect(context.checkpoint()).rejects.toThrow();

    expect(context.history).toEqual([]);
    expect(context.tokenCount).toBe(0);
    expect(context.checkpointCount).toBe(0);
  });

  it('clears into a rotated file', async () => {
    const context = new Context(file);
    await context.appendMessage(user('old'));
    await context.updateTokenCount(10);

    await context.clear();

    expect(context.history).toEqual([]);
    expect(context.tokenCount).toBe(0);
    expect(await fs.readFile(file, 'utf-8')).toBe('');
    const rotated = await fs.readFile(path.join(dir, 'context_1.jsonl'), 'utf-8');
    expect(rotated).toContain('"old"');
  });

  it('leaves no rotation behind when clearing before anything was written', async () => {
    const context = new Context(file);

    await context.clear();

    expect(await fs.readdir(dir)).toEqual(['context.jsonl']);
  });

  it('replaces the history wholesale', async () => {
    const context = new Context(file);
    await context.appendMessage(user('a'), assistant('b'), user('c'));

    await context.replace([user('summary'), user('c')], 7);

    const restored = new Context(file);
    await restored.restore();
    expect(restored.history).toEqual([user('summary'), user('c')]);
    expect(restored.tokenCount).toBe(7);
    expect(restored.checkpointCount).toBe(1);
  });

  it('reverts to a checkpoint', async () => {
    const context = new Context(file);
    await context.checkpoint();
    await context.appendMessage(user('first'));
    await context.updateTokenCount(5);
    const second = await context.checkpoint(true);
    await context.appendMessage(user('second'));
    await context.updateTokenCount(9);

    await context.revertTo(second);

    expect(context.history).toEqual([user('first')]);
    expect(context.tokenCount).toBe(5);
    expect(context.checkpointCount).toBe(1);
    await expect(context.revertTo(3)).rejects.toThrow('Checkpoint 3 does not exist');
  });

  it('adds a checkpoint notice when asked', async () => {
    const context = new Context(file);

    const id = await context.checkpoint(true);

    expect(id).toBe(0);
    expect(context.history).toEqual([{ role: 'user', content: [systemPart('CHECKPOINT 0')] }]);
  });
});
