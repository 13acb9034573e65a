import { setTimeout as delay } from 'node:timers/promises';
import { QueueShutDownError } from '../lib/async-queue';
import { toError } from '../lib/error-utils';
import type { UserInput } from '../llm/message';
import { createLogger } from '../services/logger.service';
import { Wire } from '../wire/wire';
import type { WireFile } from '../wire/wire-file';
import type { Soul, TurnOutcome } from './soul';

const logger = createLogger('run-soul');

const UI_SHUTDOWN_TIMEOUT_MS = 500;

/** Consumes the wire of one run. Resolves or throws QueueShutDownError once the wire closes. */
export type UILoop = (wire: Wire) => Promise<void>;

/**
 * Run one turn of `soul` on a fresh wire that `uiLoop` consumes. The wire is shut down and
 * flushed when the turn ends, however it ends; the UI loop then gets a short grace period
 * to drain.
 */
export async function runSoul(
  soul: Soul,
  userInput: UserInput,
  uiLoop: UILoop,
  signal?: AbortSignal,
  wireFile?: WireFile
): Promise<TurnOutcome | null> {
  const wire = new Wire({ file: wireFile });
  const ui = uiLoop(wire).catch((error: unknown) => {
    if (!(error instanceof QueueShutDownError)) {
      logger.error('UI loop failed', toError(error));
    }
  });

  try {
    return await soul.run(userInput, wire, signal);
  } finally {
    wire.shutdown();
    await wire.join();

    const timeout = new AbortController();
    const finished = await Promise.race([
      ui.then(() => true),
      delay(UI_SHUTDOWN_TIMEOUT_MS, false, { signal: timeout.signal }).catch(() => false),
    ]);
    timeout.abort();
    if (!finished) {
      logger.warn('UI loop did not finish after the wire shut down', {
        timeoutMs: UI_SHUTDOWN_TIMEOUT_MS,
      });
    }
  }
}
