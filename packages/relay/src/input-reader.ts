// Input Reader - Splits the local input stream into lines and queues them as text messages

import type { Readable } from 'node:stream';
import { TextDecoder } from 'node:util';
import type { BoundedQueue } from './bounded-queue.js';
import { LocalStreamError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import { textMessage, type DirectionOutcome, type Message } from './types.js';

export interface InputReaderOptions {
  input: Readable;
  queue: BoundedQueue<Message>;
  logger: Logger;
}

/**
 * Read `input` until it ends, pushing one text message per line onto `queue`.
 * Lines keep their terminator exactly as received; a trailing line without
 * one is sent as-is once the stream ends. Input that is not valid UTF-8 ends
 * the reader as a read failure. The queue is closed when the reader stops, for
 * whatever reason.
 */
export async function readInput(options: InputReaderOptions): Promise<DirectionOutcome> {
  const { input, queue, logger } = options;
  const decoder = new TextDecoder('utf-8', { fatal: true });
  let pending = '';
  let sent = 0;

  const enqueue = async (line: string): Promise<boolean> => {
    logger.info(`[input] outgoing: ${line.trimEnd()}`);
    if (!(await queue.push(textMessage(line)))) {
      logger.debug('[input] Outbound queue closed, stopping reader');
      return false;
    }
    sent++;
    return true;
  };

  try {
    for await (const chunk of input) {
      pending += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });

      let newline = pending.indexOf('\n');
      while (newline !== -1) {
        const line = pending.slice(0, newline + 1);
        pending = pending.slice(newline + 1);
        if (!(await enqueue(line))) return { status: 'completed', messages: sent };
        newline = pending.indexOf('\n');
      }
    }

    pending += decoder.decode();
    if (pending.length > 0) {
      await enqueue(pending);
    }

    logger.debug(`[input] End of input after ${sent} lines`);
    return { status: 'completed', messages: sent };
  } catch (err) {
    const error = new LocalStreamError(`Failed to read input: ${errorMessage(err)}`, { cause: err });
    logger.error(`[input] ${error.message}`);
    return { status: 'failed', messages: sent, error };
  } finally {
    queue.close();
  }
}
