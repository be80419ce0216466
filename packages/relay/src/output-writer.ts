// Output Writer - Writes inbound text payloads to the local output stream, one flush per message

import type { Writable } from 'node:stream';
import type { BoundedQueue } from './bounded-queue.js';
import { LocalStreamError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import { isTextMessage, type DirectionOutcome, type Message } from './types.js';

export interface OutputWriterOptions {
  output: Writable;
  queue: BoundedQueue<Message>;
  logger: Logger;
}

export async function writeOutput(options: OutputWriterOptions): Promise<DirectionOutcome> {
  const { output, queue, logger } = options;
  let written = 0;

  // Write failures surface through the write callback; keep the stream's
  // 'error' event from crashing the process
  const onStreamError = (err: Error) => {
    logger.debug(`[output] Output stream error: ${err.message}`);
  };
  output.on('error', onStreamError);

  try {
    for await (const message of queue) {
      if (!isTextMessage(message)) {
        logger.debug(`[output] Dropping ${message.type} message`);
        continue;
      }

      logger.info(`[output] incoming: ${message.data.trimEnd()}`);
      await writeAndFlush(output, message.data);
      written++;
    }
    return { status: 'completed', messages: written };
  } catch (err) {
    const error = err instanceof LocalStreamError
      ? err
      : new LocalStreamError(`Failed to write output: ${errorMessage(err)}`, { cause: err });
    logger.error(`[output] ${error.message}`);

    // Nobody drains the queue any more; release the producer
    queue.close();
    return { status: 'failed', messages: written, error };
  } finally {
    output.off('error', onStreamError);
  }
}

function writeAndFlush(output: Writable, data: string): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(data, 'utf8', (err) => {
      if (err) {
        reject(new LocalStreamError(`Failed to write output: ${err.message}`, { cause: err }));
      } else {
        resolve();
      }
    });
  });
}
