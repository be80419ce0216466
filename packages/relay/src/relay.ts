// Relay - Core orchestration (outbound and inbound forwarding loops)

import type { Readable, Writable } from 'node:stream';
import { BoundedQueue, DEFAULT_QUEUE_CAPACITY } from './bounded-queue.js';
import { TransportSendError, errorMessage } from './errors.js';
import { readInput } from './input-reader.js';
import type { Logger } from './logger.js';
import { writeOutput } from './output-writer.js';
import type { DirectionOutcome, DuplexConnection, Message, RelaySummary } from './types.js';

export interface RelayOptions {
  logger: Logger;
  /** Send a normal close frame once the outbound queue is exhausted. */
  closeOnInputEnd?: boolean;
}

export class Relay {
  private connection: DuplexConnection;
  private logger: Logger;
  private closeOnInputEnd: boolean;

  constructor(connection: DuplexConnection, options: RelayOptions) {
    this.connection = connection;
    this.logger = options.logger;
    this.closeOnInputEnd = options.closeOnInputEnd ?? true;
  }

  /**
   * Run both forwarding loops and resolve once *both* have finished.
   * Neither loop rejects; failures come back in the summary.
   */
  async run(outbound: BoundedQueue<Message>, inbound: BoundedQueue<Message>): Promise<RelaySummary> {
    const [outboundOutcome, inboundOutcome] = await Promise.all([
      this.forwardOutbound(outbound),
      this.forwardInbound(inbound),
    ]);
    return { outbound: outboundOutcome, inbound: inboundOutcome };
  }

  private async forwardOutbound(queue: BoundedQueue<Message>): Promise<DirectionOutcome> {
    let sent = 0;

    try {
      for await (const message of queue) {
        await this.connection.sink.send(message);
        sent++;
      }
    } catch (err) {
      const error = err instanceof TransportSendError
        ? err
        : new TransportSendError(`Send failed: ${errorMessage(err)}`, { cause: err });
      this.logger.error(`[relay] Outbound loop stopped after ${sent} messages: ${error.message}`);

      // Stop the input reader; nothing will drain this queue again
      queue.close();
      return { status: 'failed', messages: sent, error };
    }

    this.logger.debug(`[relay] Outbound queue drained after ${sent} messages`);

    if (this.closeOnInputEnd) {
      try {
        await this.connection.sink.close();
      } catch (err) {
        this.logger.warn(`[relay] Failed to close connection after input ended: ${errorMessage(err)}`);
      }
    }

    return { status: 'completed', messages: sent };
  }

  private async forwardInbound(queue: BoundedQueue<Message>): Promise<DirectionOutcome> {
    let received = 0;

    try {
      for await (const item of this.connection.source) {
        if (!item.ok) {
          this.logger.warn(`[relay] Discarding inbound error: ${item.error.message}`);
          continue;
        }

        if (await queue.push(item.message)) {
          received++;
        } else {
          this.logger.debug(`[relay] Inbound queue closed, discarding ${item.message.type} message`);
        }
      }

      this.logger.debug(`[relay] Connection source ended after ${received} messages`);
      return { status: 'completed', messages: received };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error(`[relay] Inbound loop stopped after ${received} messages: ${error.message}`);
      return { status: 'failed', messages: received, error };
    } finally {
      queue.close();
    }
  }
}

export interface RelayIo {
  input: Readable;
  output: Writable;
}

export interface RunRelayOptions extends RelayOptions {
  queueCapacity?: number;
  /**
   * Stops the relay: the connection is terminated and no further input is
   * sent, while inbound messages already received are still written out.
   */
  signal?: AbortSignal;
}

export interface RelayRunResult extends RelaySummary {
  /** Undefined when the reader was still blocked on input as the relay finished. */
  input?: DirectionOutcome;
  output: DirectionOutcome;
}

/**
 * Wire local streams to an open connection: start the reader, the writer and
 * both forwarding loops, then wait for the loops and for the writer to drain.
 */
export async function runRelay(
  connection: DuplexConnection,
  io: RelayIo,
  options: RunRelayOptions,
): Promise<RelayRunResult> {
  const { logger } = options;
  const capacity = options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY;
  const outbound = new BoundedQueue<Message>(capacity);
  const inbound = new BoundedQueue<Message>(capacity);

  const reader = readInput({ input: io.input, queue: outbound, logger });
  const writer = writeOutput({ output: io.output, queue: inbound, logger });

  const { signal } = options;
  const stop = () => {
    logger.debug('[relay] Stop requested, terminating connection');
    outbound.close();
    connection.terminate();
  };
  if (signal?.aborted) {
    stop();
  } else {
    signal?.addEventListener('abort', stop, { once: true });
  }

  const relay = new Relay(connection, options);
  logger.info(`[relay] Relaying to ${connection.url}`);
  let summary: RelaySummary;
  try {
    summary = await relay.run(outbound, inbound);
  } finally {
    signal?.removeEventListener('abort', stop);
  }

  // The inbound loop closed its queue on exit, so the writer finishes once drained
  const output = await writer;

  // A completed outbound loop means the reader closed its queue and has returned.
  // After a send failure or a stop the reader may be parked on a read that never finishes.
  let input: DirectionOutcome | undefined;
  if (summary.outbound.status === 'completed' && !signal?.aborted) {
    input = await reader;
  } else {
    void reader.then(
      (outcome) => logger.debug(`[relay] Input reader finished late: ${outcome.status}`),
      (err) => logger.error(`[relay] Input reader failed: ${errorMessage(err)}`),
    );
  }

  logger.info(
    `[relay] Finished: ${summary.outbound.messages} sent (${summary.outbound.status}), ` +
      `${summary.inbound.messages} received (${summary.inbound.status})`,
  );

  return { ...summary, input, output };
}

export function exitCodeFor(result: RelaySummary): number {
  return result.outbound.status === 'failed' || result.inbound.status === 'failed' ? 1 : 0;
}
