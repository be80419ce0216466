// Fake Connection - In-memory duplex connection for driving the relay loops

import { Readable, Writable } from 'node:stream';
import { BoundedQueue } from '../../bounded-queue.js';
import { TransportSendError } from '../../errors.js';
import { createLogger, type Logger } from '../../logger.js';
import type { DuplexConnection, Message, Sink, Source, SourceItem } from '../../types.js';

export class FakeConnection implements DuplexConnection {
  readonly url = 'ws://relay.test/';
  readonly sent: Message[] = [];
  closed = false;
  terminated = false;

  /** Sends at or past this index reject. */
  failSendAt?: number;
  onSend?: (message: Message) => void;
  onClose?: () => void;

  private incoming = new BoundedQueue<SourceItem>(1024);

  readonly sink: Sink = {
    send: async (message) => {
      if (this.failSendAt !== undefined && this.sent.length >= this.failSendAt) {
        throw new TransportSendError('Send failed: socket hang up');
      }
      this.sent.push(message);
      this.onSend?.(message);
    },
    close: async () => {
      this.closed = true;
      this.onClose?.();
    },
  };

  readonly source: Source = {
    [Symbol.asyncIterator]: () => this.incoming[Symbol.asyncIterator](),
  };

  receive(message: Message): void {
    this.incoming.tryPush({ ok: true, message });
  }

  receiveError(error: Error): void {
    this.incoming.tryPush({ ok: false, error });
  }

  /** Peer closed the connection. */
  end(): void {
    this.incoming.close();
  }

  terminate(): void {
    this.terminated = true;
    this.end();
  }
}

export function collectingOutput(): { output: Writable; chunks: string[]; text: () => string } {
  const chunks: string[] = [];
  const output = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { output, chunks, text: () => chunks.join('') };
}

export function linesInput(lines: Array<string | Buffer>): Readable {
  return Readable.from(lines);
}

export function quietLogger(): Logger {
  return createLogger('error', () => undefined);
}

/** Let pending stream reads, pushes and pops settle. */
export async function settle(rounds = 3): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}
