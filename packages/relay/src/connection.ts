// Connection - WebSocket duplex connection split into a Sink and a Source
//
// Opened once before the relay starts; never re-established. The Source ends
// when the socket closes, for any reason.

import WebSocket from 'ws';
import { StartupError, TransportReceiveError, TransportSendError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type { DuplexConnection, Message, Sink, Source, SourceItem } from './types.js';

export interface ConnectOptions {
  headers?: Record<string, string>;
  protocols?: string[];
  /** Buffered inbound items before the socket is paused. */
  highWaterMark?: number;
  logger?: Logger;
}

const DEFAULT_HIGH_WATER_MARK = 64;
const NORMAL_CLOSURE = 1000;

/**
 * Open a WebSocket to `url`. Resolves once the handshake completes; any
 * failure before that rejects with a StartupError.
 */
export function connect(url: string, options: ConnectOptions = {}): Promise<WsConnection> {
  const logger = options.logger;

  return new Promise((resolve, reject) => {
    let ws: WebSocket;
    try {
      ws = new WebSocket(url, options.protocols ?? [], { headers: options.headers });
    } catch (err) {
      reject(new StartupError(`Failed to connect to ${url}: ${errorMessage(err)}`, { cause: err }));
      return;
    }

    logger?.info(`[connection] Connecting to ${url}`);

    const onOpen = () => {
      ws.off('error', onError);
      logger?.info(`[connection] Connected to ${url}`);
      resolve(new WsConnection(url, ws, options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK, logger));
    };

    const onError = (err: Error) => {
      ws.off('open', onOpen);
      reject(new StartupError(`Failed to connect to ${url}: ${err.message}`, { cause: err }));
    };

    ws.once('open', onOpen);
    ws.once('error', onError);
  });
}

export class WsConnection implements DuplexConnection {
  readonly url: string;
  readonly sink: Sink;
  readonly source: Source;

  private ws: WebSocket;
  private logger?: Logger;
  private highWaterMark: number;
  private inbox: SourceItem[] = [];
  private wake: (() => void) | null = null;
  private ended = false;
  private paused = false;

  constructor(url: string, ws: WebSocket, highWaterMark: number, logger?: Logger) {
    this.url = url;
    this.ws = ws;
    this.highWaterMark = highWaterMark;
    this.logger = logger;

    ws.on('message', (data, isBinary) => {
      const payload = toBuffer(data);
      const message: Message = isBinary
        ? { type: 'binary', data: payload }
        : { type: 'text', data: payload.toString('utf8') };
      this.deliver({ ok: true, message });
    });

    ws.on('error', (err) => {
      this.logger?.warn(`[connection] Transport error: ${err.message}`);
      this.deliver({
        ok: false,
        error: new TransportReceiveError(`Receive failed: ${err.message}`, { cause: err }),
      });
    });

    ws.on('close', (code, reason) => {
      this.logger?.info(`[connection] Closed: ${code} ${reason.toString()}`.trimEnd());
      this.ended = true;
      this.notify();
    });

    this.sink = {
      send: (message) => this.send(message),
      close: () => this.close(),
    };
    this.source = {
      [Symbol.asyncIterator]: () => this.receive(),
    };
  }

  get connected(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  terminate(): void {
    if (this.ws.readyState === WebSocket.CLOSED) return;
    this.logger?.info('[connection] Terminating');
    this.ws.terminate();
  }

  private send(message: Message): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.ws.readyState !== WebSocket.OPEN) {
        reject(new TransportSendError(`Connection not open (state=${this.ws.readyState})`));
        return;
      }

      const done = (err?: Error) => {
        if (err) {
          reject(new TransportSendError(`Send failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      };

      switch (message.type) {
        case 'text':
          this.ws.send(message.data, { binary: false }, done);
          break;
        case 'binary':
          this.ws.send(message.data, { binary: true }, done);
          break;
        case 'ping':
          this.ws.ping(message.data, undefined, done);
          break;
        case 'pong':
          this.ws.pong(message.data, undefined, done);
          break;
        case 'close':
          try {
            this.ws.close(message.code, message.reason);
            resolve();
          } catch (err) {
            reject(new TransportSendError(`Close failed: ${errorMessage(err)}`, { cause: err }));
          }
          break;
      }
    });
  }

  private async close(): Promise<void> {
    if (this.ws.readyState !== WebSocket.OPEN) return;
    this.logger?.debug('[connection] Sending close frame');
    this.ws.close(NORMAL_CLOSURE);
  }

  private async *receive(): AsyncGenerator<SourceItem, void, undefined> {
    while (true) {
      const item = this.inbox.shift();
      if (item) {
        if (this.paused && this.inbox.length < this.highWaterMark / 2) {
          this.paused = false;
          this.ws.resume();
        }
        yield item;
        continue;
      }

      if (this.ended) return;

      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  private deliver(item: SourceItem): void {
    this.inbox.push(item);
    if (!this.paused && this.inbox.length >= this.highWaterMark) {
      this.logger?.debug(`[connection] ${this.inbox.length} messages buffered, pausing socket`);
      this.paused = true;
      this.ws.pause();
    }
    this.notify();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}
