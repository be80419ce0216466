// Relay Types - Messages and connection halves

// --- Messages ---

export interface TextMessage {
  readonly type: 'text';
  readonly data: string;
}

export interface BinaryMessage {
  readonly type: 'binary';
  readonly data: Buffer;
}

export interface PingMessage {
  readonly type: 'ping';
  readonly data: Buffer;
}

export interface PongMessage {
  readonly type: 'pong';
  readonly data: Buffer;
}

export interface CloseMessage {
  readonly type: 'close';
  readonly code: number;
  readonly reason: string;
}

// The relay only ever produces text messages; the rest are passed through or dropped
export type Message = TextMessage | BinaryMessage | PingMessage | PongMessage | CloseMessage;

export function textMessage(data: string): TextMessage {
  const message: TextMessage = { type: 'text', data };
  return Object.freeze(message);
}

export function isTextMessage(message: Message): message is TextMessage {
  return message.type === 'text';
}

// --- Connection halves ---

export type SourceItem =
  | { ok: true; message: Message }
  | { ok: false; error: Error };

/** Send-only half of a duplex connection. */
export interface Sink {
  send(message: Message): Promise<void>;
  /** Start a normal close handshake. Resolves once the close frame is queued. */
  close(): Promise<void>;
}

/** Receive-only half. Iteration ends when the peer closes or the transport fails. */
export type Source = AsyncIterable<SourceItem>;

export interface DuplexConnection {
  readonly url: string;
  readonly sink: Sink;
  readonly source: Source;
  /** Tear the connection down from outside the relay loops (signals, shutdown). */
  terminate(): void;
}

// --- Relay results ---

export type DirectionOutcome =
  | { status: 'completed'; messages: number }
  | { status: 'failed'; messages: number; error: Error };

export interface RelaySummary {
  outbound: DirectionOutcome;
  inbound: DirectionOutcome;
}
