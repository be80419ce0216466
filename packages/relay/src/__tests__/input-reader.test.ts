import { Readable } from 'node:stream';
import { BoundedQueue } from '../bounded-queue.js';
import { LocalStreamError } from '../errors.js';
import { readInput } from '../input-reader.js';
import { createLogger } from '../logger.js';
import type { Message } from '../types.js';
import { linesInput, quietLogger, settle } from './harness/fake-connection.js';

async function drain(queue: BoundedQueue<Message>): Promise<Message[]> {
  const messages: Message[] = [];
  for await (const message of queue) messages.push(message);
  return messages;
}

describe('readInput', () => {
  it('queues one text message per line, terminators included', async () => {
    const queue = new BoundedQueue<Message>(8);
    const outcome = await readInput({
      input: linesInput(['first line\nsecond', ' line\r\n', 'third\n']),
      queue,
      logger: quietLogger(),
    });

    expect(outcome).toEqual({ status: 'completed', messages: 3 });
    expect(await drain(queue)).toEqual([
      { type: 'text', data: 'first line\n' },
      { type: 'text', data: 'second line\r\n' },
      { type: 'text', data: 'third\n' },
    ]);
  });

  it('sends a trailing line without a terminator at end of input', async () => {
    const queue = new BoundedQueue<Message>(8);
    const outcome = await readInput({ input: linesInput(['a\nno newline']), queue, logger: quietLogger() });

    expect(outcome.messages).toBe(2);
    expect(await drain(queue)).toEqual([
      { type: 'text', data: 'a\n' },
      { type: 'text', data: 'no newline' },
    ]);
  });

  it('decodes multi-byte characters split across chunks', async () => {
    const bytes = Buffer.from('héllo\n', 'utf8');
    const queue = new BoundedQueue<Message>(8);
    await readInput({
      input: linesInput([bytes.subarray(0, 2), bytes.subarray(2)]),
      queue,
      logger: quietLogger(),
    });

    expect(await drain(queue)).toEqual([{ type: 'text', data: 'héllo\n' }]);
  });

  it('closes the queue on empty input without sending anything', async () => {
    const queue = new BoundedQueue<Message>(8);
    const outcome = await readInput({ input: linesInput([]), queue, logger: quietLogger() });

    expect(outcome).toEqual({ status: 'completed', messages: 0 });
    expect(queue.isClosed).toBe(true);
    expect(await queue.pop()).toEqual({ done: true, value: undefined });
  });

  it('suspends while the queue is full instead of dropping lines', async () => {
    const queue = new BoundedQueue<Message>(2);
    const lines = ['1\n', '2\n', '3\n', '4\n', '5\n'];
    const reading = readInput({ input: linesInput(lines), queue, logger: quietLogger() });

    await settle();
    expect(queue.size).toBe(2);
    expect(queue.isClosed).toBe(false);

    const received = await drain(queue);
    expect(received.map((m) => (m.type === 'text' ? m.data : m.type))).toEqual(lines);
    expect(await reading).toEqual({ status: 'completed', messages: 5 });
  });

  it('ends on a read error and reports it as a local stream failure', async () => {
    async function* failing() {
      yield 'before\n';
      throw new Error('EIO: i/o error, read');
    }
    const queue = new BoundedQueue<Message>(8);
    const outcome = await readInput({ input: Readable.from(failing()), queue, logger: quietLogger() });

    expect(outcome.status).toBe('failed');
    expect(outcome.messages).toBe(1);
    if (outcome.status === 'failed') {
      expect(outcome.error).toBeInstanceOf(LocalStreamError);
      expect(outcome.error.message).toBe('Failed to read input: EIO: i/o error, read');
    }
    expect(queue.isClosed).toBe(true);
    expect(await drain(queue)).toEqual([{ type: 'text', data: 'before\n' }]);
  });

  it('ends without sending the line when input is not valid UTF-8', async () => {
    const queue = new BoundedQueue<Message>(8);
    const outcome = await readInput({
      input: linesInput([Buffer.from([0x61, 0xff, 0x0a])]),
      queue,
      logger: quietLogger(),
    });

    expect(outcome.status).toBe('failed');
    expect(outcome.messages).toBe(0);
    if (outcome.status === 'failed') {
      expect(outcome.error).toBeInstanceOf(LocalStreamError);
      expect(outcome.error.message).toMatch(/^Failed to read input: /);
    }
    expect(await drain(queue)).toEqual([]);
  });

  it('ends on a truncated multi-byte character at end of input', async () => {
    const queue = new BoundedQueue<Message>(8);
    const outcome = await readInput({
      input: linesInput([Buffer.from('ok\n', 'utf8'), Buffer.from([0xc3])]),
      queue,
      logger: quietLogger(),
    });

    expect(outcome).toMatchObject({ status: 'failed', messages: 1 });
    expect(await drain(queue)).toEqual([{ type: 'text', data: 'ok\n' }]);
  });

  it('stops once its consumer has closed the queue', async () => {
    const queue = new BoundedQueue<Message>(1);
    queue.close();
    const outcome = await readInput({ input: linesInput(['x\n', 'y\n']), queue, logger: quietLogger() });

    expect(outcome).toEqual({ status: 'completed', messages: 0 });
  });

  it('traces each outgoing line on the diagnostic stream', async () => {
    const write = jest.fn();
    const queue = new BoundedQueue<Message>(8);
    await readInput({ input: linesInput(['hello\n']), queue, logger: createLogger('info', write) });

    expect(write).toHaveBeenCalledWith(expect.any(String), '[INFO]', '[input] outgoing: hello');
  });
});
