// CLI - Loads configuration, connects, and relays the given streams until both directions finish

import { connectionHeaders, loadConfig } from './config.js';
import { connect } from './connection.js';
import { createLogger, type LogWriter } from './logger.js';
import { exitCodeFor, runRelay, type RelayIo } from './relay.js';

export interface MainOptions {
  /** Aborting stops the relay; output already received is still written. */
  signal?: AbortSignal;
  logWriter?: LogWriter;
}

/**
 * Run `wsline <url>` against `io` and resolve the process exit code.
 * Configuration and connection failures reject with a `StartupError`
 * before `io.input` is read.
 */
export async function main(
  argv: string[],
  io: RelayIo,
  env: NodeJS.ProcessEnv = process.env,
  options: MainOptions = {},
): Promise<number> {
  const config = loadConfig(argv, env);
  const logger = createLogger(config.logLevel, options.logWriter);

  // Connect before touching input: a failed connection must not consume it
  const connection = await connect(config.url, {
    headers: connectionHeaders(config),
    protocols: config.protocols,
    logger,
  });

  const result = await runRelay(connection, io, {
    logger,
    queueCapacity: config.queueCapacity,
    closeOnInputEnd: config.closeOnInputEnd,
    signal: options.signal,
  });

  return options.signal?.aborted ? 0 : exitCodeFor(result);
}
