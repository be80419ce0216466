#!/usr/bin/env node
// wsline - Entry point: relay stdin/stdout over a WebSocket

import { main } from './cli.js';
import { errorMessage } from './errors.js';
import { createLogger } from './logger.js';

const controller = new AbortController();

// Graceful shutdown: stop relaying, let already-received output drain, then exit
let stopping = false;
const shutdown = (signal: string) => {
  if (stopping) return;
  stopping = true;
  createLogger().info(`[wsline] Received ${signal}, shutting down...`);
  controller.abort();
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

main(process.argv.slice(2), { input: process.stdin, output: process.stdout }, process.env, {
  signal: controller.signal,
}).then(
  (code) => process.exit(code),
  (err) => {
    createLogger().error(`[wsline] Fatal error: ${errorMessage(err)}`);
    process.exit(1);
  },
);
