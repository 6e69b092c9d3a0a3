#!/usr/bin/env node
import 'dotenv/config';
import { ZodError } from 'zod';
import { TerminalRenderer } from './display/TerminalRenderer.js';
import { StartupError } from './errors.js';
import { DisplayStateCell } from './gateway/DisplayState.js';
import { startListener, stopListener, type ListenerHandle } from './gateway/OscListener.js';
import { logger, scoped } from './logging.js';
import { loadAppConfigFromEnv } from './server/config.js';

const log = scoped('main');

async function main(): Promise<void> {
  const config = loadAppConfigFromEnv();
  const state = new DisplayStateCell();
  let handle: ListenerHandle | undefined;
  const renderer = new TerminalRenderer({
    ...config.renderer,
    state,
    stats: () => handle?.stats(),
    out: process.stdout,
  });

  handle = await startListener({ ...config.oscIngress, state });
  await renderer.start();
  const listener = handle;

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'shutting down');
    renderer.stop();
    stopListener(listener).then(
      () => {
        logger.flush();
        process.exit(0);
      },
      (err: unknown) => {
        log.error({ err }, 'listener did not stop cleanly');
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await listener.closed;
  if (!shuttingDown) {
    // loop ended on its own: the socket failed
    renderer.stop();
    log.fatal({ err: listener.failure }, 'OSC listener terminated');
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  if (err instanceof StartupError) {
    log.fatal({ err, code: err.code, host: err.host, port: err.port }, 'cannot start OSC listener');
  } else if (err instanceof ZodError) {
    log.fatal({ issues: err.issues }, 'invalid configuration');
  } else {
    log.fatal({ err }, 'unexpected failure');
  }
  logger.flush();
  process.exit(1);
});
