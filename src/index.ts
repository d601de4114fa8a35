/**
 * Reflective agent - entry point.
 */

import 'dotenv/config';

import { createContainer, type Container } from './core/container.js';
import { FatalStartupFailure } from './core/errors.js';

let container: Container | undefined;
let isShuttingDown = false;

async function main(): Promise<void> {
  container = await createContainer();
  const { logger, orchestrator, persona, config } = container;

  logger.info(
    {
      name: persona.name,
      transport: container.transport.name,
      adminSenders: config.orchestrator.adminSenders,
    },
    'Agent starting'
  );

  await container.start();

  // A shutdown command from an admin sender stops the loop from inside
  await orchestrator.whenStopped();
  await shutdown();
}

async function shutdown(): Promise<void> {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;

  if (container) {
    await container.shutdown();
  }
  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown();
});

process.on('SIGTERM', () => {
  void shutdown();
});

process.on('unhandledRejection', (reason: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Unhandled rejection:', reason);
  void shutdown();
});

main().catch((error: unknown) => {
  if (error instanceof FatalStartupFailure) {
    // eslint-disable-next-line no-console
    console.error(error.message);
  } else {
    // eslint-disable-next-line no-console
    console.error('Failed to start:', error);
  }
  process.exit(1);
});
