#!/usr/bin/env node
/**
 * Console host
 *
 * Loads the bundled plugins and feeds each stdin line to the event bus as
 * a message from a local admin sender.
 */

import 'dotenv/config';

import { createInterface } from 'node:readline';
import { createContainerAsync, type Container } from './core/container.js';
import { PermissionDeniedError } from './core/plugin-errors.js';
import { echoPlugin } from './plugins/echo/index.js';
import type { BotApi } from './ports/bot-api.js';
import { PermissionGroup } from './types/message.js';

const CONSOLE_SENDER_ID = 'console';

let container: Container | undefined;
let isShuttingDown = false;

async function main(): Promise<void> {
  container = await createContainerAsync();
  const { logger, pluginLoader, eventBus } = container;

  const api: BotApi = {
    sendMessage: (chatId, text) => {
      process.stdout.write(`[${chatId}] ${text}\n`);
      return Promise.resolve();
    },
  };

  await pluginLoader.load(echoPlugin, { extras: { api } });
  logger.info({ plugins: pluginLoader.list().map((p) => p.name) }, 'Host ready');

  const lines = createInterface({ input: process.stdin });
  for await (const line of lines) {
    const rawMessage = line.trim();
    if (!rawMessage) continue;

    try {
      const result = await eventBus.dispatch({
        rawMessage,
        sender: { id: CONSOLE_SENDER_ID, permission: PermissionGroup.ADMIN },
      });
      logger.debug({ ...result }, 'Message dispatched');
    } catch (error) {
      if (!(error instanceof PermissionDeniedError)) throw error;
      logger.warn({ error: error.message }, 'Permission denied');
    }
  }

  await shutdown();
}

async function shutdown(): Promise<void> {
  if (isShuttingDown) {
    return; // Already shutting down, ignore duplicate signals
  }
  isShuttingDown = true;

  try {
    if (container) {
      await container.shutdown();
    }
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error('Shutdown failed:', error);
    process.exit(1);
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
  // eslint-disable-next-line no-console
  console.error('Failed to start:', error);
  process.exit(1);
});
