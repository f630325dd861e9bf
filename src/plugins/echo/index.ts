/**
 * Echo Plugin
 *
 * Minimal bundled plugin. Admins can `ping` it (the reply carries a
 * persisted counter); anyone can make it `echo <text>` back. A debug
 * heartbeat runs while the `heartbeat` config key is on.
 */

import { fileURLToPath } from 'node:url';
import type { IncomingMessage } from '../../types/message.js';
import type { PluginContext, PluginDefinition } from '../../types/plugin.js';

export const ECHO_PLUGIN_NAME = 'Echo';

/** Milliseconds between heartbeat log lines */
export const HEARTBEAT_INTERVAL_MS = 60_000;

/**
 * Current ping count from the data tree (0 when absent or malformed).
 */
export function readPingCount(ctx: PluginContext): number {
  const value = ctx.data['pings'];
  return typeof value === 'number' ? value : 0;
}

async function reply(ctx: PluginContext, message: IncomingMessage, text: string): Promise<void> {
  const { api } = ctx.extras;
  if (!api) {
    ctx.logger.debug({ to: message.sender.id, text }, 'No bot API; reply dropped');
    return;
  }
  await api.sendMessage(message.sender.id, text);
}

function parseBoolean(raw: string): boolean {
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new Error(`expected a boolean, got "${raw}"`);
}

export const echoPlugin: PluginDefinition = {
  identity: {
    name: ECHO_PLUGIN_NAME,
    version: '1.0.0',
    author: 'chatbot-plugin-core',
    description: 'Replies to ping and echo commands.',
  },
  sourceFile: fileURLToPath(import.meta.url),
  hooks: {
    init(ctx) {
      if (ctx.firstLoad) {
        ctx.logger.info('First load, starting a fresh ping counter');
      }
      ctx.data['pings'] = readPingCount(ctx);

      ctx.registerConfig('heartbeat', true, parseBoolean);

      ctx.registerAdminFunc(
        'ping',
        async (message) => {
          const count = await ctx.lock.runExclusive(() => {
            const next = readPingCount(ctx) + 1;
            ctx.data['pings'] = next;
            return next;
          });
          await reply(ctx, message, `pong #${String(count)}`);
        },
        { rawMessageFilter: 'ping' }
      );

      ctx.registerUserFunc(
        'echo',
        async (message) => {
          const text = message.rawMessage.replace(/^echo\s+/, '');
          await reply(ctx, message, text);
        },
        { rawMessageFilter: /echo\s+\S/ }
      );
    },

    onLoad(ctx) {
      if (ctx.config['heartbeat'] !== true) {
        ctx.logger.info('Heartbeat disabled');
        return Promise.resolve();
      }
      ctx.addScheduledTask(
        'heartbeat',
        () => {
          ctx.logger.debug({ pings: readPingCount(ctx) }, 'Echo heartbeat');
        },
        { intervalMs: HEARTBEAT_INTERVAL_MS }
      );
      return Promise.resolve();
    },

    close(ctx, ...args) {
      ctx.logger.info({ args: args.length, pings: readPingCount(ctx) }, 'Echo closing');
    },
  },
};

export default echoPlugin;
