import { LavalinkManager, type GuildShardPayload, type LavalinkNode } from 'lavalink-client';
import { createLogger } from '@vibingway/logger';
import { delay } from '../../util.js';
import { errorMessage } from '../../errors.js';

const log = createLogger('lavalink');

export type SendToShardFn = (guildId: string, payload: GuildShardPayload) => void;

export interface LavalinkConnectionOptions {
  host: string;
  port: number;
  password: string;
  secure: boolean;
  clientId: string;
}

export const NODE_ID = 'main';

export function createLavalinkManager(options: LavalinkConnectionOptions, sendToShard: SendToShardFn): LavalinkManager {
  const manager = new LavalinkManager({
    nodes: [
      {
        id: NODE_ID,
        host: options.host,
        port: options.port,
        authorization: options.password,
        secure: options.secure,
      },
    ],
    sendToShard,
    client: {
      id: options.clientId,
      username: 'vibingway',
    },
    // Track order is owned by the playlist, not the library's queue.
    autoSkip: false,
  });

  manager.nodeManager.on('connect', (node: LavalinkNode) => log.info({ node: node.id }, 'Node connected'));
  manager.nodeManager.on('disconnect', (node: LavalinkNode, reason: { code?: number; reason?: string }) =>
    log.warn({ node: node.id, reason }, 'Node disconnected'));
  manager.nodeManager.on('error', (node: LavalinkNode, error: Error) =>
    log.error({ node: node.id, error: error.message }, 'Node error'));

  return manager;
}

/**
 * Poll the node's `/v4/info` endpoint until it answers. Resolves false when
 * the node did not come up within `maxWaitMs`.
 */
export async function waitForLavalinkRestReady(
  options: Pick<LavalinkConnectionOptions, 'host' | 'port' | 'password' | 'secure'>,
  maxWaitMs = 60_000
): Promise<boolean> {
  const deadline = Date.now() + maxWaitMs;
  const url = `${options.secure ? 'https' : 'http'}://${options.host}:${options.port}/v4/info`;

  while (Date.now() < deadline) {
    try {
      const res = await fetch(url, {
        headers: { Authorization: options.password },
        signal: AbortSignal.timeout(5_000),
      });
      if (res.ok) {
        log.info('Lavalink REST API ready');
        return true;
      }
    } catch (error) {
      log.debug({ error: errorMessage(error), timeRemaining: deadline - Date.now() }, 'Waiting for Lavalink to become ready');
    }
    await delay(1000);
  }

  log.error({ maxWaitMs }, 'Lavalink REST API failed to become ready within timeout');
  return false;
}

export async function initManager(
  manager: LavalinkManager,
  options: LavalinkConnectionOptions,
  user: { id: string; username: string }
): Promise<void> {
  await waitForLavalinkRestReady(options);
  await manager.init({ id: user.id, username: user.username });
}
