import { Counter, Gauge, register } from 'prom-client';

export const nodeEventCounter = new Counter({
  name: 'lavalink_node_events_total',
  help: 'Playback events received from the audio node',
  labelNames: ['type', 'reason'],
  registers: [register]
});

export const commandCounter = new Counter({
  name: 'bot_commands_total',
  help: 'Slash command invocations by outcome',
  labelNames: ['command', 'outcome'], // 'success', 'failure', 'warning', 'error'
  registers: [register]
});

export const activePlayersGauge = new Gauge({
  name: 'bot_active_players',
  help: 'Number of guilds with a connected player',
  registers: [register]
});

export const bannerRotationCounter = new Counter({
  name: 'banner_rotations_total',
  help: 'Automatic banner changes by outcome',
  labelNames: ['outcome'], // 'changed', 'disabled', 'removed', 'failed'
  registers: [register]
});
