// Load environment variables FIRST, before any other imports
import './env-loader.js';

import { Client, GatewayIntentBits } from 'discord.js';
import type { LavalinkManager } from 'lavalink-client';
import { env, type Env } from '@vibingway/config';
import { closeDatabase, injectLogger, openDatabase, type SqliteDatabase } from '@vibingway/database';
import { logger } from '@vibingway/logger';

// Infrastructure Layer
import { createLavalinkManager, initManager, type LavalinkConnectionOptions } from './infrastructure/lavalink/lavalink-manager.js';
import { LavalinkAudioNode } from './infrastructure/lavalink/lavalink-audio-node.js';
import { SqliteGuildSettingsRepository } from './infrastructure/database/sqlite-guild-settings-repository.js';
import { SqliteBannerRepository } from './infrastructure/database/sqlite-banner-repository.js';
import { DiscordNotifier } from './infrastructure/discord/discord-notifier.js';
import { DiscordGuildDirectory } from './infrastructure/discord/discord-guild-directory.js';
import { DiscordCommandRegistrar } from './infrastructure/discord/discord-command-registrar.js';
import { WebhookErrorReporter } from './infrastructure/discord/webhook-error-reporter.js';
import { HttpImageFetcher } from './infrastructure/http/image-fetcher.js';
import { MetricsServer } from './infrastructure/http/metrics-server.js';

// Application Layer
import { PlayerRegistry } from './application/player/player-registry.js';
import { MusicService } from './application/services/music-service.js';
import { BannerService } from './application/services/banner-service.js';
import { BannerRotationTask } from './application/services/banner-rotation-task.js';
import { OwnerService, type ExitCode } from './application/services/owner-service.js';

// Presentation Layer
import { MusicController } from './presentation/controllers/music-controller.js';
import { BannerController } from './presentation/controllers/banner-controller.js';
import { OwnerController } from './presentation/controllers/owner-controller.js';
import { HelpController } from './presentation/controllers/help-controller.js';
import { CommandErrorHandler } from './presentation/error-handler.js';

// Handlers
import { setupInteractionHandlers } from './handlers/interaction.js';
import { setupReadyHandlers } from './handlers/ready.js';
import { setupVoiceStateHandlers } from './handlers/voice-state.js';

/**
 * Composition Root
 * Dependency injection and application bootstrapping
 */
export class VibingwayApplication {
  private readonly client: Client;
  private readonly db: SqliteDatabase;
  private readonly manager: LavalinkManager;
  private readonly lavalinkOptions: LavalinkConnectionOptions;
  private readonly registry: PlayerRegistry;
  private readonly bannerRotation: BannerRotationTask;
  private readonly reporter: WebhookErrorReporter | undefined;
  private readonly metrics = new MetricsServer();
  private shuttingDown = false;

  constructor(private readonly config: Env = env) {
    this.client = new Client({
      intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildVoiceStates],
    });

    this.db = openDatabase(config.DATABASE_PATH);

    this.lavalinkOptions = {
      host: config.LAVALINK_HOST,
      port: config.LAVALINK_PORT,
      password: config.LAVALINK_PASSWORD,
      secure: config.LAVALINK_SECURE,
      clientId: config.DISCORD_APPLICATION_ID,
    };
    this.manager = createLavalinkManager(this.lavalinkOptions, (guildId, payload) => {
      this.client.guilds.cache.get(guildId)?.shard.send(payload);
    });

    // Repositories
    const settings = new SqliteGuildSettingsRepository(this.db);
    const banners = new SqliteBannerRepository(this.db);

    // Services
    const node = new LavalinkAudioNode(this.manager);
    this.registry = new PlayerRegistry({
      node,
      notifier: new DiscordNotifier(this.client),
      settings,
      connectTimeoutMs: config.VOICE_CONNECT_TIMEOUT_MS,
    });
    const music = new MusicService(node, this.registry);
    const bannerService = new BannerService({
      banners,
      settings,
      images: new HttpImageFetcher(config.IMAGE_FETCH_TIMEOUT_MS),
      guilds: new DiscordGuildDirectory(this.client),
    });
    this.bannerRotation = new BannerRotationTask(bannerService, config.BANNER_CHECK_INTERVAL_MS);
    const owner = new OwnerService({
      db: this.db,
      registrar: new DiscordCommandRegistrar(config.DISCORD_TOKEN, config.DISCORD_APPLICATION_ID),
      adminUserIds: config.ADMIN_USER_IDS,
      adminGuildIds: config.ADMIN_GUILD_IDS,
    });

    if (config.LOGGING_WEBHOOK_URL) {
      this.reporter = new WebhookErrorReporter(config.LOGGING_WEBHOOK_URL);
    } else {
      logger.info('No logging webhook configured.');
    }

    // Presentation
    setupInteractionHandlers(this.client, {
      music: new MusicController(music, config.PROMPT_TIMEOUT_MS),
      banner: new BannerController(bannerService),
      owner: new OwnerController(owner, config.ADMIN_GUILD_IDS, config.PROMPT_TIMEOUT_MS, (code) => this.exit(code)),
      help: new HelpController(),
      errors: new CommandErrorHandler(this.reporter),
    });
    setupVoiceStateHandlers(this.client, this.registry);
    setupReadyHandlers(this.client, (user) => this.onReady(user));

    // lavalink-client reads voice server and state updates from the raw gateway stream
    this.client.on('raw', (packet) => {
      void this.manager.sendRawData(packet);
    });
  }

  async initialize(): Promise<void> {
    logger.info('Initializing Vibingway...');

    // Inject logger dependency for database package
    injectLogger(logger);

    if (this.config.METRICS_PORT > 0) {
      await this.metrics.start(this.config.METRICS_PORT);
    }

    await this.client.login(this.config.DISCORD_TOKEN);
    logger.info('Discord client logged in');
  }

  async shutdown(): Promise<void> {
    if (this.shuttingDown) {
      return;
    }
    this.shuttingDown = true;
    logger.info('Shutting down Vibingway...');

    try {
      await this.bannerRotation.stop();
      await this.registry.shutdown();
      await this.metrics.close();
      this.reporter?.destroy();
      await this.client.destroy();
      closeDatabase(this.db);
      logger.info('Vibingway shut down successfully');
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
    }
  }

  private async onReady(user: { id: string; username: string }): Promise<void> {
    await initManager(this.manager, this.lavalinkOptions, user);
    this.bannerRotation.start();
    logger.info('Vibingway ready');
  }

  private async exit(code: ExitCode): Promise<void> {
    await this.shutdown();
    process.exit(code);
  }
}
