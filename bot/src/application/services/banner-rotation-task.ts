import { createLogger } from '@vibingway/logger';
import { errorMessage } from '../../errors.js';
import type { BannerService } from './banner-service.js';

const log = createLogger('banner-rotation');

export const DEFAULT_BANNER_CHECK_INTERVAL_MS = 5 * 60_000;

/**
 * Runs a rotation pass on a fixed interval. A pass that is still running
 * when the next tick fires makes that tick a no-op.
 */
export class BannerRotationTask {
  private timer: NodeJS.Timeout | undefined;
  private running: Promise<void> | undefined;

  constructor(
    private readonly banners: BannerService,
    private readonly intervalMs: number = DEFAULT_BANNER_CHECK_INTERVAL_MS
  ) {}

  get isStarted(): boolean {
    return this.timer !== undefined;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    log.info({ intervalMs: this.intervalMs }, 'Banner rotation started');
  }

  /** Run one pass now unless one is in progress. Never rejects. */
  async tick(): Promise<void> {
    if (this.running) {
      log.debug('Previous banner rotation still running');
      return;
    }

    this.running = this.banners.rotate().catch((error: unknown) => {
      log.error({ error: errorMessage(error) }, 'An error occured in the banner task');
    });

    try {
      await this.running;
    } finally {
      this.running = undefined;
    }
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
      log.info('Banner rotation stopped');
    }
    await this.running;
  }
}
