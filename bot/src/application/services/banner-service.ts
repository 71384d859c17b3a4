import { createLogger } from '@vibingway/logger';
import { Banner } from '../../domain/entities/banner.js';
import { GuildSettings, MIN_BANNER_INTERVAL } from '../../domain/entities/guild-settings.js';
import type { BannerRepository } from '../../domain/repositories/banner-repository.js';
import type { GuildSettingsRepository } from '../../domain/repositories/guild-settings-repository.js';
import { GuildId } from '../../domain/value-objects/guild-id.js';
import {
  BadImageError,
  CannotDownloadImageError,
  Failure,
  ImageDoesNotExistError,
  errorMessage,
} from '../../errors.js';
import { bannerRotationCounter } from '../../metrics.js';
import type { GuildDirectory } from '../ports/guild-directory.js';
import type { ImageFetcher, ImageHead } from '../ports/image-fetcher.js';
import { notice, type Notice } from '../ports/notifier.js';

const log = createLogger('banners');

export const MAX_IMAGE_BYTES = 10 * 1024 * 1024;
export const IMAGE_CONTENT_TYPES: readonly string[] = ['image/png', 'image/jpeg', 'image/jpg', 'image/gif'];

export interface BannerServiceOptions {
  banners: BannerRepository;
  settings: GuildSettingsRepository;
  images: ImageFetcher;
  guilds: GuildDirectory;
  random?: () => number;
}

export interface RemoveBannerResult {
  notice: Notice;
  remaining: number;
}

/**
 * Banner storage, manual banner changes and the automatic rotation.
 */
export class BannerService {
  private readonly random: () => number;

  constructor(private readonly options: BannerServiceOptions) {
    this.random = options.random ?? Math.random;
  }

  /**
   * HEAD the image and check its type and size. A 404 means the image is gone.
   */
  async validateImage(url: string): Promise<void> {
    let head: ImageHead;
    try {
      head = await this.options.images.head(url);
    } catch (error) {
      log.error({ url, error: errorMessage(error) }, 'Unable to fetch image');
      throw new CannotDownloadImageError('I could not download the image information.', { cause: error });
    }

    if (head.status === 404) {
      throw new ImageDoesNotExistError();
    }

    const contentType = head.contentType?.split(';')[0]?.trim().toLowerCase();
    if (!contentType || !IMAGE_CONTENT_TYPES.includes(contentType)) {
      throw new BadImageError('Invalid file type. Server banners must be `png`, `jpg` or `gif` image files.');
    }
    if (head.contentLength === null || head.contentLength > MAX_IMAGE_BYTES) {
      throw new BadImageError('The image is larger than `10MB`. Please choose a smaller image.');
    }
  }

  async downloadImage(url: string): Promise<Buffer> {
    await this.validateImage(url);

    let data: Buffer;
    try {
      data = await this.options.images.download(url);
    } catch (error) {
      log.error({ url, error: errorMessage(error) }, 'Unable to download image');
      throw new CannotDownloadImageError('I could not download the image.', { cause: error });
    }

    if (data.length > MAX_IMAGE_BYTES) {
      throw new BadImageError('The image is larger than `10MB`. Please choose a smaller image.');
    }
    return data;
  }

  async add(guildId: string, userId: string, url: string): Promise<Notice> {
    let banner: Banner;
    try {
      banner = Banner.create(GuildId.from(guildId), userId, url);
    } catch (error) {
      throw new Failure('Please provide a valid `http` or `https` image URL.', { cause: error });
    }

    await this.validateImage(url);

    if (!(await this.options.banners.add(banner))) {
      throw new Failure('The image has already been added to the banner rotation.');
    }

    log.info({ guildId, userId, url }, 'Banner added');
    return notice.success('The image has been added to the banner rotation.', { thumbnailUrl: url });
  }

  list(guildId: string): Promise<Banner[]> {
    return this.options.banners.findByGuild(GuildId.from(guildId));
  }

  /**
   * Remove a banner. Removing the last one also switches rotation off.
   */
  async remove(guildId: string, url: string): Promise<RemoveBannerResult> {
    const id = GuildId.from(guildId);
    await this.options.banners.remove(id, url);
    const remaining = (await this.options.banners.findByGuild(id)).length;

    if (remaining === 0) {
      await this.updateSettings(guildId, (settings) => settings.disableBannerRotation());
      return {
        notice: notice.success(
          'I have deleted the banner. As there are no banners left I have also disabled the automatic banner rotation.',
          { thumbnailUrl: url }
        ),
        remaining,
      };
    }

    return { notice: notice.success('I have deleted the banner.', { thumbnailUrl: url }), remaining };
  }

  /**
   * Download `url` and make it the guild's banner. An image that no longer
   * exists is dropped from the rotation.
   */
  async setBanner(guildId: string, url: string, reason?: string): Promise<void> {
    let image: Buffer;
    try {
      image = await this.downloadImage(url);
    } catch (error) {
      if (error instanceof ImageDoesNotExistError) {
        log.error({ guildId, url }, 'Deleting banner due to HTTP 404');
        await this.options.banners.remove(GuildId.from(guildId), url);
      }
      throw error;
    }

    if (!(await this.options.guilds.setBanner(guildId, image, reason))) {
      throw new Failure('I do not have the necessary permissions to change the banner.');
    }

    await this.updateSettings(guildId, (settings) => settings.markBannerChanged());
    log.info({ guildId, url }, 'Banner changed');
  }

  async toggle(guildId: string, enabled?: boolean): Promise<Notice> {
    const settings = await this.loadSettings(guildId);
    const previous = settings.bannerRotationEnabled;

    if (enabled === undefined) {
      return notice.success(`Automatic banner rotation is currently \`${onOff(previous)}\`.`);
    }
    if (previous === enabled) {
      throw new Failure(`Automatic banner rotation is already \`${onOff(enabled)}\`.`);
    }
    if (enabled) {
      this.checkCanSetBanner(guildId);
      settings.enableBannerRotation();
    } else {
      settings.disableBannerRotation();
    }

    await this.options.settings.save(settings);
    return notice.success(`Automatic banner rotation is now \`${onOff(enabled)}\`.`);
  }

  async interval(guildId: string, minutes?: number): Promise<Notice> {
    const settings = await this.loadSettings(guildId);

    if (minutes === undefined) {
      return notice.success(`The banner interval is currently set to \`${settings.bannerInterval}\` minutes.`);
    }
    if (!Number.isInteger(minutes) || minutes < MIN_BANNER_INTERVAL) {
      throw new Failure(`The banner interval must be at least \`${MIN_BANNER_INTERVAL}\` minutes.`);
    }

    settings.setBannerInterval(minutes);
    await this.options.settings.save(settings);
    return notice.success(`Banner change interval set to \`${minutes}\` minutes.`);
  }

  /**
   * One rotation pass: every eligible guild whose interval elapsed gets a
   * random banner. Failures are logged per guild.
   */
  async rotate(now: Date = new Date()): Promise<void> {
    const eligible = this.options.guilds.list().filter((guild) => guild.supportsBanner && guild.canManageGuild);
    if (eligible.length === 0) {
      return;
    }

    const due = (await this.options.settings.findWithBannerRotationEnabled(eligible.map((guild) => guild.id)))
      .filter((settings) => settings.isBannerRotationDue(now));

    log.debug({ eligible: eligible.length, due: due.length }, 'Rotating banners');

    for (const settings of due) {
      const guildId = settings.guildId.value;
      try {
        await this.showRandomBanner(guildId);
      } catch (error) {
        bannerRotationCounter.labels('failed').inc();
        log.error({ guildId, error: errorMessage(error) }, 'Unable to update banner');
      }
    }
  }

  private async showRandomBanner(guildId: string): Promise<void> {
    const banners = await this.list(guildId);

    if (banners.length === 0) {
      log.warn({ guildId }, 'Guild has no banners, disabling automatic rotation');
      await this.updateSettings(guildId, (settings) => settings.disableBannerRotation());
      bannerRotationCounter.labels('disabled').inc();
      return;
    }

    const banner = banners[Math.floor(this.random() * banners.length)] ?? banners[0];
    if (!banner) {
      return;
    }

    try {
      await this.setBanner(guildId, banner.url, 'Automatic banner rotation');
    } catch (error) {
      if (error instanceof ImageDoesNotExistError) {
        bannerRotationCounter.labels('removed').inc();
      }
      throw error;
    }
    bannerRotationCounter.labels('changed').inc();
  }

  private checkCanSetBanner(guildId: string): void {
    const guild = this.options.guilds.get(guildId);
    if (!guild?.supportsBanner) {
      throw new Failure(
        'Banner rotation can not be enabled for this guild as it does not have a high enough boost level to support this feature.'
      );
    }
    if (!guild.canManageGuild) {
      throw new Failure('I am missing the `manage guild` permission to change the server banner.');
    }
  }

  private async loadSettings(guildId: string): Promise<GuildSettings> {
    const id = GuildId.from(guildId);
    return (await this.options.settings.findByGuildId(id)) ?? GuildSettings.create(id);
  }

  private async updateSettings(guildId: string, mutate: (settings: GuildSettings) => void): Promise<void> {
    const settings = await this.loadSettings(guildId);
    mutate(settings);
    await this.options.settings.save(settings);
  }
}

function onOff(enabled: boolean): 'on' | 'off' {
  return enabled ? 'on' : 'off';
}
