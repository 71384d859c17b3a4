import type { ImageFetcher, ImageHead } from '../../application/ports/image-fetcher.js';

export const DEFAULT_IMAGE_FETCH_TIMEOUT_MS = 10_000;

/**
 * ImageFetcher over the global fetch API. Every request is aborted after
 * `timeoutMs`.
 */
export class HttpImageFetcher implements ImageFetcher {
  constructor(private readonly timeoutMs: number = DEFAULT_IMAGE_FETCH_TIMEOUT_MS) {}

  async head(url: string): Promise<ImageHead> {
    const res = await fetch(url, { method: 'HEAD', signal: AbortSignal.timeout(this.timeoutMs) });
    const length = res.headers.get('content-length');

    return {
      status: res.status,
      contentType: res.headers.get('content-type'),
      contentLength: length !== null && /^\d+$/.test(length) ? Number(length) : null,
    };
  }

  async download(url: string): Promise<Buffer> {
    const res = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    if (!res.ok) {
      throw new Error(`Image download failed with HTTP ${res.status}`);
    }
    return Buffer.from(await res.arrayBuffer());
  }
}
