export interface ImageHead {
  status: number;
  contentType: string | null;
  contentLength: number | null;
}

/**
 * HTTP access to banner images. Both calls are time-bounded by the
 * implementation.
 */
export interface ImageFetcher {
  head(url: string): Promise<ImageHead>;
  download(url: string): Promise<Buffer>;
}
