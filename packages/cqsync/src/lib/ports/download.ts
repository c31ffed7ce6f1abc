/**
 * Abstraction for file download operations.
 * Allows testing without actual network requests.
 */
export interface DownloadService {
  /**
   * Download `url` to `outputPath`. Rejects with a DownloadError on a
   * non-success status and with the underlying error on network failure.
   */
  download(url: string, outputPath: string, options?: DownloadOptions): Promise<void>;
}

export interface DownloadOptions {
  signal?: AbortSignal;
}
