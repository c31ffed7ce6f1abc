import { writeFile } from "fs/promises";
import type { DownloadOptions, DownloadService } from "../ports/download.js";
import { downloadHttpError } from "../errors/catalog.js";

/**
 * Create a download service using fetch.
 */
export function createFetchDownloadService(
  fetchImpl: typeof fetch = globalThis.fetch
): DownloadService {
  return {
    async download(url: string, outputPath: string, options: DownloadOptions = {}): Promise<void> {
      // fetch follows the redirect from the release page to the asset host
      const response = await fetchImpl(url, {
        redirect: "follow",
        signal: options.signal,
      });

      if (!response.ok) {
        throw downloadHttpError(url, response.status, response.statusText);
      }

      const body = new Uint8Array(await response.arrayBuffer());
      await writeFile(outputPath, body);
    },
  };
}

/**
 * Default download service instance.
 */
export const fetchDownloadService = createFetchDownloadService();
