/**
 * Popcast — Image Resolution
 *
 * Downloads product images so they can be attached to announcements.
 */

import type { ImageFetcher, ResolvedImage } from './types';
import { ImageResolutionError } from '../lib/errors';
import { errorMessage } from '../lib/logger';

export interface HttpImageFetcherOptions {
  timeoutMs?: number;
  /** Override the HTTP implementation (tests) */
  fetch?: typeof fetch;
}

export class HttpImageFetcher implements ImageFetcher {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpImageFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async resolve(url: string): Promise<ResolvedImage> {
    if (!url) {
      throw new ImageResolutionError(url, 'Item has no image URL');
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      throw new ImageResolutionError(url, `Image download failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new ImageResolutionError(url, `HTTP ${response.status} for image ${url}`);
    }

    const mimeType = (response.headers.get('content-type') ?? '').split(';')[0].trim();
    if (!mimeType.startsWith('image/')) {
      throw new ImageResolutionError(url, `Unexpected content type "${mimeType}" for image ${url}`);
    }

    const bytes = new Uint8Array(await response.arrayBuffer());
    if (bytes.length === 0) {
      throw new ImageResolutionError(url, `Empty image body for ${url}`);
    }

    return { bytes, mimeType };
  }
}
