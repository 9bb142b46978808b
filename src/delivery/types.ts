/**
 * Popcast — Delivery Types
 */

import type { Item } from '../types';

export interface ResolvedImage {
  bytes: Uint8Array;
  mimeType: string;
}

export interface AnnouncementImage {
  /** Where the image was downloaded from */
  url: string;
  data: ResolvedImage;
  alt: string;
}

export interface Announcement {
  item: Item;
  text: string;
  /** Product shot first, then the in-box shot when there is one; empty for text-only */
  images: AnnouncementImage[];
}

export interface PublishReceipt {
  /** Identifier of the published post on the external channel */
  postId: string;
}

/**
 * An external channel that announcements are posted to.
 * `announce` throws PublishError when nothing was published.
 */
export interface Publisher {
  readonly name: string;
  announce(announcement: Announcement): Promise<PublishReceipt>;
}

export interface ImageFetcher {
  /** Throws ImageResolutionError when the image cannot be used */
  resolve(url: string): Promise<ResolvedImage>;
}
