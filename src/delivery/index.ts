/**
 * Popcast — Delivery Module
 *
 * Publishers, image resolution, post formatting and the announcer.
 */

import type { PublisherConfig } from '../config';
import type { Publisher } from './types';
import { BlueskyPublisher } from './bluesky';
import { SlackPublisher } from './slack';

export type {
  Announcement,
  AnnouncementImage,
  ImageFetcher,
  Publisher,
  PublishReceipt,
  ResolvedImage,
} from './types';
export { HttpImageFetcher } from './image';
export { BlueskyPublisher, buildFacets } from './bluesky';
export { SlackPublisher, buildSlackMessage } from './slack';
export {
  formatPostText,
  formatAltText,
  formatPackagingAltText,
  graphemeLength,
  seriesHashtag,
  truncatePost,
} from './post-format';
export { announceItems } from './announcer';
export type { AnnounceOptions, AnnounceResult, AnnouncerDeps } from './announcer';

/**
 * Build the configured publisher. Credentials are checked on first use,
 * so a dry run can construct one without them.
 */
export function createPublisher(config: PublisherConfig, timeoutMs?: number): Publisher {
  switch (config.kind) {
    case 'bluesky':
      return new BlueskyPublisher({
        service: config.service,
        handle: config.handle,
        appPassword: config.appPassword,
        timeoutMs,
      });
    case 'slack':
      return new SlackPublisher({ webhookUrl: config.webhookUrl, timeoutMs });
  }
}
