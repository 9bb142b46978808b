/**
 * Popcast — Slack Publisher
 *
 * Posts announcements to a Slack channel through an incoming webhook.
 * Uses Block Kit: the post text as a section, each resolved image by URL.
 */

import { nanoid } from 'nanoid';
import type { Announcement, Publisher, PublishReceipt } from './types';
import { PublishError } from '../lib/errors';
import { logger, errorMessage } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

export interface SlackConfig {
  webhookUrl?: string;
  timeoutMs?: number;
  /** Override the HTTP implementation (tests) */
  fetch?: typeof fetch;
}

export interface SlackMessage {
  text: string;
  blocks?: SlackBlock[];
  unfurl_links?: boolean;
  unfurl_media?: boolean;
}

export interface SlackBlock {
  type: string;
  text?: SlackText;
  image_url?: string;
  alt_text?: string;
}

export interface SlackText {
  type: 'plain_text' | 'mrkdwn';
  text: string;
  emoji?: boolean;
}

// ============================================================
// BLOCK BUILDERS
// ============================================================

function section(text: string): SlackBlock {
  return {
    type: 'section',
    text: { type: 'mrkdwn', text },
  };
}

function image(url: string, altText: string): SlackBlock {
  return {
    type: 'image',
    image_url: url,
    alt_text: altText,
  };
}

/**
 * Build the webhook payload for an announcement.
 * Image blocks are only added for images that were resolved.
 */
export function buildSlackMessage(announcement: Announcement): SlackMessage {
  const blocks: SlackBlock[] = [
    section(announcement.text),
    ...announcement.images.map(resolved => image(resolved.url, resolved.alt)),
  ];

  return {
    text: announcement.text,
    blocks,
    unfurl_links: false,
    unfurl_media: false,
  };
}

// ============================================================
// PUBLISHER
// ============================================================

export class SlackPublisher implements Publisher {
  readonly name = 'slack';

  private readonly log = logger.child({ component: 'publisher', publisher: 'slack' });
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(private readonly config: SlackConfig) {
    this.fetchImpl = config.fetch ?? fetch;
    this.timeoutMs = config.timeoutMs ?? 30000;
  }

  async announce(announcement: Announcement): Promise<PublishReceipt> {
    if (!this.config.webhookUrl) {
      throw new PublishError('SLACK_WEBHOOK_URL not configured');
    }

    let res: Response;
    try {
      res = await this.fetchImpl(this.config.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(buildSlackMessage(announcement)),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new PublishError(`Slack webhook request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!res.ok) {
      const error = await res.text();
      throw new PublishError(`Slack webhook error: ${res.status} - ${error}`, { status: res.status });
    }

    // Webhooks don't return a message id.
    const postId = `slack-${nanoid(12)}`;
    this.log.info('Slack message sent', { itemId: announcement.item.id, postId });
    return { postId };
  }
}
