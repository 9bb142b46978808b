/**
 * Popcast — Bluesky Publisher
 *
 * Posts announcements through the AT Protocol XRPC endpoints:
 *   com.atproto.server.createSession  (app password login, lazily)
 *   com.atproto.repo.uploadBlob       (product images)
 *   com.atproto.repo.createRecord     (app.bsky.feed.post)
 *
 * Up to four images are embedded per post. A post refused for an expired
 * session is sent once more after logging in again; nothing else is retried.
 */

import { z } from 'zod';
import type { Announcement, Publisher, PublishReceipt, ResolvedImage } from './types';
import { truncatePost } from './post-format';
import { PublishError } from '../lib/errors';
import { logger, errorMessage } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

export interface BlueskyConfig {
  service: string;
  handle?: string;
  appPassword?: string;
  timeoutMs?: number;
  /** Override the HTTP implementation (tests) */
  fetch?: typeof fetch;
}

export interface RichTextFacet {
  index: { byteStart: number; byteEnd: number };
  features: Array<
    | { $type: 'app.bsky.richtext.facet#link'; uri: string }
    | { $type: 'app.bsky.richtext.facet#tag'; tag: string }
  >;
}

const SessionSchema = z.object({
  accessJwt: z.string(),
  did: z.string(),
});

type Session = z.infer<typeof SessionSchema>;

const UploadBlobSchema = z.object({
  blob: z.record(z.unknown()),
});

const CreateRecordSchema = z.object({
  uri: z.string(),
  cid: z.string(),
});

// app.bsky.embed.images accepts at most four images.
const MAX_EMBED_IMAGES = 4;

// ============================================================
// RICH TEXT
// ============================================================

const encoder = new TextEncoder();

function byteLength(text: string): number {
  return encoder.encode(text).length;
}

interface TextSpan {
  start: number;
  end: number;
}

/**
 * Link and hashtag facets. Offsets are UTF-8 byte positions.
 * A tag must start the text or follow whitespace, so a '#' inside a URL
 * never becomes a tag.
 */
export function buildFacets(text: string): RichTextFacet[] {
  const facets: RichTextFacet[] = [];
  const links: TextSpan[] = [];

  for (const match of text.matchAll(/https?:\/\/[^\s]+/g)) {
    const start = match.index ?? 0;
    links.push({ start, end: start + match[0].length });
    const byteStart = byteLength(text.slice(0, start));
    facets.push({
      index: { byteStart, byteEnd: byteStart + byteLength(match[0]) },
      features: [{ $type: 'app.bsky.richtext.facet#link', uri: match[0] }],
    });
  }

  for (const match of text.matchAll(/(^|\s)#([\p{L}\p{N}_]+)/gu)) {
    const start = (match.index ?? 0) + match[1].length;
    const end = start + match[0].length - match[1].length;
    if (links.some(link => start < link.end && end > link.start)) continue;

    const byteStart = byteLength(text.slice(0, start));
    facets.push({
      index: { byteStart, byteEnd: byteStart + byteLength(text.slice(start, end)) },
      features: [{ $type: 'app.bsky.richtext.facet#tag', tag: match[2] }],
    });
  }

  return facets;
}

// ============================================================
// SESSION ERRORS
// ============================================================

const XrpcErrorSchema = z.object({ error: z.string() });

// Error names a PDS returns (with HTTP 400) for a stale access token.
const EXPIRED_SESSION_ERRORS = new Set(['ExpiredToken', 'InvalidToken']);

function isExpiredSession(status: number, detail: string): boolean {
  if (status === 401) return true;
  if (status !== 400) return false;
  try {
    const parsed = XrpcErrorSchema.safeParse(JSON.parse(detail));
    return parsed.success && EXPIRED_SESSION_ERRORS.has(parsed.data.error);
  } catch {
    return false;
  }
}

/** An authenticated call was refused because the session is no longer valid. */
class SessionExpiredError extends PublishError {}

// ============================================================
// PUBLISHER
// ============================================================

interface XrpcRequest {
  /** Sent as a bearer token; expiry is only detected on authenticated calls */
  session?: Session;
  contentType: string;
  body: string | Uint8Array;
}

export class BlueskyPublisher implements Publisher {
  readonly name = 'bluesky';

  private readonly log = logger.child({ component: 'publisher', publisher: 'bluesky' });
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private session: Session | null = null;

  constructor(private readonly config: BlueskyConfig) {
    this.fetchImpl = config.fetch ?? fetch;
    this.timeoutMs = config.timeoutMs ?? 30000;
  }

  /**
   * A refused token means nothing was posted, so the post is sent once more
   * after a fresh login. Any other error is final.
   */
  async announce(announcement: Announcement): Promise<PublishReceipt> {
    try {
      return await this.post(announcement);
    } catch (error) {
      if (!(error instanceof SessionExpiredError)) throw error;
      this.log.warn('Bluesky session expired, logging in again', {
        itemId: announcement.item.id,
        error: errorMessage(error),
      });
      return this.post(announcement);
    }
  }

  private async post(announcement: Announcement): Promise<PublishReceipt> {
    const session = await this.ensureSession();
    const text = truncatePost(announcement.text);

    const record: Record<string, unknown> = {
      $type: 'app.bsky.feed.post',
      text,
      createdAt: new Date().toISOString(),
      langs: ['en'],
    };

    const facets = buildFacets(text);
    if (facets.length > 0) record.facets = facets;

    if (announcement.images.length > 0) {
      const images: Array<{ alt: string; image: Record<string, unknown> }> = [];
      for (const image of announcement.images.slice(0, MAX_EMBED_IMAGES)) {
        images.push({ alt: image.alt, image: await this.uploadBlob(session, image.data) });
      }
      record.embed = { $type: 'app.bsky.embed.images', images };
    }

    const response = await this.xrpc('com.atproto.repo.createRecord', {
      session,
      contentType: 'application/json',
      body: JSON.stringify({
        repo: session.did,
        collection: 'app.bsky.feed.post',
        record,
      }),
    });

    const created = CreateRecordSchema.safeParse(await response.json());
    if (!created.success) {
      throw new PublishError('Bluesky createRecord returned an unexpected response');
    }

    this.log.info('Posted to Bluesky', {
      itemId: announcement.item.id,
      uri: created.data.uri,
      images: announcement.images.length,
    });
    return { postId: created.data.uri };
  }

  private async ensureSession(): Promise<Session> {
    if (this.session) return this.session;

    const { handle, appPassword } = this.config;
    if (!handle || !appPassword) {
      throw new PublishError('Bluesky credentials are not configured');
    }

    const response = await this.xrpc('com.atproto.server.createSession', {
      contentType: 'application/json',
      body: JSON.stringify({ identifier: handle, password: appPassword }),
    });

    const parsed = SessionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new PublishError('Bluesky createSession returned an unexpected response');
    }

    this.log.info('Logged in to Bluesky', { handle });
    this.session = parsed.data;
    return parsed.data;
  }

  private async uploadBlob(session: Session, image: ResolvedImage): Promise<Record<string, unknown>> {
    const response = await this.xrpc('com.atproto.repo.uploadBlob', {
      session,
      contentType: image.mimeType,
      body: image.bytes,
    });

    const parsed = UploadBlobSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new PublishError('Bluesky uploadBlob returned an unexpected response');
    }
    return parsed.data.blob;
  }

  /**
   * POST to an XRPC procedure. Non-2xx responses become PublishError.
   * A refused token drops the cached session and raises SessionExpiredError.
   */
  private async xrpc(method: string, request: XrpcRequest): Promise<Response> {
    const url = `${this.config.service.replace(/\/+$/, '')}/xrpc/${method}`;
    const headers: Record<string, string> = { 'Content-Type': request.contentType };
    if (request.session) headers.Authorization = `Bearer ${request.session.accessJwt}`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers,
        body: request.body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new PublishError(`Bluesky ${method} request failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      const detail = await response.text();
      const message = `Bluesky ${method} error: ${response.status} - ${detail}`;
      if (request.session && isExpiredSession(response.status, detail)) {
        this.session = null;
        throw new SessionExpiredError(message, { status: response.status });
      }
      throw new PublishError(message, { status: response.status });
    }

    return response;
  }
}
