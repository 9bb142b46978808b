/**
 * Popcast — Funko Catalog Source
 *
 * Scrapes the product grid of funko.com listing pages
 * (/{region}/new-featured/{page}/) and returns one raw entry per tile.
 *
 * Tile markup:
 * - img.tile-main-image          -> name (alt), image (src)
 * - img.tile-alt-hover-image     -> alternate image (in-box shot)
 * - a.image-link                 -> product URL (href)
 * - span.sales .value            -> sale price (content attr)
 * - span.strike-through .value   -> original price (content attr)
 * - div.product-license          -> fandom / license
 * - div.product-flag             -> badge
 * - div.product-availability     -> "Coming soon", drop date
 */

import * as cheerio from 'cheerio';
import { CatalogSource } from './base';
import { SourceFetchError } from '../lib/errors';
import { errorMessage } from '../lib/logger';
import type { RawCatalogEntry } from '../types';

const FUNKO_BASE_URL = 'https://funko.com';
const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0 Safari/537.36';

// Listing thumbnails are 346px; the CDN serves the same asset at 800px.
const THUMB_SIZE = 'sw=346&sh=346';
const FULL_SIZE = 'sw=800&sh=800';

export interface FunkoSourceOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * Build the listing URL for a page. An empty region is the US store.
 */
export function buildPageUrl(pageId: string, region: string, baseUrl = FUNKO_BASE_URL): string {
  const regionSegment = region ? `/${encodeURIComponent(region)}` : '';
  return `${baseUrl}${regionSegment}/new-featured/${encodeURIComponent(pageId)}/`;
}

function upgradeImageUrl(url: string | undefined): string | undefined {
  if (!url) return undefined;
  return url.includes(THUMB_SIZE) ? url.replace(THUMB_SIZE, FULL_SIZE) : url;
}

function absoluteUrl(href: string | undefined, baseUrl: string): string | undefined {
  if (!href) return undefined;
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return undefined;
  }
}

/**
 * Parse every product tile on a listing page.
 */
export function parseCatalogPage(
  html: string,
  pageId: string,
  baseUrl = FUNKO_BASE_URL
): RawCatalogEntry[] {
  const $ = cheerio.load(html);

  return $('div.product-tile')
    .toArray()
    .map(el => {
      const tile = $(el);
      const first = (selector: string) => tile.find(selector).first();
      const text = (selector: string) => first(selector).text().trim() || undefined;
      const attr = (selector: string, name: string) => first(selector).attr(name)?.trim() || undefined;

      const alt = attr('img.tile-main-image', 'alt');

      return {
        pageId,
        name: alt?.replace(', Image 1', '').trim() || undefined,
        sku: tile.attr('data-pid')?.trim() || undefined,
        productUrl: absoluteUrl(attr('a.image-link', 'href'), baseUrl),
        salePrice: attr('span.sales .value', 'content'),
        originalPrice: attr('span.strike-through .value', 'content'),
        imageUrl: upgradeImageUrl(attr('img.tile-main-image', 'src')),
        imageUrlAlt: upgradeImageUrl(attr('img.tile-alt-hover-image', 'src')),
        license: text('div.product-license'),
        badge: text('div.product-flag'),
        availabilityText: text('div.product-availability'),
      };
    });
}

/**
 * funko.com listing pages.
 */
export class FunkoCatalogSource extends CatalogSource {
  readonly name = 'funko';

  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: FunkoSourceOptions = {}) {
    super();
    this.baseUrl = options.baseUrl ?? FUNKO_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  async fetch(pageId: string, region: string): Promise<RawCatalogEntry[]> {
    const url = buildPageUrl(pageId, region, this.baseUrl);

    let res: Response;
    try {
      res = await fetch(url, {
        headers: {
          'User-Agent': USER_AGENT,
          'Accept': 'text/html,application/xhtml+xml',
        },
        redirect: 'follow',
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new SourceFetchError(pageId, `Request to ${url} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!res.ok) {
      throw new SourceFetchError(pageId, `HTTP ${res.status} for ${url}`, { status: res.status });
    }

    const html = await res.text();
    const entries = parseCatalogPage(html, pageId, this.baseUrl);

    if (entries.length === 0) {
      this.logger.warn('No product tiles found', { pageId, chars: html.length });
    }

    return entries;
  }
}
