/**
 * Popcast — Post Formatting
 *
 * Turns an Item into announcement text, hashtags and image alt text.
 * Lengths are counted in graphemes, the unit the post limit is measured in.
 */

import type { Item } from '../types';
import { currencySymbol } from '../lib/regions';

export const MAX_POST_LENGTH = 300;

// Licenses too broad to make a useful series hashtag on their own.
const GENERIC_LICENSES = new Set(['marvel', 'dc', 'anime', 'disney', 'star wars', 'gaming']);

const WELL_KNOWN_CHARACTERS = [
  'Spider-Man',
  'Iron Man',
  'Captain America',
  'Black Widow',
  'Thor',
  'Hulk',
  'Wolverine',
  'Deadpool',
  'Venom',
  'Batman',
  'Superman',
  'Wonder Woman',
  'Harley Quinn',
  'Joker',
  'Flash',
  'Aquaman',
  'Green Lantern',
];

type PostKind =
  | 'coming_soon'
  | 'sale'
  | 'new_release'
  | 'back_in_stock'
  | 'exclusive'
  | 'best_seller'
  | 'default';

const HEADLINES: Record<Exclude<PostKind, 'default'>, string> = {
  coming_soon: '🔜 COMING SOON',
  sale: '🏷️ SALE',
  new_release: '🆕 NEW RELEASE',
  back_in_stock: '🔄 BACK IN STOCK',
  exclusive: '⭐ EXCLUSIVE',
  best_seller: '🔥 BEST SELLER',
};

const PAGE_KINDS: Record<string, PostKind> = {
  'new-releases': 'new_release',
  'back-in-stock': 'back_in_stock',
  'exclusives': 'exclusive',
  'best-selling': 'best_seller',
};

/**
 * Coming soon > price drop > source page.
 */
export function classifyPost(item: Item): PostKind {
  if (item.availability === 'coming_soon' || item.dropDate) return 'coming_soon';
  if (item.priceDrop > 0 && item.originalPrice > 0) return 'sale';
  return PAGE_KINDS[item.sourcePage] ?? 'default';
}

/**
 * PascalCase series hashtag (without '#').
 * Generic licenses fall back to a character or the first word of the title.
 */
export function seriesHashtag(category: string, title: string): string {
  let source = category && category !== 'Other' ? category : title;

  if (GENERIC_LICENSES.has(source.toLowerCase()) && title) {
    const cleanTitle = title.replace('Pop!', '').replace('Plus', '').trim();
    const character = WELL_KNOWN_CHARACTERS.find(c =>
      cleanTitle.toLowerCase().includes(c.toLowerCase())
    );
    source = character ?? cleanTitle.split(/\s+/)[0] ?? source;
  }

  const hashtag = source
    .replace('Pop!', '')
    .trim()
    .split(/\s+/)
    .filter(word => word.length > 0)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join('')
    .replace(/[^\p{L}\p{N}]/gu, '');

  return hashtag || 'FunkoPop';
}

const graphemeSegmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

function graphemes(text: string): string[] {
  return Array.from(graphemeSegmenter.segment(text), part => part.segment);
}

export function graphemeLength(text: string): number {
  return graphemes(text).length;
}

function money(amount: number, currency: string): string {
  return `${currencySymbol(currency)}${amount.toFixed(2)}`;
}

/**
 * Full announcement text for an item, within MAX_POST_LENGTH.
 * An over-long post loses the end of its title line; the price, link and
 * hashtags stay whole.
 */
export function formatPostText(item: Item): string {
  const kind = classifyPost(item);
  const tag = item.category && item.category !== 'Other' ? `[${item.category}]` : '';

  const headline =
    kind === 'default'
      ? ['🏷️', tag, 'Funko Pop'].filter(Boolean).join(' ')
      : [HEADLINES[kind], tag].filter(Boolean).join(' ');

  const details: string[] = [];

  if (kind === 'coming_soon' && item.dropDate) {
    details.push(`Drops ${item.dropDate}`);
  }

  if (kind === 'sale') {
    details.push(`Was: ${money(item.originalPrice, item.currency)} → Now: ${money(item.price, item.currency)}`);
  } else if (item.price > 0) {
    details.push(`Price: ${money(item.price, item.currency)}`);
  }

  const compose = (titleLine: string) =>
    [
      headline,
      titleLine,
      ...details,
      '',
      `🔗 ${item.productUrl}`,
      '',
      `#${seriesHashtag(item.category, item.title)} #Funko #FunkoPop`,
    ].join('\n');

  const titleLine = `✨ ${item.badge ? `${item.badge} ` : ''}${item.title}`;
  const text = compose(titleLine);
  const overflow = graphemeLength(text) - MAX_POST_LENGTH;
  if (overflow <= 0) return text;

  const keep = graphemeLength(titleLine) - overflow - 3;
  const shortened = keep > 0 ? `${graphemes(titleLine).slice(0, keep).join('')}...` : '...';
  // Still over when the fixed lines alone exceed the limit.
  return truncatePost(compose(shortened));
}

/**
 * Image alt text for accessibility.
 */
export function formatAltText(item: Item): string {
  const prefix = item.category && item.category !== 'Other' ? `${item.category} ` : '';
  const price = item.price > 0 ? `, priced at ${money(item.price, item.currency)}` : '';
  return `${prefix}Funko Pop figure: ${item.title}${price}`;
}

export function formatPackagingAltText(item: Item): string {
  return `${item.title} in original packaging`;
}

/**
 * Cut text to the post limit (counted in graphemes), ending in "...".
 */
export function truncatePost(text: string, limit = MAX_POST_LENGTH): string {
  const parts = graphemes(text);
  if (parts.length <= limit) return text;
  return parts.slice(0, limit - 3).join('') + '...';
}
