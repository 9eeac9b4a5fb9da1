import { Playlist, Variant } from '../types/index.js';
import { extractVariants } from './playlistParser.js';

export const DEFAULT_VARIANT_LIMIT = 3;

function compareByBandwidth(a: Variant, b: Variant): number {
  if (a.bandwidth === undefined && b.bandwidth === undefined) return 0;
  if (a.bandwidth === undefined) return 1;
  if (b.bandwidth === undefined) return -1;
  return b.bandwidth - a.bandwidth;
}

/**
 * Highest-bandwidth variants first, unranked ones last, ties in their original order.
 * Kept entries are returned as-is.
 */
export function filterVariants(variants: Variant[], limit: number = DEFAULT_VARIANT_LIMIT): Variant[] {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new RangeError(`Variant limit must be a non-negative integer, got ${limit}`);
  }

  return [...variants].sort(compareByBandwidth).slice(0, limit);
}

/**
 * Drops the variants of a master playlist that fall outside the limit.
 * Only the dropped variants' #EXT-X-STREAM-INF tag and URI line are removed; everything else stays in place.
 */
export function applyVariantLimit(playlist: Playlist, limit: number): Playlist {
  if (playlist.kind !== 'master') {
    return playlist;
  }

  const variants = extractVariants(playlist);
  const kept = new Set(filterVariants(variants, limit).map(variant => variant.index));
  const droppedLines = new Set<number>();

  for (const variant of variants) {
    if (!kept.has(variant.index)) {
      droppedLines.add(variant.tagLine);
      droppedLines.add(variant.uriLine);
    }
  }

  return {
    kind: playlist.kind,
    lines: playlist.lines.filter((_, index) => !droppedLines.has(index))
  };
}
