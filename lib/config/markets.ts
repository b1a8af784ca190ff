/**
 * Service markets, keyed by zip prefix. Used only for reporting.
 */

import { z } from 'zod';
import marketData from './markets.json';

const MarketSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  zipPrefixes: z.array(z.string().min(1)),
});

export type Market = z.infer<typeof MarketSchema>;

export const MARKETS: readonly Market[] = z.array(MarketSchema).parse(marketData);

/**
 * Market id for a delivery zip, or null when the zip is outside every market.
 * The longest matching prefix wins.
 */
export function marketIdForZip(zip: string | null | undefined): number | null {
  const normalized = zip?.trim();
  if (!normalized) return null;

  let best: { id: number; length: number } | null = null;
  for (const market of MARKETS) {
    for (const prefix of market.zipPrefixes) {
      if (normalized.startsWith(prefix) && (!best || prefix.length > best.length)) {
        best = { id: market.id, length: prefix.length };
      }
    }
  }
  return best?.id ?? null;
}
