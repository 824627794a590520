import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

const AssetSchema = z.object({
  symbol: z.string().min(1),
  kind: z.enum(['crypto', 'stock']),
  priceId: z.string().nullable(),
  names: z.array(z.string()),
});

const AssetFileSchema = z.object({ assets: z.array(AssetSchema) });

export type KnownAsset = z.infer<typeof AssetSchema>;

let cached: KnownAsset[] | null = null;

export function loadKnownAssets(): KnownAsset[] {
  if (cached) return cached;
  const here = dirname(fileURLToPath(import.meta.url));
  const raw = readFileSync(join(here, 'data', 'assets.json'), 'utf-8');
  cached = AssetFileSchema.parse(JSON.parse(raw)).assets;
  return cached;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function assetPatterns(asset: KnownAsset): RegExp[] {
  const symbol = escapeRegExp(asset.symbol);
  const patterns = [
    // Bare tickers must be upper case so "link" or "dot" in prose do not count.
    new RegExp(`(?:^|[^A-Za-z0-9])\\$?${symbol}(?![A-Za-z0-9])`),
    new RegExp(`\\$${symbol}(?![A-Za-z0-9])`, 'i'),
  ];
  if (asset.names.length > 0) {
    patterns.push(new RegExp(`\\b(?:${asset.names.map(escapeRegExp).join('|')})\\b`, 'i'));
  }
  return patterns;
}

/**
 * Finds the first known asset mentioned by ticker (upper case, or any case with a
 * $ prefix) or by common name. Earlier mentions win.
 */
export function findAssetMention(text: string): KnownAsset | null {
  let best: { asset: KnownAsset; index: number } | null = null;
  for (const asset of loadKnownAssets()) {
    for (const pattern of assetPatterns(asset)) {
      const match = pattern.exec(text);
      if (match && (best === null || match.index < best.index)) {
        best = { asset, index: match.index };
      }
    }
  }
  return best?.asset ?? null;
}
