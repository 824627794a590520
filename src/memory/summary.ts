import { getMemories, type MemoryKind } from './memories.js';
import { findUserProfile } from './profiles.js';
import { listTrackedWallets } from './wallets.js';

function formatPreference(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

const SECTIONS: Array<{ kind: MemoryKind; title: string }> = [
  { kind: 'fact', title: 'Important facts' },
  { kind: 'preference', title: 'Preferences' },
  { kind: 'wallet_info', title: 'Wallet information' },
];

/**
 * Plain-text digest of what we know about a requester, injected into the system
 * message each turn. Empty sections are omitted; an unknown requester yields ''.
 */
export function buildMemorySummary(requesterId: string, maxItems = 5, dbPath?: string): string {
  const blocks: string[] = [];

  const profile = findUserProfile(requesterId, dbPath);
  if (profile) {
    blocks.push(`User: ${profile.username} (interactions: ${profile.interactionsCount})`);
    const settings = Object.entries(profile.preferences ?? {}).map(
      ([key, value]) => `- ${key}: ${formatPreference(value)}`
    );
    if (settings.length > 0) {
      blocks.push(['Profile settings:', ...settings].join('\n'));
    }
  }

  for (const section of SECTIONS) {
    const items = getMemories(requesterId, { kind: section.kind, limit: maxItems }, dbPath);
    if (items.length === 0) continue;
    const lines = items.map((item) => `- ${item.topic}: ${item.content}`);
    blocks.push([`${section.title}:`, ...lines].join('\n'));
  }

  const wallets = listTrackedWallets(requesterId, dbPath);
  if (wallets.length > 0) {
    const lines = wallets.map((wallet) => {
      const nickname = wallet.nickname ? ` (${wallet.nickname})` : '';
      return `- ${wallet.address} on ${wallet.network}${nickname}`;
    });
    blocks.push(['Tracked wallets:', ...lines].join('\n'));
  }

  return blocks.join('\n\n');
}
