/**
 * @file src/lib/description-cache.ts
 * @description In-memory TTL cache for live article descriptions fetched by the read API.
 */

interface CacheEntry {
  value: string;
  storedAt: number;
}

export class DescriptionCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  isValid(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && this.now() - entry.storedAt < this.ttlMs;
  }

  get(key: string): string | undefined {
    return this.isValid(key) ? this.entries.get(key)?.value : undefined;
  }

  set(key: string, value: string): void {
    this.entries.set(key, { value, storedAt: this.now() });
  }

  /** Returns the number of entries removed. */
  clear(): number {
    const removed = this.entries.size;
    this.entries.clear();
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}

const decodeSlug = (slug: string): string => {
  try {
    return decodeURIComponent(slug);
  } catch {
    return slug;
  }
};

/** Article title from a `/wiki/<Title>` URL, or `''` when the URL has no such segment. */
export const wikiTitleFromUrl = (url: string): string => {
  const marker = '/wiki/';
  const at = url.lastIndexOf(marker);
  if (at === -1) return '';
  const slug = url.slice(at + marker.length).replace(/[#?].*$/s, '');
  return decodeSlug(slug).replace(/_/g, ' ').trim();
};
