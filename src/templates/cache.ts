import type { StoredTemplate, TemplateCacheEntry, TemplateCacheStats } from '../types';
import { createLogger } from '../utils/logger';
import { trackMetric } from '../obs';

const logger = createLogger('templates:cache');

// Default cache size in bytes (100 MB)
const DEFAULT_MAX_BYTES = 100 * 1024 * 1024;

/**
 * In-memory template cache
 *
 * - Template files are treated as immutable once read, so no TTL
 * - Size-bounded with LRU eviction
 * - Synchronous operations only, so safe within one Node.js process
 */
export class TemplateCache {
  private cache: Map<string, TemplateCacheEntry> = new Map();
  private stats: TemplateCacheStats = {
    hits: 0,
    misses: 0,
    evictions: 0,
    currentSize: 0,
    entryCount: 0,
  };

  constructor(private readonly maxBytes: number = DEFAULT_MAX_BYTES) {}

  /**
   * Get template from cache
   */
  get(templateId: string): StoredTemplate | undefined {
    const entry = this.cache.get(templateId);

    if (entry) {
      // Cache hit - update lastAccessedAt for LRU
      entry.lastAccessedAt = Date.now();
      this.stats.hits++;
      trackMetric('template_cache_hit', 1, { templateId });
      logger.debug({ templateId, sizeBytes: entry.sizeBytes, hits: this.stats.hits }, 'Template cache hit');
      return entry.template;
    }

    this.stats.misses++;
    trackMetric('template_cache_miss', 1, { templateId });
    logger.debug({ templateId, misses: this.stats.misses }, 'Template cache miss');
    return undefined;
  }

  /**
   * Store template in cache
   *
   * Evicts least-recently-used entries until the new one fits. A template
   * larger than the whole budget is not cached.
   */
  set(template: StoredTemplate): void {
    const { templateId } = template;
    const sizeBytes = template.bytes.length;

    if (sizeBytes > this.maxBytes) {
      logger.warn({ templateId, sizeBytes, maxBytes: this.maxBytes }, 'Template larger than cache, not cached');
      return;
    }

    const existing = this.cache.get(templateId);
    if (existing) {
      this.cache.delete(templateId);
      this.stats.currentSize -= existing.sizeBytes;
      this.stats.entryCount--;
    }

    this.evictIfNeeded(sizeBytes);

    const now = Date.now();
    this.cache.set(templateId, {
      templateId,
      template,
      sizeBytes,
      cachedAt: now,
      lastAccessedAt: now,
    });
    this.stats.currentSize += sizeBytes;
    this.stats.entryCount++;

    logger.info(
      { templateId, sizeBytes, totalSize: this.stats.currentSize, entryCount: this.stats.entryCount },
      'Template added to cache'
    );
  }

  private evictIfNeeded(requiredBytes: number): void {
    const availableSpace = this.maxBytes - this.stats.currentSize;
    if (availableSpace >= requiredBytes) {
      return;
    }

    const spaceNeeded = requiredBytes - availableSpace;

    // Oldest access first
    const entries = Array.from(this.cache.entries()).sort(([, a], [, b]) => a.lastAccessedAt - b.lastAccessedAt);

    let freedSpace = 0;
    for (const [key, entry] of entries) {
      if (freedSpace >= spaceNeeded) {
        break;
      }
      logger.debug({ templateId: key, sizeBytes: entry.sizeBytes }, 'Evicting template from cache (LRU)');
      this.cache.delete(key);
      this.stats.currentSize -= entry.sizeBytes;
      this.stats.entryCount--;
      this.stats.evictions++;
      freedSpace += entry.sizeBytes;
    }

    logger.info(
      { freedSpace, evictions: this.stats.evictions, remainingSize: this.stats.currentSize },
      'Cache eviction complete'
    );
  }

  has(templateId: string): boolean {
    return this.cache.has(templateId);
  }

  getStats(): TemplateCacheStats {
    return { ...this.stats };
  }

  clear(): void {
    const count = this.cache.size;
    this.cache.clear();
    this.stats.currentSize = 0;
    this.stats.entryCount = 0;
    logger.info({ clearedCount: count }, 'Cache cleared');
  }
}
