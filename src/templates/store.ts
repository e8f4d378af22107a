import { promises as fs } from 'fs';
import path from 'path';
import type { StoredTemplate, TemplateCacheStats } from '../types';
import { TemplateNotFoundError } from '../errors';
import { INPUT_EXTENSIONS, contentTypeForExtension } from '../engine/formats';
import { createLogger } from '../utils/logger';
import { TemplateCache } from './cache';

const logger = createLogger('templates:store');

export const TEMPLATE_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export function isValidTemplateId(templateId: string): boolean {
  return TEMPLATE_ID_PATTERN.test(templateId);
}

/**
 * Templates stored as `<dir>/<templateId>.<ext>`
 *
 * Lookups try the accepted input extensions in order and go through the
 * cache first.
 */
export class TemplateStore {
  constructor(
    private readonly dir: string | undefined,
    private readonly cache: TemplateCache = new TemplateCache()
  ) {}

  async get(templateId: string, correlationId?: string): Promise<StoredTemplate> {
    if (!this.dir || !isValidTemplateId(templateId)) {
      throw new TemplateNotFoundError(templateId, { correlationId });
    }

    const cached = this.cache.get(templateId);
    if (cached) {
      return cached;
    }

    for (const extension of INPUT_EXTENSIONS) {
      const file = path.join(this.dir, `${templateId}.${extension}`);
      const bytes = await this.tryRead(file);
      if (!bytes) {
        continue;
      }

      const contentType = contentTypeForExtension(extension) ?? 'application/octet-stream';
      const template: StoredTemplate = { templateId, bytes, contentType, extension };
      this.cache.set(template);
      logger.debug({ templateId, file, sizeBytes: bytes.length, correlationId }, 'Template loaded');
      return template;
    }

    throw new TemplateNotFoundError(templateId, { correlationId });
  }

  getCacheStats(): TemplateCacheStats {
    return this.cache.getStats();
  }

  private async tryRead(file: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(file);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }
}
