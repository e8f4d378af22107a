import createReport from 'docx-templates';
import type { MergeOptions } from '../types';
import { createLogger } from '../utils/logger';
import { TemplateMergeError } from '../errors';
import { createMergeHelpers } from './helpers';

const logger = createLogger('templates:merge');

/**
 * Merge data into a DOCX template using docx-templates
 *
 * - Commands use `{{ }}` delimiters: `{{ customer.name }}`,
 *   `{{FOR line IN lines}}...{{END-FOR line}}`, `{{IF paid}}...{{END-IF}}`
 * - Expressions run in a `vm` context of this process, which is not an
 *   isolation boundary: only merge trusted templates from the store
 * - Helpers from ./helpers are available to every expression
 *
 * @throws TemplateMergeError when the template or data cannot be merged
 */
export async function mergeTemplate(
  template: Buffer,
  data: Record<string, unknown>,
  options: MergeOptions
): Promise<Buffer> {
  logger.debug(
    { templateSize: template.length, dataKeys: Object.keys(data), locale: options.locale, timezone: options.timezone },
    'Starting template merge'
  );

  try {
    const result = await createReport({
      template,
      data,
      cmdDelimiter: ['{{', '}}'],
      additionalJsContext: createMergeHelpers(options),
      processLineBreaks: true,
      noSandbox: false,
    });

    logger.info({ templateSize: template.length, resultSize: result.length, locale: options.locale }, 'Template merge complete');
    return Buffer.from(result);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn({ error: message, dataKeys: Object.keys(data) }, 'Template merge failed');
    throw new TemplateMergeError(message);
  }
}

/**
 * Warnings about a merge payload (empty object, undefined fields)
 */
export function validateMergeData(data: Record<string, unknown>): string[] {
  const warnings: string[] = [];

  if (Object.keys(data).length === 0) {
    warnings.push('Data object is empty');
  }

  const checkForUndefined = (obj: unknown, prefix: string): void => {
    if (typeof obj !== 'object' || obj === null || Array.isArray(obj)) {
      return;
    }
    for (const [key, value] of Object.entries(obj)) {
      const fullPath = prefix ? `${prefix}.${key}` : key;
      if (value === undefined) {
        warnings.push(`Field ${fullPath} is undefined (should be null or a value)`);
      } else {
        checkForUndefined(value, fullPath);
      }
    }
  };

  checkForUndefined(data, '');
  return warnings;
}
