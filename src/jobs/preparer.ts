import type { ConversionJob, EngineInput, JobPayload } from '../types';
import { TemplateMergeError, TemplateNotFoundError, ValidationError } from '../errors';
import { extensionForContentType, isDocx } from '../engine/formats';
import { TemplateStore } from '../templates/store';
import { mergeTemplate, validateMergeData } from '../templates/merge';
import { createLogger } from '../utils/logger';

const logger = createLogger('jobs:preparer');

/**
 * Turns a job's payload into the bytes handed to the engine
 */
export interface InputPreparer {
  prepare(job: ConversionJob, payload: JobPayload): Promise<EngineInput>;
}

/**
 * Resolves template ids through the template store and merges the job's
 * data payload into DOCX templates
 *
 * Uploaded documents are never merged: merge expressions run inside this
 * process, so only templates from the store may carry them.
 */
export class DocumentPreparer implements InputPreparer {
  constructor(private readonly templates?: TemplateStore) {}

  async prepare(job: ConversionJob, payload: JobPayload): Promise<EngineInput> {
    const context = { jobId: job.id, correlationId: job.correlationId };
    const { input, data } = payload;

    if (input.kind === 'document') {
      if (data !== undefined) {
        throw new ValidationError('data can only be merged into templates', context);
      }
      const extension = extensionForContentType(input.contentType);
      if (!extension) {
        throw new ValidationError(`Unsupported content type: ${input.contentType}`, context);
      }
      return { source: input.bytes, contentType: input.contentType, extension };
    }

    if (!this.templates) {
      throw new TemplateNotFoundError(input.templateId, context);
    }
    const template = await this.templates.get(input.templateId, job.correlationId);
    if (data === undefined) {
      return { source: template.bytes, contentType: template.contentType, extension: template.extension };
    }

    if (!isDocx(template.contentType)) {
      throw new TemplateMergeError(`data can only be merged into DOCX templates, got ${template.contentType}`, context);
    }
    const warnings = validateMergeData(data);
    if (warnings.length > 0) {
      logger.warn({ ...context, templateId: input.templateId, warnings }, 'Merge data warnings');
    }
    const merged = await mergeTemplate(template.bytes, data, { locale: job.locale, timezone: job.timezone });
    return { source: merged, contentType: template.contentType, extension: template.extension };
  }
}
