import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { ConversionJob, JobInput, TargetFormat } from '../types';
import { JobNotFoundError, JobNotReadyError, ValidationError } from '../errors';
import { TARGET_FORMATS } from '../engine/formats';
import { isTerminal, toJobView } from '../jobs/job';
import type { ConversionScheduler, ResultStore } from '../jobs';
import { getCorrelationId, setCorrelationId } from '../utils/correlation-id';

export interface ConvertRouteOptions {
  scheduler: ConversionScheduler;
  store: ResultStore;
  /** Upper bound for ?wait= */
  maxWaitMs: number;
}

interface ConvertBody {
  templateId?: string;
  /** Base64-encoded input document */
  document?: string;
  contentType?: string;
  fileName?: string;
  targetFormat: TargetFormat;
  data?: Record<string, unknown>;
  locale?: string;
  timezone?: string;
  timeoutMs?: number;
}

interface JobParams {
  jobId: string;
}

interface StatusQuery {
  wait?: number;
}

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;
const UUID = '^[0-9a-fA-F-]{36}$';

const jobParamsSchema = {
  type: 'object',
  required: ['jobId'],
  properties: {
    jobId: { type: 'string', pattern: UUID },
  },
};

const convertBodySchema = {
  type: 'object',
  required: ['targetFormat'],
  properties: {
    templateId: { type: 'string', pattern: '^[A-Za-z0-9_-]{1,128}$' },
    document: { type: 'string', minLength: 1 },
    contentType: { type: 'string', minLength: 1 },
    fileName: { type: 'string', minLength: 1, maxLength: 255 },
    targetFormat: { type: 'string', enum: TARGET_FORMATS },
    data: { type: 'object' },
    locale: { type: 'string', minLength: 2, maxLength: 35 },
    timezone: { type: 'string', minLength: 1, maxLength: 64 },
    timeoutMs: { type: 'integer', minimum: 1 },
  },
  // Merge data is only accepted with a stored template
  oneOf: [{ required: ['templateId'] }, { required: ['document', 'contentType'], not: { required: ['data'] } }],
};

function decodeDocument(encoded: string): Buffer {
  const compact = encoded.replace(/\s+/g, '');
  if (compact.length % 4 !== 0 || !BASE64.test(compact)) {
    throw new ValidationError('document must be base64-encoded');
  }
  return Buffer.from(compact, 'base64');
}

function toJobInput(body: ConvertBody): JobInput {
  if (body.templateId !== undefined) {
    return { kind: 'template', templateId: body.templateId };
  }
  if (body.document === undefined || body.contentType === undefined) {
    throw new ValidationError('body must have either templateId or document and contentType');
  }
  return { kind: 'document', bytes: decodeDocument(body.document), contentType: body.contentType, fileName: body.fileName };
}

/**
 * Download name for an artifact: the uploaded file's base name, else the
 * template id, else the job id
 */
export function artifactFileName(job: ConversionJob, extension: string): string {
  const base =
    job.input.kind === 'template'
      ? job.input.templateId
      : job.input.fileName
        ? job.input.fileName.replace(/\.[^.]*$/, '')
        : job.id;
  const safe = base.replace(/[^A-Za-z0-9._-]/g, '_') || job.id;
  return `${safe}.${extension}`;
}

/**
 * Conversion job routes
 *
 * All endpoints require a bearer token
 */
export async function convertRoutes(fastify: FastifyInstance, options: ConvertRouteOptions): Promise<void> {
  const { scheduler, store } = options;

  fastify.addHook('preHandler', fastify.authenticate);

  /**
   * POST /convert
   * Admit a conversion job; 202 with the job id, 429 when the queue is full
   */
  fastify.post<{ Body: ConvertBody }>(
    '/convert',
    { schema: { body: convertBodySchema } },
    async (request: FastifyRequest<{ Body: ConvertBody }>, reply: FastifyReply) => {
      const correlationId = getCorrelationId(request);
      setCorrelationId(reply, correlationId);
      const body = request.body;

      const handle = scheduler.submit({
        input: toJobInput(body),
        targetFormat: body.targetFormat,
        data: body.data,
        locale: body.locale,
        timezone: body.timezone,
        timeoutMs: body.timeoutMs,
        correlationId,
      });

      const statusUrl = `/convert/${handle.jobId}`;
      request.log.info({ correlationId, jobId: handle.jobId }, 'Conversion job accepted');

      return reply.code(202).header('location', statusUrl).send({
        jobId: handle.jobId,
        state: handle.state(),
        statusUrl,
        correlationId,
      });
    }
  );

  /**
   * GET /convert/:jobId[?wait=ms]
   * 202 (no body) while active, 303 to the artifact on success, 200 with the
   * error for other terminal states
   */
  fastify.get<{ Params: JobParams; Querystring: StatusQuery }>(
    '/convert/:jobId',
    {
      schema: {
        params: jobParamsSchema,
        querystring: {
          type: 'object',
          properties: { wait: { type: 'integer', minimum: 0 } },
        },
      },
    },
    async (request: FastifyRequest<{ Params: JobParams; Querystring: StatusQuery }>, reply: FastifyReply) => {
      const correlationId = getCorrelationId(request);
      setCorrelationId(reply, correlationId);
      const { jobId } = request.params;
      const waitMs = Math.min(request.query.wait ?? 0, options.maxWaitMs);

      const job = waitMs > 0 ? await scheduler.waitFor(jobId, waitMs) : scheduler.getJob(jobId);
      if (!job) {
        throw new JobNotFoundError(jobId, { correlationId });
      }

      if (!isTerminal(job.state)) {
        return reply.code(202).header('x-job-state', job.state).send();
      }

      reply.header('x-job-state', job.state);
      if (job.state === 'SUCCEEDED') {
        const artifactUrl = `/convert/${jobId}/artifact`;
        return reply.code(303).header('location', artifactUrl).send({ ...toJobView(job), artifactUrl });
      }
      return reply.code(200).send(toJobView(job));
    }
  );

  /**
   * GET /convert/:jobId/artifact
   * Artifact bytes; 409 when the job has none, 404 when unknown
   */
  fastify.get<{ Params: JobParams }>(
    '/convert/:jobId/artifact',
    { schema: { params: jobParamsSchema } },
    async (request: FastifyRequest<{ Params: JobParams }>, reply: FastifyReply) => {
      const correlationId = getCorrelationId(request);
      setCorrelationId(reply, correlationId);
      const { jobId } = request.params;

      const lookup = store.get(jobId);
      switch (lookup.status) {
        case 'not_found':
          throw new JobNotFoundError(jobId, { correlationId });
        case 'not_ready':
          throw new JobNotReadyError(jobId, scheduler.getJob(jobId)?.state ?? 'QUEUED', { correlationId });
        case 'failed':
          throw new JobNotReadyError(jobId, lookup.job.state, { correlationId });
        case 'ready': {
          const { artifact, job } = lookup;
          return reply
            .code(200)
            .header('content-type', artifact.contentType)
            .header('content-disposition', `attachment; filename="${artifactFileName(job, artifact.extension)}"`)
            .header('x-content-sha256', artifact.sha256)
            .send(artifact.bytes);
        }
      }
    }
  );

  /**
   * DELETE /convert/:jobId
   * Cancels an active job (202) or deletes a stored result (200)
   */
  fastify.delete<{ Params: JobParams }>(
    '/convert/:jobId',
    { schema: { params: jobParamsSchema } },
    async (request: FastifyRequest<{ Params: JobParams }>, reply: FastifyReply) => {
      const correlationId = getCorrelationId(request);
      setCorrelationId(reply, correlationId);
      const { jobId } = request.params;

      const job = scheduler.getJob(jobId);
      if (!job) {
        throw new JobNotFoundError(jobId, { correlationId });
      }

      if (!isTerminal(job.state)) {
        scheduler.cancel(jobId);
        const state = scheduler.getJob(jobId)?.state ?? 'CANCELLED';
        request.log.info({ correlationId, jobId, state }, 'Cancellation requested');
        return reply.code(202).send({ jobId, state, cancelled: true, correlationId });
      }

      store.delete(jobId);
      request.log.info({ correlationId, jobId }, 'Result deleted');
      return reply.code(200).send({ jobId, state: job.state, deleted: true, correlationId });
    }
  );
}
