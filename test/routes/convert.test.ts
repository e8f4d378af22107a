import { describe, it, expect, beforeAll, afterAll, afterEach } from '@jest/globals';
import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { FastifyInstance } from 'fastify';
import { build } from '../../src/server';
import { artifactFileName } from '../../src/routes/convert';
import { createJob } from '../../src/jobs/job';
import { FakeEngine, EngineBehaviour, createGate, pdfBytes, sleepThenSucceed } from '../helpers/fake-engine';
import { createTestConfig, TestConfigOverrides } from '../helpers/test-config';
import { bearer, createTestToken } from '../helpers/auth';
import { createTestDocxBuffer, readDocxEntry } from '../helpers/test-docx';

const UNKNOWN_JOB = '00000000-0000-4000-8000-000000000000';

function base64(text: string | Buffer): string {
  return Buffer.from(text).toString('base64');
}

describe('Conversion routes', () => {
  let templatesDir: string;
  let app: FastifyInstance | null = null;
  let engine: FakeEngine;

  async function setup(behaviour?: EngineBehaviour, overrides: TestConfigOverrides = {}): Promise<FastifyInstance> {
    engine = new FakeEngine(behaviour);
    const config = createTestConfig({ ...overrides, templates: { dir: templatesDir, ...overrides.templates } });
    const instance = await build({ config, engine });
    await instance.ready();
    app = instance;
    return instance;
  }

  async function submit(instance: FastifyInstance, payload: Record<string, unknown>) {
    return instance.inject({ method: 'POST', url: '/convert', headers: bearer(), payload });
  }

  const textDocument = { document: base64('hello world'), contentType: 'text/plain', targetFormat: 'pdf' };

  beforeAll(async () => {
    templatesDir = await fs.mkdtemp(path.join(os.tmpdir(), 'routes-templates-'));
    await fs.writeFile(path.join(templatesDir, 'greeting.docx'), await createTestDocxBuffer(['Hello {{name}}']));
  });

  afterEach(async () => {
    if (app) {
      await app.close();
      app = null;
    }
  });

  afterAll(async () => {
    await fs.rm(templatesDir, { recursive: true, force: true });
  });

  describe('POST /convert', () => {
    it('should accept a document and return 202 with the job id', async () => {
      const instance = await setup(createGate().behaviour);

      const response = await submit(instance, textDocument);

      expect(response.statusCode).toBe(202);
      const body = response.json();
      expect(body.jobId).toMatch(/^[0-9a-f-]{36}$/);
      expect(body.state).toBe('RUNNING');
      expect(body.statusUrl).toBe(`/convert/${body.jobId}`);
      expect(response.headers.location).toBe(`/convert/${body.jobId}`);
    });

    it('should echo the caller correlation id', async () => {
      const instance = await setup();

      const response = await instance.inject({
        method: 'POST',
        url: '/convert',
        headers: { ...bearer(), 'x-correlation-id': 'req-123' },
        payload: textDocument,
      });

      expect(response.json().correlationId).toBe('req-123');
      expect(response.headers['x-correlation-id']).toBe('req-123');
    });

    it('should require a bearer token', async () => {
      const instance = await setup();

      const response = await instance.inject({ method: 'POST', url: '/convert', payload: textDocument });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toMatchObject({
        error: 'AuthenticationError',
        code: 'AUTHENTICATION_ERROR',
        message: 'Missing authorization header or invalid format',
      });
    });

    it('should reject tokens signed with another secret', async () => {
      const instance = await setup();
      const forged = createTestToken().split('.').slice(0, 2).join('.') + '.c2lnbmF0dXJl';

      const response = await instance.inject({
        method: 'POST',
        url: '/convert',
        headers: bearer(forged),
        payload: textDocument,
      });

      expect(response.statusCode).toBe(401);
      expect(response.json().message).toBe('Invalid token signature');
    });

    it('should reject expired tokens', async () => {
      const instance = await setup();
      const expired = createTestToken({ exp: Math.floor(Date.now() / 1000) - 60 });

      const response = await instance.inject({
        method: 'POST',
        url: '/convert',
        headers: bearer(expired),
        payload: textDocument,
      });

      expect(response.statusCode).toBe(401);
      expect(response.json().message).toBe('Token has expired');
    });

    it('should reject a body without a target format', async () => {
      const instance = await setup();

      const response = await submit(instance, { document: base64('x'), contentType: 'text/plain' });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('ValidationError');
    });

    it('should reject a body with both a template and a document', async () => {
      const instance = await setup();

      const response = await submit(instance, { ...textDocument, templateId: 'greeting' });

      expect(response.statusCode).toBe(400);
      expect(response.json().code).toBe('VALIDATION_ERROR');
    });

    it('should reject merge data sent with an uploaded document', async () => {
      const instance = await setup();
      const docx = await createTestDocxBuffer(['{{ name }}']);

      const response = await submit(instance, {
        document: base64(docx),
        contentType: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
        data: { name: 'Ada' },
        targetFormat: 'pdf',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().code).toBe('VALIDATION_ERROR');
      expect(engine.calls).toHaveLength(0);
    });

    it('should reject documents that are not base64', async () => {
      const instance = await setup();

      const response = await submit(instance, { ...textDocument, document: 'not base64!' });

      expect(response.statusCode).toBe(400);
      expect(response.json().message).toBe('document must be base64-encoded');
    });

    it('should reject unsupported target formats', async () => {
      const instance = await setup();

      const response = await submit(instance, { ...textDocument, targetFormat: 'xlsx' });

      expect(response.statusCode).toBe(400);
    });

    it('should reject documents over the input limit with 413', async () => {
      const instance = await setup(undefined, { maxInputBytes: 1024 });

      const response = await submit(instance, { ...textDocument, document: base64(Buffer.alloc(1025, 'a')) });

      expect(response.statusCode).toBe(413);
      expect(response.json()).toMatchObject({
        code: 'INPUT_TOO_LARGE',
        message: 'Input size (1025 bytes) exceeds maximum allowed size (1024 bytes)',
      });
    });

    it('should reject timeouts above the configured maximum', async () => {
      const instance = await setup();

      const response = await submit(instance, { ...textDocument, timeoutMs: 10001 });

      expect(response.statusCode).toBe(400);
      expect(response.json().message).toBe('timeoutMs must be a positive integer no larger than 10000');
    });

    it('should answer 429 when the pool and queue are full', async () => {
      const gate = createGate();
      const instance = await setup(gate.behaviour, { pool: { concurrency: 1, maxQueueDepth: 0 } });

      const first = await submit(instance, textDocument);
      const second = await submit(instance, textDocument);

      expect(first.statusCode).toBe(202);
      expect(second.statusCode).toBe(429);
      expect(second.json()).toMatchObject({ error: 'OverloadedError', code: 'OVERLOADED' });
      gate.release();
    });
  });

  describe('GET /convert/:jobId', () => {
    it('should answer 202 without a body while the job is active', async () => {
      const gate = createGate();
      const instance = await setup(gate.behaviour);
      const { jobId } = (await submit(instance, textDocument)).json();

      const response = await instance.inject({ method: 'GET', url: `/convert/${jobId}`, headers: bearer() });

      expect(response.statusCode).toBe(202);
      expect(response.headers['x-job-state']).toBe('RUNNING');
      expect(response.body).toBe('');
      gate.release();
    });

    it('should redirect to the artifact once the job succeeded', async () => {
      const instance = await setup();
      const { jobId } = (await submit(instance, textDocument)).json();

      const response = await instance.inject({ method: 'GET', url: `/convert/${jobId}?wait=2000`, headers: bearer() });

      expect(response.statusCode).toBe(303);
      expect(response.headers.location).toBe(`/convert/${jobId}/artifact`);
      expect(response.headers['x-job-state']).toBe('SUCCEEDED');
      expect(response.json()).toMatchObject({
        jobId,
        state: 'SUCCEEDED',
        resultRef: jobId,
        error: null,
        input: { kind: 'document', contentType: 'text/plain', sizeBytes: 11 },
      });
    });

    it('should report a timed out job with its error', async () => {
      const instance = await setup(sleepThenSucceed(5000));
      const { jobId } = (await submit(instance, { ...textDocument, timeoutMs: 100 })).json();

      const response = await instance.inject({ method: 'GET', url: `/convert/${jobId}?wait=2000`, headers: bearer() });

      expect(response.statusCode).toBe(200);
      expect(response.headers['x-job-state']).toBe('TIMED_OUT');
      expect(response.json().error).toEqual({
        code: 'ENGINE_TIMED_OUT',
        error: 'EngineTimedOutError',
        message: 'Engine timed out after 100ms',
        retryable: false,
      });
    });

    it('should report a missing template as a failed job', async () => {
      const instance = await setup();
      const { jobId } = (await submit(instance, { templateId: 'no-such-template', targetFormat: 'pdf' })).json();

      const response = await instance.inject({ method: 'GET', url: `/convert/${jobId}?wait=2000`, headers: bearer() });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ state: 'FAILED', error: { code: 'TEMPLATE_NOT_FOUND' } });
      expect(engine.calls).toHaveLength(0);
    });

    it('should answer 404 for unknown jobs', async () => {
      const instance = await setup();

      const response = await instance.inject({ method: 'GET', url: `/convert/${UNKNOWN_JOB}`, headers: bearer() });

      expect(response.statusCode).toBe(404);
      expect(response.json().code).toBe('JOB_NOT_FOUND');
    });

    it('should answer 400 for malformed job ids', async () => {
      const instance = await setup();

      const response = await instance.inject({ method: 'GET', url: '/convert/not-a-job', headers: bearer() });

      expect(response.statusCode).toBe(400);
    });
  });

  describe('GET /convert/:jobId/artifact', () => {
    it('should return the artifact bytes with download headers', async () => {
      const instance = await setup();
      const { jobId } = (await submit(instance, { ...textDocument, fileName: 'quarterly report.txt' })).json();
      await instance.inject({ method: 'GET', url: `/convert/${jobId}?wait=2000`, headers: bearer() });

      const response = await instance.inject({ method: 'GET', url: `/convert/${jobId}/artifact`, headers: bearer() });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('application/pdf');
      expect(response.headers['content-disposition']).toBe('attachment; filename="quarterly_report.pdf"');
      expect(response.headers['x-content-sha256']).toBe(createHash('sha256').update(pdfBytes()).digest('hex'));
      expect(response.rawPayload.equals(pdfBytes())).toBe(true);
    });

    it('should answer 409 while the job is still running', async () => {
      const gate = createGate();
      const instance = await setup(gate.behaviour);
      const { jobId } = (await submit(instance, textDocument)).json();

      const response = await instance.inject({ method: 'GET', url: `/convert/${jobId}/artifact`, headers: bearer() });

      expect(response.statusCode).toBe(409);
      expect(response.json()).toMatchObject({ code: 'JOB_NOT_READY', context: { state: 'RUNNING' } });
      gate.release();
    });

    it('should answer 409 for jobs that did not succeed', async () => {
      const instance = await setup();
      const { jobId } = (await submit(instance, { templateId: 'no-such-template', targetFormat: 'pdf' })).json();
      await instance.inject({ method: 'GET', url: `/convert/${jobId}?wait=2000`, headers: bearer() });

      const response = await instance.inject({ method: 'GET', url: `/convert/${jobId}/artifact`, headers: bearer() });

      expect(response.statusCode).toBe(409);
      expect(response.json().context.state).toBe('FAILED');
    });

    it('should merge template data before conversion', async () => {
      const instance = await setup();
      const { jobId } = (
        await submit(instance, { templateId: 'greeting', data: { name: 'Ada' }, targetFormat: 'pdf' })
      ).json();
      await instance.inject({ method: 'GET', url: `/convert/${jobId}?wait=2000`, headers: bearer() });

      const response = await instance.inject({ method: 'GET', url: `/convert/${jobId}/artifact`, headers: bearer() });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-disposition']).toBe('attachment; filename="greeting.pdf"');
      const source = engine.calls[0].input.source;
      if (!Buffer.isBuffer(source)) {
        throw new Error('expected buffer input');
      }
      expect(await readDocxEntry(source)).toContain('Hello Ada');
    });
  });

  describe('DELETE /convert/:jobId', () => {
    it('should cancel a running job', async () => {
      const gate = createGate();
      const instance = await setup(gate.behaviour);
      const { jobId } = (await submit(instance, textDocument)).json();

      const response = await instance.inject({ method: 'DELETE', url: `/convert/${jobId}`, headers: bearer() });

      expect(response.statusCode).toBe(202);
      expect(response.json()).toMatchObject({ jobId, cancelled: true });

      const status = await instance.inject({ method: 'GET', url: `/convert/${jobId}?wait=2000`, headers: bearer() });
      expect(status.statusCode).toBe(200);
      expect(status.json()).toMatchObject({ state: 'CANCELLED', error: { code: 'JOB_CANCELLED' } });
    });

    it('should cancel a queued job at once', async () => {
      const gate = createGate();
      const instance = await setup(gate.behaviour, { pool: { concurrency: 1 } });
      await submit(instance, textDocument);
      const { jobId } = (await submit(instance, textDocument)).json();

      const response = await instance.inject({ method: 'DELETE', url: `/convert/${jobId}`, headers: bearer() });

      expect(response.json()).toMatchObject({ jobId, state: 'CANCELLED', cancelled: true });
      expect(engine.calls).toHaveLength(1);
      gate.release();
    });

    it('should delete a stored result', async () => {
      const instance = await setup();
      const { jobId } = (await submit(instance, textDocument)).json();
      await instance.inject({ method: 'GET', url: `/convert/${jobId}?wait=2000`, headers: bearer() });

      const response = await instance.inject({ method: 'DELETE', url: `/convert/${jobId}`, headers: bearer() });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ jobId, state: 'SUCCEEDED', deleted: true });

      const after = await instance.inject({ method: 'GET', url: `/convert/${jobId}/artifact`, headers: bearer() });
      expect(after.statusCode).toBe(404);
    });

    it('should answer 404 for unknown jobs', async () => {
      const instance = await setup();

      const response = await instance.inject({ method: 'DELETE', url: `/convert/${UNKNOWN_JOB}`, headers: bearer() });

      expect(response.statusCode).toBe(404);
    });
  });

  describe('GET /pool/stats', () => {
    it('should report scheduler and result store statistics', async () => {
      const instance = await setup();
      const { jobId } = (await submit(instance, textDocument)).json();
      await instance.inject({ method: 'GET', url: `/convert/${jobId}?wait=2000`, headers: bearer() });

      const response = await instance.inject({ method: 'GET', url: '/pool/stats', headers: bearer() });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        scheduler: { capacity: 2, activeJobs: 0, totalSubmitted: 1, succeededJobs: 1 },
        results: { storedJobs: 1, storedArtifacts: 1, currentBytes: pdfBytes().length },
      });
    });

    it('should require a bearer token', async () => {
      const instance = await setup();

      const response = await instance.inject({ method: 'GET', url: '/pool/stats' });

      expect(response.statusCode).toBe(401);
    });
  });
});

describe('artifactFileName', () => {
  const defaults = { timeoutMs: 1000, locale: 'en-US', timezone: 'UTC' };

  it('should prefer the uploaded file name', () => {
    const job = createJob(
      {
        input: { kind: 'document', bytes: Buffer.from('x'), contentType: 'text/plain', fileName: 'Q3 results.final.txt' },
        targetFormat: 'pdf',
      },
      defaults
    );

    expect(artifactFileName(job, 'pdf')).toBe('Q3_results.final.pdf');
  });

  it('should fall back to the job id', () => {
    const job = createJob(
      { input: { kind: 'document', bytes: Buffer.from('x'), contentType: 'text/plain' }, targetFormat: 'odt' },
      defaults
    );

    expect(artifactFileName(job, 'odt')).toBe(`${job.id}.odt`);
  });
});
