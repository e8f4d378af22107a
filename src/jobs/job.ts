import { v4 as uuidv4 } from 'uuid';
import type {
  ConversionJob,
  ConversionRequest,
  JobErrorDetail,
  JobInput,
  JobSource,
  JobState,
  JobView,
  TerminalJobState,
} from '../types';
import { InternalError } from '../errors';

/**
 * Allowed successors of each state; terminal states have none
 */
const TRANSITIONS: Readonly<Record<JobState, readonly JobState[]>> = {
  QUEUED: ['RUNNING', 'CANCELLED'],
  RUNNING: ['SUCCEEDED', 'FAILED', 'TIMED_OUT', 'CANCELLED'],
  SUCCEEDED: [],
  FAILED: [],
  TIMED_OUT: [],
  CANCELLED: [],
};

export function isTerminal(state: JobState): state is TerminalJobState {
  return TRANSITIONS[state].length === 0;
}

export function canTransition(from: JobState, to: JobState): boolean {
  return TRANSITIONS[from].includes(to);
}

export interface JobDefaults {
  timeoutMs: number;
  locale: string;
  timezone: string;
}

/**
 * New QUEUED job for a validated request
 */
export function createJob(request: ConversionRequest, defaults: JobDefaults, now: Date = new Date()): ConversionJob {
  const id = uuidv4();
  return {
    id,
    input: describeInput(request.input),
    locale: request.locale ?? defaults.locale,
    timezone: request.timezone ?? defaults.timezone,
    targetFormat: request.targetFormat,
    timeoutMs: request.timeoutMs ?? defaults.timeoutMs,
    correlationId: request.correlationId ?? id,
    submittedAt: now,
    state: 'QUEUED',
    attempts: 0,
    startedAt: null,
    finishedAt: null,
    resultRef: null,
    error: null,
    transitions: [{ state: 'QUEUED', at: now }],
  };
}

export interface TransitionOutcome {
  resultRef?: string;
  error?: JobErrorDetail;
}

/**
 * Move a job to its next state
 *
 * Terminal states record exactly one of a result reference (SUCCEEDED) or
 * an error (everything else).
 *
 * @throws InternalError on a transition the state machine does not allow
 */
export function transition(job: ConversionJob, to: JobState, outcome: TransitionOutcome = {}, now: Date = new Date()): void {
  if (!canTransition(job.state, to)) {
    throw new InternalError(`illegal job transition ${job.state} -> ${to}`, { jobId: job.id });
  }

  if (to === 'SUCCEEDED') {
    if (!outcome.resultRef) {
      throw new InternalError('SUCCEEDED requires a result reference', { jobId: job.id });
    }
    job.resultRef = outcome.resultRef;
  } else if (isTerminal(to)) {
    if (!outcome.error || outcome.error.message === '') {
      throw new InternalError(`${to} requires an error detail`, { jobId: job.id });
    }
    job.error = outcome.error;
  }

  job.state = to;
  job.transitions.push({ state: to, at: now });
  if (to === 'RUNNING') {
    job.startedAt = now;
  }
  if (isTerminal(to)) {
    job.finishedAt = now;
  }
}

/**
 * Deep-enough copy for handing a job outside its owner
 */
export function snapshot(job: ConversionJob): ConversionJob {
  return {
    ...job,
    input: { ...job.input },
    transitions: job.transitions.map((t) => ({ ...t })),
    error: job.error ? { ...job.error } : null,
  };
}

/**
 * Byte-free reference to a request's input, as recorded on the job
 */
export function describeInput(input: JobInput): JobSource {
  if (input.kind === 'template') {
    return { kind: 'template', templateId: input.templateId };
  }
  return { kind: 'document', contentType: input.contentType, fileName: input.fileName, sizeBytes: input.bytes.length };
}

/**
 * Byte-free public view
 */
export function toJobView(job: ConversionJob): JobView {
  return {
    jobId: job.id,
    state: job.state,
    targetFormat: job.targetFormat,
    input:
      job.input.kind === 'template'
        ? { kind: 'template', templateId: job.input.templateId }
        : { kind: 'document', contentType: job.input.contentType, sizeBytes: job.input.sizeBytes },
    attempts: job.attempts,
    submittedAt: job.submittedAt.toISOString(),
    startedAt: job.startedAt ? job.startedAt.toISOString() : null,
    finishedAt: job.finishedAt ? job.finishedAt.toISOString() : null,
    resultRef: job.resultRef,
    error: job.error,
    correlationId: job.correlationId,
  };
}
