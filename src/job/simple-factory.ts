/**
 * Job factory that dispatches on a job name carried in the task payload.
 *
 * Payloads are JSON of the form `{ "name": "<job>", "kwargs": { ... } }`.
 * Each registered job declares a zod schema for its kwargs, so a bad payload
 * is rejected before any job code runs.
 *
 * @module
 */

import { z } from 'zod';
import type { Task } from '../queue/types.js';
import { JobCreationError } from '../types/errors.js';
import { toErrorMessage } from '../utils/async.js';
import type { Job, JobFactory } from './types.js';

const JobPayloadSchema = z.object({
  name: z.string().min(1),
  kwargs: z.unknown().optional(),
});

export type JobPayload = z.infer<typeof JobPayloadSchema>;

/**
 * A registered job type with its argument validation erased, so definitions
 * with different argument types can share one registry.
 */
export interface JobDefinition {
  build(task: Task, kwargs: unknown): Job;
}

export function defineJob<TArgs>(
  schema: z.ZodType<TArgs, z.ZodTypeDef, unknown>,
  create: (task: Task, args: TArgs) => Job,
): JobDefinition {
  return {
    build(task, kwargs) {
      const parsed = schema.safeParse(kwargs);
      if (!parsed.success) {
        const reason = parsed.error.issues
          .map((issue) => `${issue.path.join('.') || 'kwargs'}: ${issue.message}`)
          .join('; ');
        throw new JobCreationError(task.id, `invalid kwargs: ${reason}`);
      }
      return create(task, parsed.data);
    },
  };
}

/**
 * Serialize a payload that {@link SimpleJobFactory} can decode.
 */
export function encodeJobData(name: string, kwargs: Record<string, unknown> = {}): string {
  return JSON.stringify({ name, kwargs });
}

export function decodeJobData(task: Task): JobPayload {
  let raw: unknown;
  try {
    raw = JSON.parse(task.encodedData);
  } catch (err) {
    throw new JobCreationError(task.id, `payload is not valid JSON (${toErrorMessage(err)})`);
  }

  const parsed = JobPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    throw new JobCreationError(task.id, 'payload must be an object with a non-empty "name"');
  }
  return parsed.data;
}

export class SimpleJobFactory implements JobFactory {
  private readonly jobs: Map<string, JobDefinition>;

  constructor(jobs: Record<string, JobDefinition> = {}) {
    this.jobs = new Map(Object.entries(jobs));
  }

  /**
   * @throws Error if a job with the same name is already registered
   */
  register(name: string, definition: JobDefinition): this {
    if (this.jobs.has(name)) {
      throw new Error(`Job already registered: ${name}`);
    }
    this.jobs.set(name, definition);
    return this;
  }

  get jobNames(): string[] {
    return [...this.jobs.keys()];
  }

  createJob(task: Task): Job {
    const payload = decodeJobData(task);
    const definition = this.jobs.get(payload.name);
    if (!definition) {
      throw new JobCreationError(task.id, `unknown job "${payload.name}"`);
    }
    return definition.build(task, payload.kwargs ?? {});
  }
}
