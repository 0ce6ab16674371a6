/**
 * File: packages/core/src/logger/context.ts
 * Purpose: AsyncLocalStorage-based context propagation for job IDs, owners and step names
 * Relationships: Provides context to all logger calls within a background job
 * Key Dependencies: async_hooks (Node.js native), factory.ts
 */

import { AsyncLocalStorage } from 'async_hooks';
import { Logger } from 'pino';
import { getLogger } from './factory.js';
import { JobContext } from './types.js';

const jobContext = new AsyncLocalStorage<JobContext>();

/**
 * Get the current job context from AsyncLocalStorage
 *
 * Returns undefined if called outside a job.
 */
export function getContext(): JobContext | undefined {
  return jobContext.getStore();
}

/**
 * Get a logger with current job context
 *
 * Returns a child logger with jobId, owner and step bindings from
 * AsyncLocalStorage. If no context is available, returns the base logger.
 *
 * @example
 * ```typescript
 * await runJob(jobId, 'alice', async () => {
 *   const logger = getContextLogger();
 *   logger.info('Opening session');  // Includes jobId + owner
 *
 *   await runStep('turn', async () => {
 *     getContextLogger().info('Streaming');  // jobId + owner + step
 *   });
 * });
 * ```
 */
export function getContextLogger(): Logger {
  const context = getContext();
  if (context) {
    return getLogger().child(context);
  }
  return getLogger();
}

/**
 * Execute a function with custom context
 *
 * Low-level API for custom context scenarios. Prefer runJob()
 * and runStep() for standard usage.
 */
export async function runWithContext<T>(
  context: JobContext,
  fn: () => Promise<T>
): Promise<T> {
  return jobContext.run(context, fn);
}

/**
 * Execute a function with job context
 *
 * All async operations within the function, including callbacks scheduled
 * from it, see the job ID through getContextLogger().
 *
 * @example
 * ```typescript
 * await runJob(randomUUID(), owner, async () => {
 *   getContextLogger().info('Job started');
 * });
 * ```
 */
export async function runJob<T>(
  jobId: string,
  owner: string | undefined,
  fn: () => Promise<T>
): Promise<T> {
  return runWithContext(owner === undefined ? { jobId } : { jobId, owner }, fn);
}

/**
 * Execute a function with step context
 *
 * Must be called within a runJob() context. Nested runStep() calls
 * replace the step name.
 *
 * @throws {Error} If called outside job context
 */
export async function runStep<T>(
  stepName: string,
  fn: () => Promise<T>
): Promise<T> {
  const context = getContext();
  if (!context) {
    throw new Error('runStep called outside job context. Must be called within runJob()');
  }

  const stepContext: JobContext = { ...context, step: stepName };
  return jobContext.run(stepContext, fn);
}
