/**
 * Bulk Job Runner
 *
 * Runs CSV imports and exports as tracked background jobs:
 * PENDING -> RUNNING -> COMPLETED | FAILED, or CANCELLED on request.
 * `submit` returns as soon as the job is stored; the invocation starts on a
 * later turn of the event loop. Every submission is a new job, with no
 * deduplication by payload. Every state change is conditional on the state
 * it leaves, so terminal jobs are never rewritten.
 *
 * @example
 * ```typescript
 * const runner = new BulkJobRunner()
 * const jobId = await runner.submit('import', 'user', ctx => pipeline.run({ ...run, signal: ctx.signal }))
 * const job = await runner.status(jobId)
 * ```
 *
 * @module jobs/runner
 */

import Sqids from 'sqids'
import type { BulkJob, JobInvocation, JobKind } from '../types/jobs'
import { isTerminal } from '../types/jobs'
import { ConflictError, JobNotFoundError, wrapError } from '../errors'
import { JOB_ID_MIN_LENGTH } from '../constants'
import { getSecureRandom } from '../utils/random'
import { scopedLogger } from '../utils/logger'
import { MemoryJobStore, type JobStore } from './store'

const logger = scopedLogger('jobs')

interface RunningJob {
  readonly controller: AbortController
  readonly done: Promise<void>
}

export interface BulkJobRunnerOptions {
  store?: JobStore | undefined
  now?: (() => number) | undefined
}

export class BulkJobRunner {
  private readonly store: JobStore
  private readonly now: () => number
  private readonly sqids = new Sqids({ minLength: JOB_ID_MIN_LENGTH })
  private readonly running = new Map<string, RunningJob>()
  private sequence = 0

  constructor(options: BulkJobRunnerOptions = {}) {
    this.store = options.store ?? new MemoryJobStore()
    this.now = options.now ?? Date.now
  }

  /**
   * Store a new PENDING job and schedule its invocation
   *
   * @returns the new job id
   */
  async submit(kind: JobKind, entityType: string, invocation: JobInvocation): Promise<string> {
    const jobId = this.nextJobId()
    await this.store.save({
      jobId,
      kind,
      entityType,
      state: 'PENDING',
      result: null,
      createdAt: this.now(),
    })

    const controller = new AbortController()
    const done = new Promise<void>(resolve => setImmediate(resolve))
      .then(() => this.execute(jobId, invocation, controller.signal))
      .catch(error => {
        logger.error(`job ${jobId} could not record its outcome`, error)
      })
      .finally(() => {
        this.running.delete(jobId)
      })
    this.running.set(jobId, { controller, done })

    logger.info(`${kind} job ${jobId} submitted for ${entityType}`)
    return jobId
  }

  /**
   * @throws JobNotFoundError for an unknown or purged id
   */
  async status(jobId: string): Promise<BulkJob> {
    const job = await this.store.get(jobId)
    if (!job) {
      throw new JobNotFoundError(jobId)
    }
    return job
  }

  /**
   * Request cancellation. A pending job is cancelled at once; a running job
   * stops at the next row boundary. Terminal jobs are left as they are.
   */
  async cancel(jobId: string): Promise<BulkJob> {
    const job = await this.status(jobId)
    if (isTerminal(job.state)) return job

    this.running.get(jobId)?.controller.abort()
    if (job.state === 'PENDING') {
      return this.finish(job, { state: 'CANCELLED' })
    }
    logger.info(`job ${jobId} cancellation requested`)
    return job
  }

  /**
   * Remove a terminal job from the store
   *
   * @throws ConflictError while the job is still pending or running
   */
  async purge(jobId: string): Promise<void> {
    const job = await this.status(jobId)
    if (!isTerminal(job.state)) {
      throw new ConflictError(`Job ${jobId} is still ${job.state.toLowerCase()}`, undefined, { jobId })
    }
    await this.store.delete(jobId)
  }

  /**
   * Wait until no job is pending or running
   */
  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running.values()].map(job => job.done))
    }
  }

  // ===========================================================================
  // Execution
  // ===========================================================================

  private async execute(jobId: string, invocation: JobInvocation, signal: AbortSignal): Promise<void> {
    const pending = await this.store.get(jobId)
    // Cancelled or purged before it started
    if (!pending || pending.state !== 'PENDING' || signal.aborted) return

    const job: BulkJob = { ...pending, state: 'RUNNING', startedAt: this.now() }
    if (!(await this.store.transition('PENDING', job))) return
    if (signal.aborted) {
      // Cancelled while the start was being stored
      await this.finish(job, { state: 'CANCELLED' })
      return
    }
    logger.debug(`job ${jobId} running`)

    try {
      const result = await invocation({ jobId, signal })
      await this.finish(job, { state: signal.aborted ? 'CANCELLED' : 'COMPLETED', result })
    } catch (error) {
      const wrapped = wrapError(error, { jobId })
      logger.error(`job ${jobId} failed`, wrapped)
      await this.finish(job, { state: 'FAILED', error: wrapped.toJSON() })
    }
  }

  /**
   * Move a job to a terminal state unless another transition got there
   * first; returns the job as stored afterwards
   */
  private async finish(job: BulkJob, outcome: Pick<BulkJob, 'state'> & Partial<Pick<BulkJob, 'result' | 'error'>>): Promise<BulkJob> {
    const latest = await this.store.get(job.jobId)
    if (!latest || isTerminal(latest.state)) {
      return latest ?? job
    }
    const finished: BulkJob = {
      ...latest,
      state: outcome.state,
      result: outcome.result ?? latest.result,
      error: outcome.error,
      finishedAt: this.now(),
    }
    if (!(await this.store.transition(latest.state, finished))) {
      return (await this.store.get(job.jobId)) ?? latest
    }
    logger.info(`job ${job.jobId} ${finished.state.toLowerCase()}`)
    return finished
  }

  private nextJobId(): string {
    this.sequence++
    return this.sqids.encode([this.sequence, Math.floor(getSecureRandom() * 0xffffffff)])
  }
}
