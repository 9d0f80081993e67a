/**
 * Bulk job storage
 */

import type { BulkJob, JobState } from '../types/jobs'

export interface JobStore {
  get(jobId: string): Promise<BulkJob | null>
  save(job: BulkJob): Promise<void>
  /**
   * Store `job` only while the stored job is still in state `expected`
   *
   * @returns whether the job was stored
   */
  transition(expected: JobState, job: BulkJob): Promise<boolean>
  /** @returns whether a job was removed */
  delete(jobId: string): Promise<boolean>
  list(): Promise<BulkJob[]>
}

/**
 * Process-local job store. Jobs are kept until purged.
 */
export class MemoryJobStore implements JobStore {
  private jobs = new Map<string, BulkJob>()

  async get(jobId: string): Promise<BulkJob | null> {
    return this.jobs.get(jobId) ?? null
  }

  async save(job: BulkJob): Promise<void> {
    this.jobs.set(job.jobId, Object.freeze({ ...job }))
  }

  async transition(expected: JobState, job: BulkJob): Promise<boolean> {
    if (this.jobs.get(job.jobId)?.state !== expected) return false
    this.jobs.set(job.jobId, Object.freeze({ ...job }))
    return true
  }

  async delete(jobId: string): Promise<boolean> {
    return this.jobs.delete(jobId)
  }

  async list(): Promise<BulkJob[]> {
    return [...this.jobs.values()].sort((a, b) => a.createdAt - b.createdAt)
  }
}
