import type pino from 'pino'
import { getLogger } from '../lib/logger'
import { errorMessage } from '../utils/errors'

/** One unit of permitted concurrent work. release() is safe to call more than once. */
export interface AdmissionPermit {
  release(): void
  readonly released: boolean
}

/**
 * Counting gate with a fixed capacity. tryAcquire never waits: it grants a permit or
 * returns undefined.
 */
export class AdmissionController {
  private held = 0

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Admission capacity must be a positive integer (got ${capacity})`)
    }
  }

  get inUse(): number {
    return this.held
  }

  get available(): number {
    return this.capacity - this.held
  }

  tryAcquire(): AdmissionPermit | undefined {
    if (this.held >= this.capacity) return undefined
    this.held++
    let released = false
    return {
      release: () => {
        if (released) return
        released = true
        this.held = Math.max(0, this.held - 1)
      },
      get released() {
        return released
      },
    }
  }
}

export type JobHandler<T> = (job: T) => Promise<unknown>

/**
 * Bounded worker pool whose submit step is the admission check: trySubmit either
 * starts the job (on a later tick, never inline) or refuses it at once. The permit is
 * released when the handler settles, whatever the outcome.
 */
export class WorkerPool<T> {
  private readonly admission: AdmissionController
  private readonly running = new Set<Promise<void>>()
  private readonly idleWaiters: Array<() => void> = []
  private closed = false
  private readonly log: pino.Logger

  constructor(capacity: number, private readonly handler: JobHandler<T>, logger?: pino.Logger) {
    this.admission = new AdmissionController(capacity)
    this.log = logger ?? getLogger('worker')
  }

  get capacity(): number {
    return this.admission.capacity
  }

  get inFlight(): number {
    return this.admission.inUse
  }

  get available(): number {
    return this.admission.available
  }

  get isClosed(): boolean {
    return this.closed
  }

  trySubmit(job: T): boolean {
    if (this.closed) return false
    const permit = this.admission.tryAcquire()
    if (!permit) return false

    const task = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.handler(job))
      .then(
        () => undefined,
        (err: unknown) => {
          this.log.error({ msg: 'Job handler threw', error: errorMessage(err) })
        }
      )
      .finally(() => {
        permit.release()
        this.running.delete(task)
        if (this.running.size === 0) this.notifyIdle()
      })
    this.running.add(task)
    return true
  }

  /** Resolves once no job is running. */
  onIdle(): Promise<void> {
    if (this.running.size === 0) return Promise.resolve()
    return new Promise((resolve) => this.idleWaiters.push(resolve))
  }

  /** Refuse new work and wait for in-flight jobs to finish. */
  async close(): Promise<void> {
    this.closed = true
    await this.onIdle()
  }

  private notifyIdle(): void {
    for (const resolve of this.idleWaiters.splice(0)) resolve()
  }
}
