/**
 * Sentry error reporting, enabled only when SENTRY_DSN is set.
 * Env: SENTRY_DSN, SENTRY_ENV (default NODE_ENV or development), RELEASE.
 */
import * as Sentry from '@sentry/node'
import type { Express } from 'express'

const DSN = process.env.SENTRY_DSN?.trim()
const ENV = process.env.SENTRY_ENV || process.env.NODE_ENV || 'development'
const RELEASE = process.env.RELEASE || undefined

export function initSentry(): void {
  if (!DSN) return
  Sentry.init({
    dsn: DSN,
    environment: ENV,
    release: RELEASE,
    tracesSampleRate: 0,
  })
}

/** Call after all routes. No-op if SENTRY_DSN not set. */
export function setupSentryErrorHandler(app: Express): void {
  if (!DSN) return
  Sentry.setupExpressErrorHandler(app)
}

/** Capture a job failure with job_id/destination/stage tags. */
export function captureJobError(
  jobId: string,
  destinationId: string | number,
  stage: string,
  err: unknown
): void {
  if (!DSN) return
  Sentry.withScope((scope) => {
    scope.setTag('service', 'worker')
    scope.setTag('job_id', jobId)
    scope.setTag('job_stage', stage)
    scope.setTag('destination_id', String(destinationId))
    Sentry.captureException(err)
  })
}
