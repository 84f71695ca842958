/**
 * Liveness and ops endpoints. Unauthenticated: they expose no configuration values.
 */
import { Router, Request, Response } from 'express'

export const LIVENESS_TEXT = 'Hebrew subtitle bot running'

export interface PoolStats {
  readonly capacity: number
  readonly inFlight: number
  readonly available: number
}

export function createHealthRouter(pool: PoolStats): Router {
  const router = Router()

  /** GET / — static confirmation for platform health checks */
  router.get('/', (_req: Request, res: Response) => {
    res.type('text/plain').send(LIVENESS_TEXT)
  })

  /** GET /healthz — process up, no dependency check */
  router.get('/healthz', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' })
  })

  /** GET /ops/queue — job slots in use */
  router.get('/ops/queue', (_req: Request, res: Response) => {
    res.json({
      capacity: pool.capacity,
      inFlight: pool.inFlight,
      available: pool.available,
    })
  })

  return router
}
