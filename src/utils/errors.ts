/**
 * Typed errors raised at the seams of the pipeline, plus the timeout helper used on every
 * external call a job waits on.
 */

/** Raised by loadConfig; lists every invalid or missing variable at once. */
export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`)
    this.name = 'ConfigError'
  }
}

/** ffmpeg exited non-zero, was killed, or produced no output file. */
export class RenderError extends Error {
  constructor(message: string, readonly stderr?: string) {
    super(message)
    this.name = 'RenderError'
  }
}

/** Download from or upload to the chat platform failed. */
export class TransportError extends Error {
  constructor(message: string, readonly cause?: unknown) {
    super(message)
    this.name = 'TransportError'
  }
}

export class StageTimeoutError extends Error {
  constructor(readonly label: string, readonly ms: number) {
    super(`${label} timed out after ${ms}ms`)
    this.name = 'StageTimeoutError'
  }
}

/**
 * Run a cancellable call under a time budget. ms <= 0 disables the budget.
 * On timeout the call's signal is aborted and the StageTimeoutError is thrown only once
 * the call has settled, so nothing it started outlives the caller's cleanup.
 */
export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label: string
): Promise<T> {
  const controller = new AbortController()
  const call = run(controller.signal)
  if (ms <= 0) return call

  let timer: NodeJS.Timeout | undefined
  const expired = new Promise<'expired'>((resolve) => {
    timer = setTimeout(() => resolve('expired'), ms)
  })
  try {
    const winner = await Promise.race([call.then((value) => ({ value })), expired])
    if (winner !== 'expired') return winner.value
  } finally {
    clearTimeout(timer)
  }

  const timeoutError = new StageTimeoutError(label, ms)
  controller.abort(timeoutError)
  // Outcome of the abandoned call no longer matters; the timeout is what gets reported
  await call.then(
    () => undefined,
    () => undefined
  )
  throw timeoutError
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return typeof err === 'string' ? err : 'Unknown error'
}

/** True for a Node system error (fs, child_process) with the given code. */
export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code
}
