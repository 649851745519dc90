import { isAxiosError } from 'axios'

const ERROR_KINDS = [
    'NetworkError',
    'RateLimited',
    'AuthError',
    'VerificationRequired',
    'VerificationUnavailable',
    'VerificationRejected',
    'UnknownAPIError',
    'Cancelled'
] as const

export type ErrorKind = typeof ERROR_KINDS[number]

/**
 * Classified failure of a game API, verification or transport call.
 * `challenge` is set for VerificationRequired and holds the provider payload.
 */
export class TaskError extends Error {
    readonly kind: ErrorKind
    readonly challenge?: Readonly<Record<string, string>>

    constructor(kind: ErrorKind, message: string, options?: { challenge?: Record<string, string>; cause?: unknown }) {
        super(message, options?.cause !== undefined ? { cause: options.cause } : undefined)
        this.name = 'TaskError'
        this.kind = kind
        if (options?.challenge) this.challenge = { ...options.challenge }
    }
}

export class CancelledError extends TaskError {
    constructor(message = 'run cancelled') {
        super('Cancelled', message)
        this.name = 'CancelledError'
    }
}

const NETWORK_CODES = new Set(['ECONNREFUSED', 'ETIMEDOUT', 'ECONNRESET', 'ENOTFOUND', 'ECONNABORTED', 'EAI_AGAIN', 'EPIPE', 'ERR_NETWORK'])

/**
 * Map anything thrown by a call into the error taxonomy.
 * TaskErrors pass through untouched.
 */
export function classifyError(err: unknown): TaskError {
    if (err instanceof TaskError) return err

    if (isAxiosError(err)) {
        const status = err.response?.status
        if (status === undefined) {
            return new TaskError('NetworkError', `network: ${err.code ?? 'no response'} ${err.message}`.trim(), { cause: err })
        }
        if (status === 429) return new TaskError('RateLimited', `HTTP 429 ${err.message}`, { cause: err })
        if (status === 401 || status === 403) return new TaskError('AuthError', `HTTP ${status} ${err.message}`, { cause: err })
        if (status >= 500) return new TaskError('NetworkError', `HTTP ${status} ${err.message}`, { cause: err })
        return new TaskError('UnknownAPIError', `HTTP ${status} ${err.message}`, { cause: err })
    }

    const code = errorCode(err)
    if (code && NETWORK_CODES.has(code)) {
        return new TaskError('NetworkError', `network: ${code}`, { cause: err })
    }

    return new TaskError('UnknownAPIError', shortErr(err), { cause: err })
}

function errorCode(err: unknown): string | undefined {
    if (typeof err !== 'object' || err === null) return undefined
    if ('code' in err && typeof err.code === 'string') return err.code
    if ('cause' in err) return errorCode(err.cause)
    return undefined
}

export function shortErr(e: unknown): string {
    if (e == null) return 'unknown'
    if (e instanceof Error) return e.message.substring(0, 120)
    const s = String(e)
    return s.substring(0, 120)
}
