import type { ConfigRetryPolicy } from '../interface/Config'
import type { ErrorKind } from '../util/Errors'
import Util from '../util/Utils'

export interface RetryDecision {
    retry: boolean
    /** Milliseconds to wait before the next attempt */
    delay: number
    /** The next attempt must go through the verification flow first */
    verify: boolean
}

export interface RetryContext {
    /** A verification round-trip already happened for this task */
    verificationAttempted?: boolean
}

const STOP: RetryDecision = { retry: false, delay: 0, verify: false }

export class RetryPolicy {
    readonly maxRetries: number
    readonly cooldownMs: number

    constructor(options: ConfigRetryPolicy) {
        if (!Number.isInteger(options.maxRetries) || options.maxRetries < 0) {
            throw new Error(`retryPolicy.maxRetries must be a non-negative integer, got ${options.maxRetries}`)
        }
        this.maxRetries = options.maxRetries
        this.cooldownMs = Util.stringToMs(options.cooldown)
    }

    /**
     * attemptNumber is the zero-based index of the attempt that just failed.
     * Transient errors retry while attemptNumber < maxRetries with a fixed delay.
     */
    decide(errorKind: ErrorKind, attemptNumber: number, context: RetryContext = {}): RetryDecision {
        switch (errorKind) {
            case 'NetworkError':
            case 'RateLimited':
                if (attemptNumber < this.maxRetries) {
                    return { retry: true, delay: this.cooldownMs, verify: false }
                }
                return STOP

            case 'VerificationRequired':
                // one solve per task, outside the numeric budget
                if (context.verificationAttempted) return STOP
                return { retry: true, delay: 0, verify: true }

            case 'AuthError':
            case 'UnknownAPIError':
            case 'VerificationUnavailable':
            case 'VerificationRejected':
            case 'Cancelled':
                return STOP
        }
    }
}

export default RetryPolicy
