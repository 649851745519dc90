import { describe, it, expect } from 'vitest'

import { RetryPolicy } from '../../src/functions/RetryPolicy'

describe('RetryPolicy', () => {
    it('parses the cooldown duration', () => {
        expect(new RetryPolicy({ maxRetries: 1, cooldown: '2s' }).cooldownMs).toBe(2000)
        expect(new RetryPolicy({ maxRetries: 1, cooldown: 1500 }).cooldownMs).toBe(1500)
    })

    it('rejects a negative retry budget', () => {
        expect(() => new RetryPolicy({ maxRetries: -1, cooldown: 0 })).toThrow(/non-negative integer/)
    })

    it.each(['NetworkError', 'RateLimited'] as const)('retries %s with a fixed delay while under the budget', kind => {
        const policy = new RetryPolicy({ maxRetries: 2, cooldown: '2s' })

        expect(policy.decide(kind, 0)).toEqual({ retry: true, delay: 2000, verify: false })
        expect(policy.decide(kind, 1)).toEqual({ retry: true, delay: 2000, verify: false })
        expect(policy.decide(kind, 2)).toEqual({ retry: false, delay: 0, verify: false })
    })

    it('allows exactly maxRetries + 1 attempts for a persistent network error', () => {
        const policy = new RetryPolicy({ maxRetries: 3, cooldown: 10 })
        let attempts = 0
        for (;;) {
            attempts++
            if (!policy.decide('NetworkError', attempts - 1).retry) break
        }
        expect(attempts).toBe(4)
    })

    it('sends a verification challenge through the solve flow once, outside the numeric budget', () => {
        const policy = new RetryPolicy({ maxRetries: 0, cooldown: '2s' })

        expect(policy.decide('VerificationRequired', 0)).toEqual({ retry: true, delay: 0, verify: true })
        expect(policy.decide('VerificationRequired', 5)).toEqual({ retry: true, delay: 0, verify: true })
        expect(policy.decide('VerificationRequired', 0, { verificationAttempted: true }).retry).toBe(false)
    })

    it.each(['AuthError', 'UnknownAPIError', 'VerificationUnavailable', 'VerificationRejected', 'Cancelled'] as const)('never retries %s', kind => {
        const policy = new RetryPolicy({ maxRetries: 5, cooldown: 0 })
        expect(policy.decide(kind, 0)).toEqual({ retry: false, delay: 0, verify: false })
    })
})
