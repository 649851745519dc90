import { describe, it, expect } from 'vitest'

import { ResultAggregator } from '../../src/functions/ResultAggregator'
import { toTaskRef } from '../../src/interface/Task'
import { makeAccount, makeResult, makeTask } from '../helpers'

const a1 = makeAccount('a1')
const a2 = makeAccount('a2')
const t1 = makeTask(a1, 'GenshinImpact', 'sign-in')
const t2 = makeTask(a1, 'GenshinImpact', 'read')
const t3 = makeTask(a2, 'StarRail', 'sign-in')

describe('ResultAggregator', () => {
    it('keys results by account, game and task kind', () => {
        const aggregator = new ResultAggregator('run1', new Date('2026-01-02T03:04:05.000Z'))
        aggregator.register([t1, t2, t3].map(toTaskRef))
        aggregator.add(makeResult(t3, 'already-done'))
        aggregator.add(makeResult(t1, 'success'))
        aggregator.add(makeResult(t2, 'failed', { errorKind: 'RateLimited' }))

        const report = aggregator.finalize(new Date('2026-01-02T03:05:00.000Z'))

        expect(report.runId).toBe('run1')
        expect(report.startedAt).toBe('2026-01-02T03:04:05.000Z')
        expect(report.finishedAt).toBe('2026-01-02T03:05:00.000Z')
        expect(report.accounts.a1?.GenshinImpact?.['sign-in']?.outcome).toBe('success')
        expect(report.accounts.a1?.GenshinImpact?.read?.errorKind).toBe('RateLimited')
        expect(report.accounts.a2?.StarRail?.['sign-in']?.outcome).toBe('already-done')
        expect(report.summary).toEqual({ total: 3, succeeded: 2, alreadyDone: 1, failed: 1, skipped: 0 })
        expect(report.cancelled).toBe(false)
    })

    it('rejects a second result for the same task', () => {
        const aggregator = new ResultAggregator('run1')
        aggregator.add(makeResult(t1, 'success'))
        expect(() => aggregator.add(makeResult(t1, 'failed'))).toThrow('duplicate result for task a1:GenshinImpact:sign-in')
    })

    it('fills registered tasks that never reported with skipped results', () => {
        const aggregator = new ResultAggregator('run1')
        aggregator.register([t1, t2].map(toTaskRef))
        aggregator.add(makeResult(t1, 'success'))

        expect(aggregator.snapshot().summary.total).toBe(1)

        const report = aggregator.finalize()
        expect(report.summary).toEqual({ total: 2, succeeded: 1, alreadyDone: 0, failed: 0, skipped: 1 })
        expect(report.accounts.a1?.GenshinImpact?.read).toMatchObject({ outcome: 'skipped', attempts: 0, detail: 'no result reported' })
    })

    it('closes after finalize', () => {
        const aggregator = new ResultAggregator('run1')
        aggregator.markCancelled()
        const report = aggregator.finalize()

        expect(aggregator.finalize()).toBe(report)
        expect(report.cancelled).toBe(true)
        expect(() => aggregator.add(makeResult(t1, 'success'))).toThrow(/after the report was finalized/)
    })
})
