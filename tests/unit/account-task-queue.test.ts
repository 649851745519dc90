import { describe, it, expect, vi } from 'vitest'

import { AccountTaskQueue } from '../../src/functions/AccountTaskQueue'
import type { Task, TaskResult } from '../../src/interface/Task'
import { silentLog } from '../../src/util/Logger'
import Util from '../../src/util/Utils'
import { makeAccount, makeResult, makeTask, recordingWait } from '../helpers'

const account = makeAccount('a1', { games: ['GenshinImpact'], tasks: ['sign-in', 'read', 'like'] })
const tasks = (): Task[] => [
    makeTask(account, 'GenshinImpact', 'sign-in'),
    makeTask(account, 'GenshinImpact', 'read'),
    makeTask(account, 'GenshinImpact', 'like')
]

describe('AccountTaskQueue', () => {
    it('runs tasks in order with the cooldown only between them', async () => {
        const execute = vi.fn(async (task: Task): Promise<TaskResult> => makeResult(task, 'success'))
        const timing = recordingWait()
        const seen: string[] = []

        const results = await new AccountTaskQueue({ execute }, 500, silentLog, timing.wait)
            .run(tasks(), undefined, r => seen.push(r.task.kind))

        expect(results.map(r => r.task.kind)).toEqual(['sign-in', 'read', 'like'])
        expect(seen).toEqual(['sign-in', 'read', 'like'])
        expect(timing.delays).toEqual([500, 500])
    })

    it('keeps going after a failed task', async () => {
        const execute = vi.fn(async (task: Task): Promise<TaskResult> =>
            task.kind === 'sign-in' ? makeResult(task, 'failed', { errorKind: 'AuthError' }) : makeResult(task, 'success'))

        const results = await new AccountTaskQueue({ execute }, 0).run(tasks())

        expect(execute).toHaveBeenCalledTimes(3)
        expect(results.map(r => r.outcome)).toEqual(['failed', 'success', 'success'])
    })

    it('does not sleep when no cooldown is configured', async () => {
        const timing = recordingWait()
        await new AccountTaskQueue({ execute: async (task: Task) => makeResult(task, 'success') }, 0, silentLog, timing.wait).run(tasks())
        expect(timing.delays).toEqual([])
    })

    it('marks tasks that never started as skipped after cancellation', async () => {
        const controller = new AbortController()
        const execute = vi.fn(async (task: Task): Promise<TaskResult> => {
            controller.abort()
            return makeResult(task, 'success')
        })

        const results = await new AccountTaskQueue({ execute }, 10, silentLog, Util.wait).run(tasks(), controller.signal)

        expect(execute).toHaveBeenCalledTimes(1)
        expect(results.map(r => r.outcome)).toEqual(['success', 'skipped', 'skipped'])
        expect(results[1]).toMatchObject({ attempts: 0, detail: 'not started: run cancelled', durationMs: 0 })
    })
})
