import fs from 'fs'
import os from 'os'
import path from 'path'
import { afterEach, describe, it, expect, vi } from 'vitest'

import { CheckInBot, stopHandler } from '../../src/index'
import { PushNotifier } from '../../src/functions/PushNotifier'
import { TaskOrchestrator } from '../../src/functions/TaskOrchestrator'
import type { NotificationChannel, PushMessage } from '../../src/interface/Notification'
import type { SolvedVerification, VerificationChallenge } from '../../src/interface/Task'
import { TaskError } from '../../src/util/Errors'
import { silentLog } from '../../src/util/Logger'
import { ScriptedGameApi, makeAccount, makeConfig, recordingWait, registryOf } from '../helpers'

function scenario() {
    const api = new ScriptedGameApi('GenshinImpact', {
        'acc2:sign-in': [
            new TaskError('VerificationRequired', 'verification challenge (risk code 375)', { challenge: { gt: 'test-gt', challenge: 'test-challenge' } }),
            { status: 'success', detail: 'signed Traveler (day 5)' }
        ],
        'acc2:read': [new TaskError('RateLimited', 'post read: retcode -110 too many requests')]
    })
    const challenges: VerificationChallenge[] = []
    const verifier = {
        solve: async (challenge: VerificationChallenge): Promise<SolvedVerification> => {
            challenges.push(challenge)
            return { challengeId: challenge.id, validate: 'test-validate', seccode: 'test-seccode' }
        }
    }
    const { wait, delays } = recordingWait()
    const orchestrator = new TaskOrchestrator({
        config: makeConfig(),
        games: registryOf(api),
        verifier,
        wait,
        runId: 'it-run'
    })
    return { api, challenges, delays, orchestrator }
}

describe('check-in run', () => {
    it('retries, verifies and reports every task of every account', async () => {
        const { api, challenges, delays, orchestrator } = scenario()

        const report = await orchestrator.run([makeAccount('acc1'), makeAccount('acc2')], ['sign-in', 'read'])

        expect(report.summary).toEqual({ total: 4, succeeded: 3, alreadyDone: 0, failed: 1, skipped: 0 })
        expect(report.cancelled).toBe(false)

        const acc2 = report.accounts['acc2']?.GenshinImpact
        expect(acc2?.['sign-in']).toMatchObject({ outcome: 'success', attempts: 2, detail: 'signed Traveler (day 5)' })
        expect(acc2?.read).toMatchObject({ outcome: 'failed', errorKind: 'RateLimited', attempts: 3 })
        expect(report.accounts['acc1']?.GenshinImpact?.read).toMatchObject({ outcome: 'success', attempts: 1 })

        expect(challenges.map(c => c.id)).toEqual(['test-challenge'])
        const retried = api.calls.filter(c => c.accountId === 'acc2' && c.kind === 'sign-in')
        expect(retried[1]?.ctx.solved).toEqual({ challengeId: 'test-challenge', validate: 'test-validate', seccode: 'test-seccode' })

        // two cooldowns for the rate-limited read, none for verification
        expect(delays).toEqual([0, 0])
    })

    it('pushes the report to every channel even when one of them fails', async () => {
        const { orchestrator } = scenario()
        const report = await orchestrator.run([makeAccount('acc1'), makeAccount('acc2')], ['sign-in', 'read'])

        const received: PushMessage[] = []
        const channels: NotificationChannel[] = [
            { name: 'broken', send: async () => { throw new Error('connect ECONNREFUSED') } },
            { name: 'inbox', send: async message => { received.push(message) } }
        ]
        const notifier = new PushNotifier({ enabled: true, errorPushOnly: true, blockKeys: ['acc2'], channels: [] }, channels, silentLog)

        const outcomes = await notifier.notify(report)

        expect(outcomes).toEqual([
            { channel: 'broken', ok: false, error: 'connect ECONNREFUSED' },
            { channel: 'inbox', ok: true }
        ])
        expect(received).toHaveLength(1)
        expect(received[0]?.title).toBe('Check-in partially failed')
        expect(received[0]?.text).toContain('[****]')
        expect(received[0]?.text).toContain('    read failed (RateLimited): post read: retcode -110 too many requests')
    })
})

describe('CheckInBot', () => {
    let dir: string | undefined

    afterEach(() => {
        if (dir) fs.rmSync(dir, { recursive: true, force: true })
        dir = undefined
        vi.restoreAllMocks()
    })

    it('loads its files, runs and saves the report', async () => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'checkin-'))
        const configPath = path.join(dir, 'config.jsonc')
        const accountsPath = path.join(dir, 'accounts.json')
        const reportsDir = path.join(dir, 'reports')

        fs.writeFileSync(configPath, JSON.stringify({
            execution: { sleepTime: 0, enabledTasks: ['sign-in', 'share'] },
            retryPolicy: { maxRetries: 0, cooldown: 0 },
            notifications: { enabled: false },
            reports: { enabled: true, dir: reportsDir }
        }))
        fs.writeFileSync(accountsPath, JSON.stringify([
            { id: 'main', cookie: 'ltoken_v2=test-token', games: ['StarRail'], tasks: ['sign-in', 'share', 'like'] },
            { id: 'off', cookie: 'ltoken_v2=test-token', enabled: false }
        ]))

        const api = new ScriptedGameApi('StarRail', {
            'main:share': [{ status: 'already-done', detail: 'share 1/1' }]
        })
        const bot = new CheckInBot({ configPath, accountsPath, games: registryOf(api), log: silentLog })
        await bot.initialize()

        const outcome = await bot.run()

        expect(outcome.push).toEqual([])
        expect(outcome.report.results.map(r => `${r.task.id} ${r.outcome}`)).toEqual([
            'main:StarRail:sign-in success',
            'main:StarRail:share already-done'
        ])
        expect(outcome.report.summary).toEqual({ total: 2, succeeded: 2, alreadyDone: 1, failed: 0, skipped: 0 })

        const file = outcome.reportFile ?? ''
        expect(path.basename(file)).toBe(`summary_${outcome.report.runId}.json`)
        const saved: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'))
        expect(saved).toEqual(JSON.parse(JSON.stringify(outcome.report)))
    })
})

describe('stopHandler', () => {
    it('cancels on the first signal and exits on the second', () => {
        const controller = new AbortController()
        const exit = vi.fn()
        const stop = stopHandler(controller, silentLog, exit)

        stop('SIGINT')
        expect(controller.signal.aborted).toBe(true)
        expect(exit).not.toHaveBeenCalled()

        stop('SIGINT')
        expect(exit).toHaveBeenCalledWith(130)
    })
})
