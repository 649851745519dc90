import { randomBytes } from 'crypto'

import type { Account, TaskKind } from '../interface/Account'
import type { Config } from '../interface/Config'
import type { GameApiRegistry } from '../interface/GameApi'
import type { Report, Task } from '../interface/Task'
import { toTaskRef } from '../interface/Task'
import { shortErr } from '../util/Errors'
import { Log, silentLog } from '../util/Logger'
import Util, { WaitFn } from '../util/Utils'

import { AccountTaskQueue } from './AccountTaskQueue'
import { GameTaskExecutor } from './GameTaskExecutor'
import { ResultAggregator } from './ResultAggregator'
import { RetryPolicy } from './RetryPolicy'
import type { VerificationClient } from './VerificationClient'

export interface OrchestratorDeps {
    config: Config
    games: GameApiRegistry
    verifier: Pick<VerificationClient, 'solve'>
    log?: Log
    wait?: WaitFn
    runId?: string
}

/**
 * Expand accounts into their ordered task lists: games outer, task kinds inner,
 * both in configured order, kinds filtered by the run-level selection.
 */
export function expandTasks(account: Account, enabledTaskKinds: readonly TaskKind[]): Task[] {
    const tasks: Task[] = []
    for (const game of account.games) {
        for (const kind of account.tasks) {
            if (!enabledTaskKinds.includes(kind)) continue
            tasks.push({ id: `${account.id}:${game}:${kind}`, account, game, kind, attempts: 0, state: 'pending' })
        }
    }
    return tasks
}

export class TaskOrchestrator {
    private deps: OrchestratorDeps
    private log: Log
    private executor: GameTaskExecutor
    private queue: AccountTaskQueue

    constructor(deps: OrchestratorDeps) {
        this.deps = deps
        this.log = deps.log ?? silentLog
        const wait = deps.wait ?? Util.wait

        this.executor = new GameTaskExecutor({
            games: deps.games,
            retryPolicy: new RetryPolicy(deps.config.retryPolicy),
            verifier: deps.verifier,
            log: this.log,
            wait
        })
        this.queue = new AccountTaskQueue(this.executor, Util.stringToMs(deps.config.execution.sleepTime), this.log, wait)
    }

    async run(accounts: readonly Account[], enabledTaskKinds: readonly TaskKind[] = this.deps.config.execution.enabledTasks, signal?: AbortSignal): Promise<Report> {
        const ids = new Set<string>()
        for (const account of accounts) {
            if (ids.has(account.id)) throw new Error(`duplicate account id: ${account.id}`)
            ids.add(account.id)
        }

        const aggregator = new ResultAggregator(this.deps.runId ?? randomBytes(4).toString('hex'))

        const plans = accounts.map(account => ({ account, tasks: expandTasks(account, enabledTaskKinds) }))
        aggregator.register(plans.flatMap(p => p.tasks.map(toTaskRef)))

        const total = plans.reduce((n, p) => n + p.tasks.length, 0)
        const limit = Math.max(1, Math.min(this.deps.config.execution.maxConcurrentAccounts, plans.length))
        this.log('main', 'ORCHESTRATOR', `Run ${aggregator.runId}: ${plans.length} account(s), ${total} task(s), concurrency ${limit}`)

        // bounded pool: each worker pulls the next account until none are left
        let next = 0
        const worker = async () => {
            for (;;) {
                const plan = plans[next++]
                if (!plan) return
                if (plan.tasks.length === 0) continue

                this.log(plan.account.id, 'ACCOUNT', `Starting ${plan.tasks.length} task(s)`, 'log', 'cyan')
                try {
                    const results = await this.queue.run(plan.tasks, signal, result => aggregator.add(result))
                    const failed = results.filter(r => r.outcome === 'failed').length
                    this.log(plan.account.id, 'ACCOUNT', `Finished: ${results.length - failed} ok, ${failed} failed`, failed ? 'warn' : 'log')
                } catch (err) {
                    // the account stops here; its unreported tasks fail and the worker moves on
                    const detail = `account run aborted: ${shortErr(err)}`
                    this.log(plan.account.id, 'ACCOUNT', detail, 'error')
                    for (const task of plan.tasks) {
                        if (aggregator.has(task.id)) continue
                        aggregator.add({ task: toTaskRef(task), outcome: 'failed', errorKind: 'UnknownAPIError', attempts: task.attempts, detail, durationMs: 0 })
                    }
                }
            }
        }

        const settled = await Promise.allSettled(Array.from({ length: limit }, () => worker()))
        for (const s of settled) {
            if (s.status === 'rejected') {
                this.log('main', 'ORCHESTRATOR', `Account worker crashed: ${s.reason instanceof Error ? s.reason.message : String(s.reason)}`, 'error')
            }
        }

        if (signal?.aborted) aggregator.markCancelled()
        const report = aggregator.finalize()
        const { succeeded, failed, skipped } = report.summary
        this.log('main', 'ORCHESTRATOR', `Run ${report.runId} done: ${succeeded} succeeded, ${failed} failed, ${skipped} skipped`, failed ? 'warn' : 'log', failed ? 'yellow' : 'green')
        return report
    }
}

export default TaskOrchestrator
