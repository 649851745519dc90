import type { Task, TaskResult } from '../interface/Task'
import { toTaskRef } from '../interface/Task'
import { CancelledError } from '../util/Errors'
import { Log, silentLog } from '../util/Logger'
import Util, { WaitFn } from '../util/Utils'

import type { GameTaskExecutor } from './GameTaskExecutor'

export type ResultListener = (result: TaskResult) => void

/**
 * Runs one account's tasks strictly in order with a cooldown between them.
 * A failed task never stops the ones after it.
 */
export class AccountTaskQueue {
    private executor: Pick<GameTaskExecutor, 'execute'>
    private sleepMs: number
    private log: Log
    private wait: WaitFn

    constructor(executor: Pick<GameTaskExecutor, 'execute'>, sleepMs: number, log: Log = silentLog, wait: WaitFn = Util.wait) {
        this.executor = executor
        this.sleepMs = sleepMs
        this.log = log
        this.wait = wait
    }

    async run(tasks: readonly Task[], signal?: AbortSignal, onResult?: ResultListener): Promise<TaskResult[]> {
        const results: TaskResult[] = []
        const emit = (result: TaskResult) => {
            results.push(result)
            onResult?.(result)
        }

        let cancelled = false
        for (let i = 0; i < tasks.length; i++) {
            const task = tasks[i]
            if (!task) continue

            if (!cancelled && i > 0 && this.sleepMs > 0) {
                try {
                    await this.wait(this.sleepMs, signal)
                } catch (err) {
                    if (!(err instanceof CancelledError)) throw err
                    cancelled = true
                }
            }
            if (signal?.aborted) cancelled = true

            if (cancelled) {
                emit(skipped(task))
                continue
            }

            emit(await this.executor.execute(task, signal))
        }

        if (cancelled) {
            const count = results.filter(r => r.outcome === 'skipped').length
            this.log(tasks[0]?.account.id ?? 'main', 'QUEUE', `Run cancelled, ${count} task(s) skipped`, 'warn')
        }
        return results
    }
}

function skipped(task: Task): TaskResult {
    task.state = 'done'
    return {
        task: toTaskRef(task),
        outcome: 'skipped',
        attempts: task.attempts,
        detail: 'not started: run cancelled',
        durationMs: 0
    }
}

export default AccountTaskQueue
