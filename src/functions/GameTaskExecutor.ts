import type { GameApiRegistry, GameCallContext } from '../interface/GameApi'
import type { SolvedVerification, Task, TaskResult, VerificationChallenge } from '../interface/Task'
import { toTaskRef } from '../interface/Task'
import { CancelledError, ErrorKind, TaskError, classifyError } from '../util/Errors'
import { Log, silentLog } from '../util/Logger'
import Util, { WaitFn } from '../util/Utils'

import type { RetryPolicy } from './RetryPolicy'
import type { VerificationClient } from './VerificationClient'

export interface ExecutorDeps {
    games: GameApiRegistry
    retryPolicy: RetryPolicy
    verifier: Pick<VerificationClient, 'solve'>
    log?: Log
    wait?: WaitFn
}

/**
 * Drives a single task to its terminal result. Nothing escapes execute():
 * every failure is classified and reported as a failed result.
 */
export class GameTaskExecutor {
    private deps: ExecutorDeps
    private log: Log
    private wait: WaitFn

    constructor(deps: ExecutorDeps) {
        this.deps = deps
        this.log = deps.log ?? silentLog
        this.wait = deps.wait ?? Util.wait
    }

    async execute(task: Task, signal?: AbortSignal): Promise<TaskResult> {
        const started = Date.now()
        const scope = task.account.id
        const label = `${task.game}/${task.kind}`

        const finish = (outcome: TaskResult['outcome'], detail: string, errorKind?: ErrorKind): TaskResult => {
            task.state = 'done'
            const result: TaskResult = {
                task: toTaskRef(task),
                outcome,
                attempts: task.attempts,
                detail,
                durationMs: Date.now() - started,
                ...(errorKind ? { errorKind } : {})
            }
            if (outcome === 'failed') {
                this.log(scope, 'TASK', `${label} failed after ${task.attempts} attempt(s): [${errorKind}] ${detail}`, 'warn')
            } else {
                this.log(scope, 'TASK', `${label} ${outcome}${detail ? `: ${detail}` : ''}`, 'log', 'green')
            }
            return result
        }

        const api = this.deps.games.get(task.game)
        if (!api) return finish('failed', `no API registered for game ${task.game}`, 'UnknownAPIError')

        let failures = 0
        let solved: SolvedVerification | undefined

        for (;;) {
            if (signal?.aborted) return finish('failed', 'cancelled before attempt', 'Cancelled')

            task.state = 'running'
            task.attempts++
            const ctx: GameCallContext = { signal, ...(solved ? { solved } : {}) }

            let error: TaskError
            try {
                const outcome = task.kind === 'sign-in'
                    ? await api.performSignIn(task.account, ctx)
                    : await api.performMission(task.account, task.kind, ctx)
                return finish(outcome.status, outcome.detail ?? '')
            } catch (err) {
                error = classifyError(err)
            }

            // the call after a solve gets no second chance
            if (solved) return finish('failed', `after verification: ${error.message}`, error.kind)

            const decision = this.deps.retryPolicy.decide(error.kind, failures, { verificationAttempted: solved !== undefined })
            if (!decision.retry) return finish('failed', error.message, error.kind)

            if (decision.verify) {
                if (!error.challenge) return finish('failed', 'verification required but no challenge payload', 'VerificationRequired')
                const challenge: VerificationChallenge = {
                    id: error.challenge['challenge'] ?? `${task.id}#${task.attempts}`,
                    payload: error.challenge,
                    task
                }
                try {
                    solved = await this.deps.verifier.solve(challenge, signal)
                } catch (err) {
                    if (signal?.aborted) return finish('failed', 'cancelled while solving verification', 'Cancelled')
                    const solveError = classifyError(err)
                    return finish('failed', solveError.message, solveError.kind)
                }
                continue
            }

            failures++
            task.state = 'waiting'
            this.log(scope, 'RETRY', `${label} ${error.kind}, retry ${failures}/${this.deps.retryPolicy.maxRetries} in ${decision.delay}ms`, 'warn', 'yellow')
            try {
                await this.wait(decision.delay, signal)
            } catch (err) {
                if (err instanceof CancelledError || signal?.aborted) return finish('failed', 'cancelled while waiting to retry', 'Cancelled')
                const waitError = classifyError(err)
                return finish('failed', waitError.message, waitError.kind)
            }
        }
    }
}

export default GameTaskExecutor
