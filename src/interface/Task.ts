import type { Account, GameId, TaskKind } from './Account'
import type { ErrorKind } from '../util/Errors'

export type TaskState = 'pending' | 'running' | 'waiting' | 'done'

export type TaskOutcome = 'success' | 'already-done' | 'failed' | 'skipped'

/** One unit of work: a task kind for one game of one account */
export interface Task {
    readonly id: string
    readonly account: Account
    readonly game: GameId
    readonly kind: TaskKind
    attempts: number
    state: TaskState
}

/** Credential-free reference to a task, safe to put in reports */
export interface TaskRef {
    readonly id: string
    readonly accountId: string
    readonly game: GameId
    readonly kind: TaskKind
}

export interface TaskResult {
    readonly task: TaskRef
    readonly outcome: TaskOutcome
    readonly errorKind?: ErrorKind
    readonly attempts: number
    readonly detail: string
    readonly durationMs: number
}

export interface VerificationChallenge {
    readonly id: string
    readonly payload: Readonly<Record<string, string>>
    readonly task: Task
}

export interface SolvedVerification {
    readonly challengeId: string
    readonly validate: string
    readonly seccode: string
}

export interface ReportSummary {
    total: number
    succeeded: number
    alreadyDone: number
    failed: number
    skipped: number
}

export type ReportAccounts = Record<string, Partial<Record<GameId, Partial<Record<TaskKind, TaskResult>>>>>

export interface Report {
    readonly runId: string
    readonly startedAt: string
    readonly finishedAt: string
    readonly cancelled: boolean
    readonly accounts: ReportAccounts
    readonly results: readonly TaskResult[]
    readonly summary: ReportSummary
}

export function toTaskRef(task: Task): TaskRef {
    return { id: task.id, accountId: task.account.id, game: task.game, kind: task.kind }
}
