import type { Account, GameId, MissionKind } from './Account'
import type { SolvedVerification } from './Task'

export type ApiOutcome =
    | { status: 'success'; detail?: string }
    | { status: 'already-done'; detail?: string }

export interface GameCallContext {
    /** Solved verification token to attach to a re-tried call */
    solved?: SolvedVerification
    signal?: AbortSignal
}

/**
 * One game's capability set. Failures are thrown as TaskError (see util/Errors)
 * carrying a classification; anything else thrown is classified by the executor.
 */
export interface GameApi {
    readonly game: GameId
    readonly name: string
    performSignIn(account: Account, ctx?: GameCallContext): Promise<ApiOutcome>
    performMission(account: Account, kind: MissionKind, ctx?: GameCallContext): Promise<ApiOutcome>
}

export type GameApiRegistry = ReadonlyMap<GameId, GameApi>
