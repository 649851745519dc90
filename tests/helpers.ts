import { AxiosError, AxiosRequestConfig, AxiosResponse } from 'axios'

import type { Account, GameId, MissionKind, TaskKind } from '../src/interface/Account'
import type { Config } from '../src/interface/Config'
import type { ApiOutcome, GameApi, GameCallContext } from '../src/interface/GameApi'
import type { Task, TaskResult } from '../src/interface/Task'
import { toTaskRef } from '../src/interface/Task'
import type { HttpClient } from '../src/util/Axios'
import { normalizeConfig } from '../src/util/Load'
import type { WaitFn } from '../src/util/Utils'

export function makeAccount(id: string, overrides: Partial<Account> = {}): Account {
    return {
        id,
        cookie: `ltoken_v2=test-${id}`,
        platform: 'ios',
        games: ['GenshinImpact'],
        tasks: ['sign-in', 'read'],
        ...overrides
    }
}

export function makeConfig(raw: Record<string, unknown> = {}): Config {
    return normalizeConfig({
        execution: { sleepTime: 0, maxConcurrentAccounts: 2 },
        retryPolicy: { maxRetries: 2, cooldown: 0 },
        ...raw
    })
}

export function makeTask(account: Account, game: GameId, kind: TaskKind): Task {
    return { id: `${account.id}:${game}:${kind}`, account, game, kind, attempts: 0, state: 'pending' }
}

export function makeResult(task: Task, outcome: TaskResult['outcome'], extra: Partial<TaskResult> = {}): TaskResult {
    return { task: toTaskRef(task), outcome, attempts: 1, detail: '', durationMs: 0, ...extra }
}

/** Wait that resolves immediately and remembers the requested delays */
export function recordingWait(): { wait: WaitFn; delays: number[] } {
    const delays: number[] = []
    const wait: WaitFn = async ms => {
        delays.push(ms)
    }
    return { wait, delays }
}

export type Step = ApiOutcome | Error

export interface ScriptedCall {
    accountId: string
    kind: TaskKind
    ctx: GameCallContext
}

/**
 * GameApi whose answers are scripted per `accountId:kind`. Steps are consumed in
 * order; the last one repeats. Unscripted calls succeed.
 */
export class ScriptedGameApi implements GameApi {
    readonly name: string
    readonly calls: ScriptedCall[] = []
    private script: Map<string, Step[]>

    constructor(readonly game: GameId, script: Record<string, Step[]> = {}) {
        this.name = `scripted ${game}`
        this.script = new Map(Object.entries(script).map(([k, v]) => [k, [...v]]))
    }

    async performSignIn(account: Account, ctx: GameCallContext = {}): Promise<ApiOutcome> {
        return this.next(account, 'sign-in', ctx)
    }

    async performMission(account: Account, kind: MissionKind, ctx: GameCallContext = {}): Promise<ApiOutcome> {
        return this.next(account, kind, ctx)
    }

    private next(account: Account, kind: TaskKind, ctx: GameCallContext): ApiOutcome {
        this.calls.push({ accountId: account.id, kind, ctx })
        const steps = this.script.get(`${account.id}:${kind}`)
        const step = steps && steps.length > 1 ? steps.shift() : steps?.[0]
        if (!step) return { status: 'success', detail: 'ok' }
        if (step instanceof Error) throw step
        return step
    }
}

export function registryOf(...apis: GameApi[]): ReadonlyMap<GameId, GameApi> {
    return new Map(apis.map(api => [api.game, api]))
}

/** In-process HttpClient; the handler plays the remote side */
export class FakeHttp implements HttpClient {
    readonly calls: AxiosRequestConfig[] = []

    constructor(private handler: (config: AxiosRequestConfig) => unknown = () => ({})) { }

    async request<T = unknown>(config: AxiosRequestConfig): Promise<AxiosResponse<T>> {
        this.calls.push(config)
        const data = await this.handler(config)
        return { data, status: 200, statusText: 'OK', headers: {}, config } as unknown as AxiosResponse<T>
    }
}

export function httpError(status: number): AxiosError {
    const response = { status, statusText: '', headers: {}, config: {}, data: {} } as unknown as AxiosResponse
    return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', undefined, undefined, response)
}
