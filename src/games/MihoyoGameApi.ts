import { createHash, randomInt } from 'crypto'

import type { Account, GameId, MissionKind } from '../interface/Account'
import type { ConfigSalts } from '../interface/Config'
import type { ApiOutcome, GameApi, GameCallContext } from '../interface/GameApi'
import type { SolvedVerification } from '../interface/Task'
import type { HttpClient } from '../util/Axios'
import { CancelledError, TaskError, classifyError } from '../util/Errors'
import { isRecord } from '../util/Load'

import { NoteKind, readGenshinNote, readStarRailNote } from './Notes'

export interface GameDefinition {
    id: GameId
    name: string
    gameBiz: string
    actId: string
    /** Value of the x-rpc-signgame header, for the luna sign events that need it */
    signGame?: string
    signUrl: string
    infoUrl: string
    forumId: number
    gid: number
    /** Game record endpoint of the real-time note, for the games that have one */
    note?: { kind: NoteKind; url: string }
}

export type ForumMission = Exclude<MissionKind, 'mission-status-query' | 'note-check'>

export interface MissionDefinition {
    key: string
    threshold: number
}

export interface ApiEndpoints {
    roles: string
    missionState: string
    postList: string
    postFull: string
    upvote: string
    share: string
}

export interface ApiCatalog {
    endpoints: ApiEndpoints
    missions: Record<ForumMission, MissionDefinition>
    games: ReadonlyMap<GameId, GameDefinition>
}

export interface MihoyoApiOptions {
    /** HTTP client for an account, so its proxy applies */
    http: (account: Account) => HttpClient
    appVersion: string
    salts: ConfigSalts
    now?: () => number
}

/**
 * Which DS variant signs a request: `game` uses the account platform's salt,
 * `forum` the android salt, `record` the second variant over query and body.
 */
export type Signing = 'game' | 'forum' | 'record'

type QueryValue = string | number | boolean

interface ApiRequest {
    url: string
    method: 'GET' | 'POST'
    signing: Signing
    params?: Record<string, QueryValue>
    data?: Record<string, unknown>
}

interface Envelope {
    retcode: number
    message: string
    data: unknown
}

interface GameRole {
    uid: string
    region: string
    nickname: string
}

const RATE_LIMIT_CODES = new Set([-110, 1008])
const AUTH_CODES = new Set([-100, 10001, -10001])
const ALREADY_SIGNED = -5003
const BBS_CAPTCHA = 1034

const DS_CHARS = 'abcdefghijklmnopqrstuvwxyz0123456789'

function randomDsPart(): string {
    let r = ''
    for (let i = 0; i < 6; i++) r += DS_CHARS[randomInt(DS_CHARS.length)] ?? 'a'
    return r
}

/** `t,r,md5(salt=…&t=…&r=…)` request signature */
export function generateDs(salt: string, t: number, r: string): string {
    const check = createHash('md5').update(`salt=${salt}&t=${t}&r=${r}`).digest('hex')
    return `${t},${r},${check}`
}

/** `t,r,md5(salt=…&t=…&r=…&b=<body>&q=<sorted query>)`, used by game record calls */
export function generateDs2(salt: string, t: number, r: number, body: string, query: string): string {
    const check = createHash('md5').update(`salt=${salt}&t=${t}&r=${r}&b=${body}&q=${query}`).digest('hex')
    return `${t},${r},${check}`
}

export function sortedQuery(params: Record<string, QueryValue> = {}): string {
    return Object.keys(params).sort().map(k => `${k}=${String(params[k])}`).join('&')
}

/** Stable uuid-shaped device id derived from the account id */
export function deriveDeviceId(accountId: string): string {
    const h = createHash('md5').update(accountId).digest('hex').toUpperCase()
    return `${h.slice(0, 8)}-${h.slice(8, 12)}-${h.slice(12, 16)}-${h.slice(16, 20)}-${h.slice(20, 32)}`
}

export function parseEnvelope(body: unknown): Envelope {
    if (!isRecord(body) || typeof body.retcode !== 'number') {
        throw new TaskError('UnknownAPIError', 'unrecognized response shape')
    }
    return { retcode: body.retcode, message: typeof body.message === 'string' ? body.message : '', data: body.data }
}

export function checkRetcode(env: Envelope, what: string): void {
    if (env.retcode === 0) return
    const detail = `${what}: retcode ${env.retcode} ${env.message}`.trim()
    if (RATE_LIMIT_CODES.has(env.retcode)) throw new TaskError('RateLimited', detail)
    if (AUTH_CODES.has(env.retcode)) throw new TaskError('AuthError', detail)
    if (env.retcode === BBS_CAPTCHA) throw new TaskError('VerificationRequired', detail)
    throw new TaskError('UnknownAPIError', detail)
}

/** A sign response can carry a geetest gate instead of a result */
export function verificationGate(data: unknown): TaskError | undefined {
    if (!isRecord(data)) return undefined
    const gt = typeof data.gt === 'string' ? data.gt : ''
    const challenge = typeof data.challenge === 'string' ? data.challenge : ''
    const riskCode = typeof data.risk_code === 'number' ? data.risk_code : 0

    if (gt && challenge) {
        return new TaskError('VerificationRequired', `verification challenge (risk code ${riskCode})`, { challenge: { gt, challenge } })
    }
    if (riskCode !== 0) {
        return new TaskError('VerificationRequired', `flagged with risk code ${riskCode} without a challenge`)
    }
    return undefined
}

function list(data: unknown, key: string): unknown[] {
    if (!isRecord(data)) return []
    const value = data[key]
    return Array.isArray(value) ? value : []
}

/**
 * Daily check-in, forum missions and the real-time note for one title, driven by its catalog entry.
 */
export class MihoyoGameApi implements GameApi {
    readonly game: GameId
    readonly name: string

    constructor(private def: GameDefinition, private catalog: ApiCatalog, private options: MihoyoApiOptions) {
        this.game = def.id
        this.name = def.name
    }

    async performSignIn(account: Account, ctx: GameCallContext = {}): Promise<ApiOutcome> {
        const roles = await this.roles(account, ctx)
        if (roles.length === 0) throw new TaskError('UnknownAPIError', `no ${this.name} role bound to this account`)

        const signed: string[] = []
        for (const role of roles) {
            const info = await this.call(account, ctx, {
                url: this.def.infoUrl,
                method: 'GET',
                signing: 'game',
                params: { act_id: this.def.actId, region: role.region, uid: role.uid }
            })
            checkRetcode(info, 'sign info')
            if (isRecord(info.data) && info.data.is_sign === true) continue

            const res = await this.call(account, ctx, {
                url: this.def.signUrl,
                method: 'POST',
                signing: 'game',
                data: { act_id: this.def.actId, region: role.region, uid: role.uid }
            })
            if (res.retcode === ALREADY_SIGNED) continue
            checkRetcode(res, 'sign')

            const gate = verificationGate(res.data)
            if (gate) throw gate

            const days = isRecord(info.data) && typeof info.data.total_sign_day === 'number' ? info.data.total_sign_day + 1 : undefined
            signed.push(days !== undefined ? `${role.nickname} (day ${days})` : role.nickname)
        }

        if (signed.length === 0) return { status: 'already-done', detail: `${roles.length} role(s) already signed today` }
        return { status: 'success', detail: `signed ${signed.join(', ')}` }
    }

    async performMission(account: Account, kind: MissionKind, ctx: GameCallContext = {}): Promise<ApiOutcome> {
        if (kind === 'note-check') return this.noteCheck(account, ctx)
        const progress = await this.missionProgress(account, ctx)

        if (kind === 'mission-status-query') {
            const parts = (['read', 'like', 'share'] as const).map(k => {
                const m = this.catalog.missions[k]
                return `${k} ${Math.min(progress.get(m.key) ?? 0, m.threshold)}/${m.threshold}`
            })
            return { status: 'success', detail: parts.join(', ') }
        }

        const mission = this.catalog.missions[kind]
        const done = progress.get(mission.key) ?? 0
        if (done >= mission.threshold) {
            return { status: 'already-done', detail: `${kind} ${mission.threshold}/${mission.threshold}` }
        }

        const remaining = mission.threshold - done
        const posts = await this.posts(account, ctx)
        if (posts.length < remaining) {
            throw new TaskError('UnknownAPIError', `only ${posts.length} post(s) found in forum ${this.def.forumId}`)
        }

        for (const postId of posts.slice(0, remaining)) {
            const env = await this.call(account, ctx, this.missionRequest(kind, postId))
            checkRetcode(env, kind)
        }
        return { status: 'success', detail: `${kind} ${remaining} post(s), ${mission.threshold}/${mission.threshold}` }
    }

    private async noteCheck(account: Account, ctx: GameCallContext): Promise<ApiOutcome> {
        const note = this.def.note
        if (!note) return { status: 'already-done', detail: `no real-time note for ${this.name}` }

        const roles = await this.roles(account, ctx)
        if (roles.length === 0) throw new TaskError('UnknownAPIError', `no ${this.name} role bound to this account`)

        const lines: string[] = []
        for (const role of roles) {
            const env = await this.call(account, ctx, {
                url: note.url,
                method: 'GET',
                signing: 'record',
                params: { role_id: role.uid, server: role.region }
            })
            checkRetcode(env, 'note')
            const gate = verificationGate(env.data)
            if (gate) throw gate

            const reading = note.kind === 'genshin'
                ? readGenshinNote(env.data, account.notes?.resinThreshold ?? 200)
                : readStarRailNote(env.data, account.notes?.staminaThreshold ?? 240)
            const alerts = reading.alerts.length ? ` [alerts: ${reading.alerts.join(', ')}]` : ''
            lines.push(`${role.nickname}: ${reading.summary}${alerts}`)
        }
        return { status: 'success', detail: lines.join('; ') }
    }

    private missionRequest(kind: ForumMission, postId: string): ApiRequest {
        const { endpoints } = this.catalog
        switch (kind) {
            case 'read':
                return { url: endpoints.postFull, method: 'GET', signing: 'forum', params: { post_id: postId } }
            case 'like':
                return { url: endpoints.upvote, method: 'POST', signing: 'forum', data: { post_id: postId, is_cancel: false } }
            case 'share':
                return { url: endpoints.share, method: 'GET', signing: 'forum', params: { entity_id: postId, entity_type: 1 } }
        }
    }

    private async roles(account: Account, ctx: GameCallContext): Promise<GameRole[]> {
        const env = await this.call(account, ctx, {
            url: this.catalog.endpoints.roles,
            method: 'GET',
            signing: 'game',
            params: { game_biz: this.def.gameBiz }
        })
        checkRetcode(env, 'game roles')

        const roles: GameRole[] = []
        for (const item of list(env.data, 'list')) {
            if (!isRecord(item)) continue
            const uid = item.game_uid
            const region = item.region
            if (typeof uid !== 'string' || typeof region !== 'string') continue
            roles.push({ uid, region, nickname: typeof item.nickname === 'string' ? item.nickname : uid })
        }
        return roles
    }

    private async missionProgress(account: Account, ctx: GameCallContext): Promise<Map<string, number>> {
        const env = await this.call(account, ctx, {
            url: this.catalog.endpoints.missionState,
            method: 'GET',
            signing: 'forum',
            params: { point_sn: 'myb' }
        })
        checkRetcode(env, 'mission state')

        const progress = new Map<string, number>()
        for (const state of list(env.data, 'states')) {
            if (!isRecord(state) || typeof state.mission_key !== 'string') continue
            progress.set(state.mission_key, typeof state.happened_times === 'number' ? state.happened_times : 0)
        }
        return progress
    }

    private async posts(account: Account, ctx: GameCallContext): Promise<string[]> {
        const env = await this.call(account, ctx, {
            url: this.catalog.endpoints.postList,
            method: 'GET',
            signing: 'forum',
            params: { forum_id: this.def.forumId, gids: this.def.gid, is_good: false, is_hot: false, page_size: 20, sort_type: 1 }
        })
        checkRetcode(env, 'post list')

        const ids: string[] = []
        for (const item of list(env.data, 'list')) {
            const post = isRecord(item) ? item.post : undefined
            if (!isRecord(post)) continue
            const id = post.post_id
            if (typeof id === 'string' || typeof id === 'number') ids.push(String(id))
        }
        return ids
    }

    private sign(account: Account, req: ApiRequest): { ds: string; clientType: string } {
        const now = this.options.now ?? Date.now
        const t = Math.floor(now() / 1000)
        const { salts } = this.options

        switch (req.signing) {
            case 'game': {
                const ios = account.platform === 'ios'
                return { ds: generateDs(ios ? salts.ios : salts.android, t, randomDsPart()), clientType: ios ? '1' : '2' }
            }
            case 'forum':
                return { ds: generateDs(salts.android, t, randomDsPart()), clientType: '2' }
            case 'record': {
                const body = req.data ? JSON.stringify(req.data) : ''
                return { ds: generateDs2(salts.record, t, randomInt(100001, 200001), body, sortedQuery(req.params)), clientType: '5' }
            }
        }
    }

    private headers(account: Account, req: ApiRequest, solved?: SolvedVerification): Record<string, string> {
        const { ds, clientType } = this.sign(account, req)
        const headers: Record<string, string> = {
            Cookie: account.cookie,
            'User-Agent': `Mozilla/5.0 (${account.platform === 'ios' ? 'iPhone; CPU iPhone OS 16_0 like Mac OS X' : 'Linux; Android 13'}) miHoYoBBS/${this.options.appVersion}`,
            Referer: 'https://act.mihoyo.com/',
            'x-rpc-app_version': this.options.appVersion,
            'x-rpc-client_type': clientType,
            'x-rpc-device_id': account.deviceId ?? deriveDeviceId(account.id),
            DS: ds
        }
        if (this.def.signGame && req.signing === 'game') headers['x-rpc-signgame'] = this.def.signGame
        if (solved) {
            headers['x-rpc-challenge'] = solved.challengeId
            headers['x-rpc-validate'] = solved.validate
            headers['x-rpc-seccode'] = solved.seccode
        }
        return headers
    }

    private async call(account: Account, ctx: GameCallContext, req: ApiRequest): Promise<Envelope> {
        if (ctx.signal?.aborted) throw new CancelledError()
        const http = this.options.http(account)
        try {
            const res = await http.request<unknown>({
                url: req.url,
                method: req.method,
                params: req.params,
                data: req.data,
                headers: this.headers(account, req, ctx.solved),
                signal: ctx.signal
            })
            return parseEnvelope(res.data)
        } catch (err) {
            if (ctx.signal?.aborted) throw new CancelledError()
            throw classifyError(err)
        }
    }
}

export default MihoyoGameApi
