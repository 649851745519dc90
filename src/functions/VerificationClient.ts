import { isAxiosError } from 'axios'

import type { ConfigVerification } from '../interface/Config'
import type { SolvedVerification, VerificationChallenge } from '../interface/Task'
import type { HttpClient } from '../util/Axios'
import { CancelledError, TaskError, shortErr } from '../util/Errors'
import { Log, silentLog } from '../util/Logger'

type Payload = Readonly<Record<string, string>>

/**
 * Adapter over an external captcha-solving HTTP service.
 * The URL, query and body templates are opaque; only `{key}` placeholders are
 * replaced with values from the challenge payload.
 */
export class VerificationClient {
    private config: ConfigVerification
    private http: HttpClient
    private log: Log

    constructor(config: ConfigVerification, http: HttpClient, log: Log = silentLog) {
        this.config = config
        this.http = http
        this.log = log
    }

    async solve(challenge: VerificationChallenge, signal?: AbortSignal): Promise<SolvedVerification> {
        if (signal?.aborted) throw new CancelledError('cancelled before solving verification')
        const backend = this.backendFor(challenge)
        const scope = challenge.task.account.id

        if (!backend.url) {
            throw new TaskError('VerificationUnavailable', 'no verification backend configured')
        }

        const url = fillTemplate(backend.url, challenge.payload)
        const params: Record<string, string> = { ...challenge.payload }
        for (const [key, value] of Object.entries(backend.params ?? {})) {
            params[key] = fillTemplate(value, challenge.payload)
        }
        const body = backend.body ? fillValue(backend.body, challenge.payload) : undefined

        this.log(scope, 'VERIFY', `Solving challenge ${challenge.id} for ${challenge.task.game}/${challenge.task.kind}`)

        let data: unknown
        try {
            const res = await this.http.request<unknown>({
                url,
                method: body === undefined ? 'GET' : 'POST',
                params,
                data: body,
                headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
                signal
            })
            data = res.data
        } catch (err) {
            if (signal?.aborted) throw new CancelledError('cancelled while solving verification')
            const status = isAxiosError(err) ? err.response?.status : undefined
            const reason = status !== undefined ? `HTTP ${status}` : shortErr(err)
            throw new TaskError('VerificationUnavailable', `verification backend failed: ${reason}`, { cause: err })
        }

        const validate = readPath(data, backend.tokenPath ?? 'data.validate')
        if (!validate) {
            throw new TaskError('VerificationRejected', 'verification backend returned no solution')
        }
        const seccode = readPath(data, backend.seccodePath ?? 'data.seccode') || `${validate}|jordan`

        this.log(scope, 'VERIFY', `Challenge ${challenge.id} solved`, 'log', 'green')
        return { challengeId: challenge.id, validate, seccode }
    }

    private backendFor(challenge: VerificationChallenge): ConfigVerification {
        const own = challenge.task.account.verification
        if (own && !this.config.global) return own
        return this.config
    }
}

export function fillTemplate(template: string, payload: Payload): string {
    return template.replace(/\{(\w+)\}/g, (match, key: string) => payload[key] ?? match)
}

function fillValue(value: unknown, payload: Payload): unknown {
    if (typeof value === 'string') return fillTemplate(value, payload)
    if (Array.isArray(value)) return value.map(v => fillValue(v, payload))
    if (typeof value === 'object' && value !== null) {
        const out: Record<string, unknown> = {}
        for (const [k, v] of Object.entries(value)) out[k] = fillValue(v, payload)
        return out
    }
    return value
}

/** Read a string (or number) at a dotted path, e.g. `data.validate` */
export function readPath(data: unknown, dotted: string): string | undefined {
    let current: unknown = data
    for (const part of dotted.split('.')) {
        if (typeof current !== 'object' || current === null || !(part in current)) return undefined
        current = Reflect.get(current, part)
    }
    if (typeof current === 'string') return current
    if (typeof current === 'number') return String(current)
    return undefined
}

export default VerificationClient
