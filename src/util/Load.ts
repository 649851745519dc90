import fs from 'fs'
import path from 'path'

import { Account, AccountNoteThresholds, AccountProxy, GAME_IDS, GameId, TASK_KINDS, TaskKind } from '../interface/Account'
import type { Config, ConfigChannel, ConfigSalts, ConfigVerification } from '../interface/Config'
import type { Log } from './Logger'
import Util from './Utils'

type RawObject = Record<string, unknown>

// Basic JSON comment stripper (supports // line and /* block */ comments while preserving strings)
export function stripJsonComments(input: string): string {
    let out = ''
    let inString = false
    let stringChar = ''
    let inLine = false
    let inBlock = false
    for (let i = 0; i < input.length; i++) {
        const ch = input.charAt(i)
        const next = input[i + 1]
        if (inLine) {
            if (ch === '\n' || ch === '\r') {
                inLine = false
                out += ch
            }
            continue
        }
        if (inBlock) {
            if (ch === '*' && next === '/') {
                inBlock = false
                i++
            }
            continue
        }
        if (inString) {
            out += ch
            if (ch === '\\') { // escape next char
                i++
                if (i < input.length) out += input[i]
                continue
            }
            if (ch === stringChar) {
                inString = false
            }
            continue
        }
        if (ch === '"' || ch === '\'') {
            inString = true
            stringChar = ch
            out += ch
            continue
        }
        if (ch === '/' && next === '/') {
            inLine = true
            i++
            continue
        }
        if (ch === '/' && next === '*') {
            inBlock = true
            i++
            continue
        }
        out += ch
    }
    return out
}

export function parseJsonc(text: string): unknown {
    return JSON.parse(stripJsonComments(text.replace(/^\uFEFF/, '')))
}

export function isRecord(value: unknown): value is RawObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function section(raw: RawObject, key: string): RawObject {
    const value = raw[key]
    return isRecord(value) ? value : {}
}

function str(value: unknown, fallback: string): string {
    return typeof value === 'string' ? value : fallback
}

function bool(value: unknown, fallback: boolean): boolean {
    return typeof value === 'boolean' ? value : fallback
}

function int(value: unknown, fallback: number, min: number): number {
    const n = typeof value === 'string' ? Number(value) : value
    return typeof n === 'number' && Number.isFinite(n) && n >= min ? Math.floor(n) : fallback
}

function duration(value: unknown, fallback: number | string): number | string {
    if (typeof value !== 'number' && typeof value !== 'string') return fallback
    try {
        Util.stringToMs(value)
        return value
    } catch {
        throw new Error(`Invalid duration in config: ${JSON.stringify(value)}`)
    }
}

function stringList(value: unknown): string[] {
    return Array.isArray(value) ? value.filter((x): x is string => typeof x === 'string') : []
}

function stringRecord(value: unknown): Record<string, string> | undefined {
    if (!isRecord(value)) return undefined
    const out: Record<string, string> = {}
    for (const [k, v] of Object.entries(value)) {
        if (typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean') out[k] = String(v)
    }
    return out
}

export function isGameId(value: unknown): value is GameId {
    const ids: readonly string[] = GAME_IDS
    return typeof value === 'string' && ids.includes(value)
}

export function isTaskKind(value: unknown): value is TaskKind {
    const kinds: readonly string[] = TASK_KINDS
    return typeof value === 'string' && kinds.includes(value)
}

function taskKinds(value: unknown, fallback: readonly TaskKind[]): TaskKind[] {
    if (!Array.isArray(value)) return [...fallback]
    const unknown = value.filter(x => !isTaskKind(x))
    if (unknown.length) throw new Error(`Unknown task kind(s): ${unknown.join(', ')}`)
    return [...new Set(value.filter(isTaskKind))]
}

function normalizeVerification(raw: unknown): ConfigVerification {
    const v = isRecord(raw) ? raw : {}
    return {
        global: bool(v.global, false),
        url: str(v.url, ''),
        params: stringRecord(v.params) ?? {},
        body: isRecord(v.body) ? v.body : { gt: '{gt}', challenge: '{challenge}' },
        tokenPath: str(v.tokenPath, 'data.validate'),
        seccodePath: str(v.seccodePath, 'data.seccode')
    }
}

// Public app salts; override in config when the app version changes
const DEFAULT_SALTS: ConfigSalts = {
    ios: '9ttJY72HxbjwWRNHJvn0n2AYue47nYsK',
    android: 'BIPaooxbWZW02fGHZL1If26mYCljPgst',
    record: 'xV8v4Qu54lUKrEYFZkJhB8cuOh9Asafs'
}

function normalizeSalts(raw: unknown): ConfigSalts {
    const v = isRecord(raw) ? raw : {}
    return {
        ios: str(v.ios, DEFAULT_SALTS.ios) || DEFAULT_SALTS.ios,
        android: str(v.android, DEFAULT_SALTS.android) || DEFAULT_SALTS.android,
        record: str(v.record, DEFAULT_SALTS.record) || DEFAULT_SALTS.record
    }
}

function normalizeNotes(raw: unknown): AccountNoteThresholds | undefined {
    if (!isRecord(raw)) return undefined
    return {
        resinThreshold: int(raw.resinThreshold, 200, 0),
        staminaThreshold: int(raw.staminaThreshold, 240, 0)
    }
}

function requireString(raw: RawObject, key: string, type: unknown): string {
    const value = raw[key]
    if (typeof value !== 'string' || !value.trim()) {
        throw new Error(`notification channel "${String(type)}" requires a non-empty "${key}"`)
    }
    return value
}

function normalizeChannel(raw: unknown): ConfigChannel {
    if (!isRecord(raw)) throw new Error('notification channel must be an object')
    const type = raw.type
    switch (type) {
        case 'discord':
            return {
                type: 'discord',
                url: requireString(raw, 'url', type),
                username: typeof raw.username === 'string' ? raw.username : undefined,
                avatarUrl: typeof raw.avatarUrl === 'string' ? raw.avatarUrl : undefined
            }
        case 'ntfy':
            return {
                type: 'ntfy',
                url: requireString(raw, 'url', type),
                topic: requireString(raw, 'topic', type),
                authToken: typeof raw.authToken === 'string' ? raw.authToken : undefined
            }
        case 'telegram':
            return {
                type: 'telegram',
                apiUrl: str(raw.apiUrl, 'api.telegram.org'),
                botToken: requireString(raw, 'botToken', type),
                chatId: requireString(raw, 'chatId', type)
            }
        case 'dingrobot':
            return {
                type: 'dingrobot',
                webhook: requireString(raw, 'webhook', type),
                secret: typeof raw.secret === 'string' && raw.secret ? raw.secret : undefined
            }
        case 'feishubot':
            return { type: 'feishubot', webhook: requireString(raw, 'webhook', type) }
        case 'bark':
            return {
                type: 'bark',
                apiUrl: requireString(raw, 'apiUrl', type),
                token: requireString(raw, 'token', type),
                icon: typeof raw.icon === 'string' ? raw.icon : undefined
            }
        case 'gotify':
            return {
                type: 'gotify',
                apiUrl: requireString(raw, 'apiUrl', type),
                token: requireString(raw, 'token', type),
                priority: Math.min(10, int(raw.priority, 5, 0))
            }
        case 'webhook':
            return { type: 'webhook', url: requireString(raw, 'url', type), headers: stringRecord(raw.headers) }
        default:
            throw new Error(`Unsupported notification channel type: ${String(type)}`)
    }
}

/** Apply defaults to a raw config object and validate the parts the run depends on */
export function normalizeConfig(raw: unknown): Config {
    if (!isRecord(raw)) throw new Error('config must be a JSON object')

    const execution = section(raw, 'execution')
    const retry = section(raw, 'retryPolicy')
    const network = section(raw, 'network')
    const logging = section(raw, 'logging')
    const notifications = section(raw, 'notifications')
    const reports = section(raw, 'reports')

    const channelsRaw = notifications.channels
    const channels = Array.isArray(channelsRaw) ? channelsRaw.map(normalizeChannel) : []

    return {
        execution: {
            maxConcurrentAccounts: int(execution.maxConcurrentAccounts, 2, 1),
            sleepTime: duration(execution.sleepTime, '2s'),
            enabledTasks: taskKinds(execution.enabledTasks, TASK_KINDS)
        },
        retryPolicy: {
            maxRetries: int(retry.maxRetries, 3, 0),
            cooldown: duration(retry.cooldown, '2s')
        },
        network: {
            timeout: duration(network.timeout, '10s'),
            appVersion: str(network.appVersion, '2.71.1'),
            salts: normalizeSalts(network.salts)
        },
        verification: normalizeVerification(raw.verification),
        logging: {
            excludeFunc: stringList(logging.excludeFunc),
            redactSecrets: bool(logging.redactSecrets, true)
        },
        notifications: {
            enabled: bool(notifications.enabled, channels.length > 0),
            errorPushOnly: bool(notifications.errorPushOnly, false),
            blockKeys: stringList(notifications.blockKeys),
            channels
        },
        reports: {
            enabled: bool(reports.enabled, true),
            dir: str(reports.dir, 'reports')
        }
    }
}

function normalizeProxy(raw: unknown): AccountProxy | undefined {
    if (!isRecord(raw) || typeof raw.url !== 'string' || !raw.url.trim()) return undefined
    return {
        url: raw.url,
        port: int(raw.port, 0, 0),
        username: typeof raw.username === 'string' ? raw.username : undefined,
        password: typeof raw.password === 'string' ? raw.password : undefined
    }
}

/**
 * Validate an accounts document (root array or `{ accounts: [] }`), drop
 * disabled accounts and unknown games, and freeze the result.
 */
export function parseAccounts(raw: unknown, log?: Log): Account[] {
    const list = Array.isArray(raw)
        ? raw
        : (isRecord(raw) && Array.isArray(raw.accounts) ? raw.accounts : null)
    if (!list) throw new Error('accounts must be an array')

    const seen = new Set<string>()
    const accounts: Account[] = []

    list.forEach((entry, index) => {
        if (!isRecord(entry) || typeof entry.id !== 'string' || !entry.id.trim() || typeof entry.cookie !== 'string') {
            throw new Error(`account #${index + 1} must have "id" and "cookie" strings`)
        }
        if (seen.has(entry.id)) throw new Error(`duplicate account id: ${entry.id}`)
        seen.add(entry.id)

        if (entry.enabled === false) {
            log?.('main', 'LOAD', `Account ${entry.id} is disabled, skipping`)
            return
        }

        const gamesRaw = Array.isArray(entry.games) ? entry.games : [...GAME_IDS]
        const games = [...new Set(gamesRaw.filter(isGameId))]
        const unknownGames = gamesRaw.filter(g => !isGameId(g))
        if (unknownGames.length) {
            log?.('main', 'LOAD', `Account ${entry.id}: ignoring unknown game(s) ${unknownGames.join(', ')}`, 'warn')
        }

        const account: Account = {
            enabled: true,
            id: entry.id,
            cookie: entry.cookie,
            platform: entry.platform === 'android' ? 'android' : 'ios',
            deviceId: typeof entry.deviceId === 'string' && entry.deviceId ? entry.deviceId : undefined,
            games: Object.freeze(games),
            tasks: Object.freeze(taskKinds(entry.tasks, TASK_KINDS)),
            notes: normalizeNotes(entry.notes),
            verification: isRecord(entry.verification) ? normalizeVerification(entry.verification) : undefined,
            proxy: normalizeProxy(entry.proxy)
        }
        accounts.push(Object.freeze(account))
    })

    return accounts
}

function findFirst(candidates: string[]): string | null {
    for (const p of candidates) {
        if (fs.existsSync(p)) return p
    }
    return null
}

/**
 * Load config.json / config.jsonc. Resolution order: explicit path, CONFIG_FILE
 * env, then the working directory and the package root.
 */
export function loadConfig(filePath?: string): { config: Config; source: string } {
    const explicit = filePath ?? process.env.CONFIG_FILE
    let cfgPath: string | null
    if (explicit) {
        cfgPath = path.isAbsolute(explicit) ? explicit : path.join(process.cwd(), explicit)
        if (!fs.existsSync(cfgPath)) throw new Error(`config file not found: ${cfgPath}`)
    } else {
        const names = ['config.jsonc', 'config.json']
        const bases = [process.cwd(), path.join(__dirname, '../../'), path.join(__dirname, '../../../')]
        const candidates = bases.flatMap(base => names.map(name => path.join(base, name)))
        cfgPath = findFirst(candidates)
        if (!cfgPath) throw new Error(`config.json not found in: ${candidates.join(' | ')}`)
    }

    const config = normalizeConfig(parseJsonc(fs.readFileSync(cfgPath, 'utf-8')))
    return { config, source: cfgPath }
}

/**
 * Load accounts supporting:
 * - ENV overrides: ACCOUNTS_JSON (raw JSON) or ACCOUNTS_FILE
 * - `-dev` CLI flag selecting accounts.dev.json
 * - .json and .jsonc extensions in the working directory or package root
 */
export function loadAccounts(filePath?: string, log?: Log): Account[] {
    const envJson = process.env.ACCOUNTS_JSON
    const envFile = filePath ?? process.env.ACCOUNTS_FILE

    let raw: string
    if (!filePath && envJson && /^[[{]/.test(envJson.trim())) {
        raw = envJson
        log?.('main', 'LOAD', 'Using accounts from ACCOUNTS_JSON')
    } else if (envFile && envFile.trim()) {
        const full = path.isAbsolute(envFile) ? envFile : path.join(process.cwd(), envFile)
        if (!fs.existsSync(full)) throw new Error(`accounts file not found: ${full}`)
        raw = fs.readFileSync(full, 'utf-8')
    } else {
        const file = process.argv.includes('-dev') ? 'accounts.dev.json' : 'accounts.json'
        const bases = [process.cwd(), path.join(__dirname, '../../'), path.join(__dirname, '../../../')]
        const candidates = bases.flatMap(base => [path.join(base, file), path.join(base, file + 'c')])
        const chosen = findFirst(candidates)
        if (!chosen) throw new Error(`accounts file not found in: ${candidates.join(' | ')}`)
        raw = fs.readFileSync(chosen, 'utf-8')
        log?.('main', 'LOAD', `Read accounts from ${chosen}`)
    }

    const accounts = parseAccounts(parseJsonc(raw), log)
    log?.('main', 'LOAD', `Loaded ${accounts.length} account(s)`)
    return accounts
}
