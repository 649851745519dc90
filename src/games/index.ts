import rawCatalog from '../data/games.json'

import type { GameId } from '../interface/Account'
import type { GameApi, GameApiRegistry } from '../interface/GameApi'
import { isGameId, isRecord } from '../util/Load'

import { ApiCatalog, ApiEndpoints, GameDefinition, MihoyoApiOptions, MihoyoGameApi, MissionDefinition } from './MihoyoGameApi'

function text(raw: Record<string, unknown>, key: string, where: string): string {
    const value = raw[key]
    if (typeof value !== 'string' || !value) throw new Error(`games catalog: ${where}.${key} must be a non-empty string`)
    return value
}

function integer(raw: Record<string, unknown>, key: string, where: string): number {
    const value = raw[key]
    if (typeof value !== 'number' || !Number.isInteger(value)) throw new Error(`games catalog: ${where}.${key} must be an integer`)
    return value
}

function note(raw: unknown, where: string): GameDefinition['note'] {
    if (raw === undefined) return undefined
    if (!isRecord(raw)) throw new Error(`games catalog: ${where} must be an object`)
    const kind = raw.kind
    if (kind !== 'genshin' && kind !== 'starrail') throw new Error(`games catalog: ${where}.kind must be genshin or starrail`)
    return { kind, url: text(raw, 'url', where) }
}

function mission(raw: unknown, where: string): MissionDefinition {
    if (!isRecord(raw)) throw new Error(`games catalog: ${where} is missing`)
    return { key: text(raw, 'key', where), threshold: integer(raw, 'threshold', where) }
}

/** Validate the static API catalog shipped in data/games.json */
export function parseCatalog(raw: unknown): ApiCatalog {
    const e = isRecord(raw) ? raw.endpoints : undefined
    const m = isRecord(raw) ? raw.missions : undefined
    const g = isRecord(raw) ? raw.games : undefined
    if (!isRecord(e) || !isRecord(m) || !isRecord(g)) {
        throw new Error('games catalog: endpoints, missions and games sections are required')
    }

    const endpoints: ApiEndpoints = {
        roles: text(e, 'roles', 'endpoints'),
        missionState: text(e, 'missionState', 'endpoints'),
        postList: text(e, 'postList', 'endpoints'),
        postFull: text(e, 'postFull', 'endpoints'),
        upvote: text(e, 'upvote', 'endpoints'),
        share: text(e, 'share', 'endpoints')
    }

    const missions = {
        read: mission(m.read, 'missions.read'),
        like: mission(m.like, 'missions.like'),
        share: mission(m.share, 'missions.share')
    }

    const games = new Map<GameId, GameDefinition>()
    for (const [id, def] of Object.entries(g)) {
        if (!isGameId(id)) throw new Error(`games catalog: unknown game "${id}"`)
        if (!isRecord(def)) throw new Error(`games catalog: games.${id} must be an object`)
        const where = `games.${id}`
        const signGame = def.signGame
        const realtime = note(def.note, `${where}.note`)
        games.set(id, {
            id,
            name: text(def, 'name', where),
            gameBiz: text(def, 'gameBiz', where),
            actId: text(def, 'actId', where),
            ...(typeof signGame === 'string' && signGame ? { signGame } : {}),
            signUrl: text(def, 'signUrl', where),
            infoUrl: text(def, 'infoUrl', where),
            forumId: integer(def, 'forumId', where),
            gid: integer(def, 'gid', where),
            ...(realtime ? { note: realtime } : {})
        })
    }

    return { endpoints, missions, games }
}

/** One GameApi per catalog entry, keyed by game id */
export function createGameApis(options: MihoyoApiOptions, catalog: ApiCatalog = parseCatalog(rawCatalog)): GameApiRegistry {
    const registry = new Map<GameId, GameApi>()
    for (const def of catalog.games.values()) {
        registry.set(def.id, new MihoyoGameApi(def, catalog, options))
    }
    return registry
}

