import type { ConfigVerification } from './Config'

export const GAME_IDS = [
    'GenshinImpact',
    'HonkaiImpact3',
    'HoukaiGakuen2',
    'TearsOfThemis',
    'StarRail',
    'ZenlessZoneZero'
] as const

export type GameId = typeof GAME_IDS[number]

export const TASK_KINDS = ['sign-in', 'read', 'like', 'share', 'mission-status-query', 'note-check'] as const

export type TaskKind = typeof TASK_KINDS[number]

export type MissionKind = Exclude<TaskKind, 'sign-in'>

export interface Account {
    /** Enable/disable this account (if false, account will be skipped during execution) */
    readonly enabled?: boolean;

    /** Stable identifier used in logs and in the report */
    readonly id: string;

    /** Raw cookie header for the account, opaque to everything but the game API */
    readonly cookie: string;

    /** Device platform the requests pretend to come from */
    readonly platform: 'ios' | 'android';

    /** Optional fixed device id; one is derived from the account id otherwise */
    readonly deviceId?: string;

    /** Games to check in, in execution order */
    readonly games: readonly GameId[];

    /** Task kinds enabled for this account, in execution order */
    readonly tasks: readonly TaskKind[];

    /** Real-time note alert thresholds */
    readonly notes?: AccountNoteThresholds;

    /** Optional per-account verification backend */
    readonly verification?: ConfigVerification;

    /** Proxy settings used for this account */
    readonly proxy?: AccountProxy;
}

export interface AccountNoteThresholds {
    /** Genshin resin at which the note check raises an alert (default 200) */
    resinThreshold: number;

    /** Star Rail trailblaze power at which the note check raises an alert (default 240) */
    staminaThreshold: number;
}

export interface AccountProxy {
    /** Proxy host (hostname, IP or full URL) */
    url: string;

    /** Proxy port */
    port: number;

    /** Proxy authentication password */
    password?: string;

    /** Proxy authentication username */
    username?: string;
}
