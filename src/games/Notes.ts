import { isRecord } from '../util/Load'

export type NoteKind = 'genshin' | 'starrail'

export interface NoteReading {
    summary: string
    alerts: string[]
}

function num(data: Record<string, unknown>, key: string, fallback = 0): number {
    const value = data[key]
    const n = typeof value === 'string' && value.trim() ? Number(value) : value
    return typeof n === 'number' && Number.isFinite(n) ? n : fallback
}

/** Seconds until full, as `full in 2h 40m`, or `full` */
export function formatRecovery(seconds: number): string {
    if (seconds <= 0) return 'full'
    const h = Math.floor(seconds / 3600)
    const m = Math.floor((seconds % 3600) / 60)
    return `full in ${h}h ${m}m`
}

export function readGenshinNote(data: unknown, resinThreshold: number): NoteReading {
    const d = isRecord(data) ? data : {}
    const resin = num(d, 'current_resin')
    const maxResin = num(d, 'max_resin', 200) || 200
    const coin = num(d, 'current_home_coin')
    const maxCoin = num(d, 'max_home_coin')

    const alerts: string[] = []
    if (resin >= maxResin) alerts.push('resin full')
    else if (resin >= resinThreshold) alerts.push('resin at threshold')
    if (maxCoin > 0 && coin >= maxCoin) alerts.push('realm currency full')

    const summary = [
        `resin ${resin}/${maxResin} (${formatRecovery(num(d, 'resin_recovery_time'))})`,
        `commissions ${num(d, 'finished_task_num')}/${num(d, 'total_task_num', 4) || 4}`,
        `expeditions ${num(d, 'current_expedition_num')}/${num(d, 'max_expedition_num')}`,
        `realm currency ${coin}/${maxCoin}`
    ].join(', ')
    return { summary, alerts }
}

export function readStarRailNote(data: unknown, staminaThreshold: number): NoteReading {
    const d = isRecord(data) ? data : {}
    const power = num(d, 'current_stamina')
    const maxPower = num(d, 'max_stamina', 240) || 240
    const training = num(d, 'current_train_score')
    const maxTraining = num(d, 'max_train_score')
    const rogue = num(d, 'current_rogue_score')
    const maxRogue = num(d, 'max_rogue_score')
    // the live API spells it accepted_epedition_num
    const assignments = num(d, 'accepted_expedition_num', num(d, 'accepted_epedition_num'))

    const alerts: string[] = []
    if (power >= maxPower) alerts.push('power overflowing')
    else if (power >= staminaThreshold) alerts.push('power at threshold')
    if (power >= staminaThreshold && training < maxTraining) alerts.push('daily training unfinished')
    if (maxRogue > 0 && rogue < maxRogue) alerts.push('simulated universe points not maxed')

    const summary = [
        `power ${power}/${maxPower} (${formatRecovery(num(d, 'stamina_recover_time'))})`,
        `daily training ${training}/${maxTraining}`,
        `assignments ${assignments}/${num(d, 'total_expedition_num', 4)}`,
        `simulated universe ${rogue}/${maxRogue}`
    ].join(', ')
    return { summary, alerts }
}
