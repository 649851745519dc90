import type { ConfigNotifications } from '../interface/Config'
import type { ChannelOutcome, NotificationChannel, PushMessage, ReportStatus } from '../interface/Notification'
import type { Report } from '../interface/Task'
import { shortErr } from '../util/Errors'
import { Log, silentLog } from '../util/Logger'

const TITLES: Record<ReportStatus, string> = {
    success: 'Check-in complete',
    partial: 'Check-in partially failed',
    failure: 'Check-in failed',
    verification: 'Check-in stopped by verification'
}

export function reportStatus(report: Report): ReportStatus {
    const { failed, succeeded, skipped } = report.summary
    if (failed === 0 && skipped === 0) return 'success'
    if (report.results.some(r => r.outcome === 'failed' && r.errorKind?.startsWith('Verification'))) return 'verification'
    if (succeeded === 0) return 'failure'
    return 'partial'
}

/**
 * Formats the final report and fans it out to every channel.
 * Channel failures end up in the returned outcomes, never thrown.
 */
export class PushNotifier {
    private config: ConfigNotifications
    private channels: readonly NotificationChannel[]
    private log: Log

    constructor(config: ConfigNotifications, channels: readonly NotificationChannel[], log: Log = silentLog) {
        this.config = config
        this.channels = channels
        this.log = log
    }

    format(report: Report): PushMessage {
        const status = reportStatus(report)
        const { total, succeeded, alreadyDone, failed, skipped } = report.summary

        const lines = [
            `Run ${report.runId}${report.cancelled ? ' (cancelled)' : ''}`,
            `Total ${total} | ok ${succeeded} (already done ${alreadyDone}) | failed ${failed} | skipped ${skipped}`
        ]
        for (const [accountId, games] of Object.entries(report.accounts)) {
            lines.push('', `[${accountId}]`)
            for (const [game, kinds] of Object.entries(games)) {
                if (!kinds) continue
                lines.push(`  ${game}`)
                for (const result of Object.values(kinds)) {
                    if (!result) continue
                    const kind = result.errorKind ? ` (${result.errorKind})` : ''
                    const detail = result.detail ? `: ${result.detail}` : ''
                    lines.push(`    ${result.task.kind} ${result.outcome}${kind}${detail}`)
                }
            }
        }

        return {
            title: this.mask(TITLES[status]),
            text: this.mask(lines.join('\n')),
            status
        }
    }

    async notify(report: Report): Promise<ChannelOutcome[]> {
        if (!this.config.enabled || this.channels.length === 0) return []
        if (this.config.errorPushOnly && report.summary.failed === 0) {
            this.log('main', 'PUSH', 'No failures, push skipped (errorPushOnly)')
            return []
        }

        const message = this.format(report)
        const settled = await Promise.allSettled(this.channels.map(c => c.send(message)))

        return settled.map((s, i) => {
            const channel = this.channels[i]?.name ?? `channel-${i}`
            if (s.status === 'fulfilled') {
                this.log('main', 'PUSH', `Delivered to ${channel}`, 'log', 'green')
                return { channel, ok: true }
            }
            const error = shortErr(s.reason)
            this.log('main', 'PUSH', `Delivery to ${channel} failed: ${error}`, 'warn')
            return { channel, ok: false, error }
        })
    }

    private mask(text: string): string {
        let out = text
        for (const key of this.config.blockKeys) {
            if (key) out = out.split(key).join('*'.repeat(key.length))
        }
        return out
    }
}

export default PushNotifier
