import type { ConfigDiscordChannel } from '../../interface/Config'
import type { NotificationChannel, PushMessage, ReportStatus } from '../../interface/Notification'
import type { HttpClient } from '../Axios'

const MAX_EMBED_LENGTH = 4000
const DEFAULT_USERNAME = 'Check-in Report'

const STATUS_COLORS: Record<ReportStatus, number> = {
    success: 0x2ECC71,
    partial: 0xE67E22,
    failure: 0xE74C3C,
    verification: 0xF1C40F
}

export class DiscordChannel implements NotificationChannel {
    readonly name = 'discord'

    constructor(private config: ConfigDiscordChannel, private http: HttpClient) { }

    async send(message: PushMessage): Promise<void> {
        // embed payload with username and avatar
        const payload = {
            username: this.config.username || DEFAULT_USERNAME,
            ...(this.config.avatarUrl ? { avatar_url: this.config.avatarUrl } : {}),
            embeds: [{
                title: message.title,
                description: `\`\`\`\n${message.text.slice(0, MAX_EMBED_LENGTH)}\n\`\`\``,
                color: STATUS_COLORS[message.status],
                timestamp: new Date().toISOString()
            }]
        }

        await this.http.request({
            url: this.config.url,
            method: 'POST',
            data: payload,
            headers: { 'Content-Type': 'application/json' }
        })
    }
}
