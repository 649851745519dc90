import type { ConfigTelegramChannel } from '../../interface/Config'
import type { NotificationChannel, PushMessage } from '../../interface/Notification'
import type { HttpClient } from '../Axios'

export class TelegramChannel implements NotificationChannel {
    readonly name = 'telegram'

    constructor(private config: ConfigTelegramChannel, private http: HttpClient) { }

    async send(message: PushMessage): Promise<void> {
        let base = (this.config.apiUrl || 'api.telegram.org').replace(/\/+$/, '')
        if (!/^https?:\/\//i.test(base)) base = `https://${base}`

        await this.http.request({
            url: `${base}/bot${this.config.botToken}/sendMessage`,
            method: 'POST',
            data: { chat_id: this.config.chatId, text: `${message.title}\n\n${message.text}` }
        })
    }
}
