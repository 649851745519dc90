import type { ConfigWebhookChannel } from '../../interface/Config'
import type { NotificationChannel, PushMessage } from '../../interface/Notification'
import type { HttpClient } from '../Axios'

/** Generic JSON POST of { title, message, status } */
export class WebhookChannel implements NotificationChannel {
    readonly name = 'webhook'

    constructor(private config: ConfigWebhookChannel, private http: HttpClient) { }

    async send(message: PushMessage): Promise<void> {
        await this.http.request({
            url: this.config.url,
            method: 'POST',
            data: { title: message.title, message: message.text, status: message.status },
            headers: { 'Content-Type': 'application/json; charset=utf-8', ...(this.config.headers ?? {}) }
        })
    }
}
