import type { ConfigFeishuBotChannel } from '../../interface/Config'
import type { NotificationChannel, PushMessage } from '../../interface/Notification'
import type { HttpClient } from '../Axios'

export class FeishuBotChannel implements NotificationChannel {
    readonly name = 'feishubot'

    constructor(private config: ConfigFeishuBotChannel, private http: HttpClient) { }

    async send(message: PushMessage): Promise<void> {
        const res = await this.http.request<{ code?: number; msg?: string }>({
            url: this.config.webhook,
            method: 'POST',
            data: { msg_type: 'text', content: { text: `${message.title}\n\n${message.text}` } },
            headers: { 'Content-Type': 'application/json; charset=utf-8' }
        })

        const code = res.data?.code ?? 0
        if (code !== 0) throw new Error(`feishubot rejected the message: ${code} ${res.data?.msg ?? ''}`.trim())
    }
}
