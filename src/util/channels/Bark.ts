import type { ConfigBarkChannel } from '../../interface/Config'
import type { NotificationChannel, PushMessage } from '../../interface/Notification'
import type { HttpClient } from '../Axios'

export class BarkChannel implements NotificationChannel {
    readonly name = 'bark'

    constructor(private config: ConfigBarkChannel, private http: HttpClient) { }

    async send(message: PushMessage): Promise<void> {
        const base = this.config.apiUrl.replace(/\/+$/, '')
        await this.http.request({
            url: `${base}/${this.config.token}/${encodeURIComponent(message.title)}/${encodeURIComponent(message.text)}`,
            method: 'GET',
            params: this.config.icon ? { icon: this.config.icon } : undefined
        })
    }
}
