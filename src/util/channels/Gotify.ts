import type { ConfigGotifyChannel } from '../../interface/Config'
import type { NotificationChannel, PushMessage } from '../../interface/Notification'
import type { HttpClient } from '../Axios'

export class GotifyChannel implements NotificationChannel {
    readonly name = 'gotify'

    constructor(private config: ConfigGotifyChannel, private http: HttpClient) { }

    async send(message: PushMessage): Promise<void> {
        await this.http.request({
            url: `${this.config.apiUrl.replace(/\/+$/, '')}/message`,
            method: 'POST',
            params: { token: this.config.token },
            data: { title: message.title, message: message.text, priority: this.config.priority ?? 5 },
            headers: { 'Content-Type': 'application/json; charset=utf-8' }
        })
    }
}
