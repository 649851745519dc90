import type { ConfigNtfyChannel } from '../../interface/Config'
import type { NotificationChannel, PushMessage, ReportStatus } from '../../interface/Notification'
import type { HttpClient } from '../Axios'

const PRIORITY: Record<ReportStatus, string> = {
    success: '3',
    partial: '4',
    failure: '5',
    verification: '4'
}

const TAGS: Record<ReportStatus, string> = {
    success: 'white_check_mark',
    partial: 'warning',
    failure: 'x',
    verification: 'robot'
}

export class NtfyChannel implements NotificationChannel {
    readonly name = 'ntfy'

    constructor(private config: ConfigNtfyChannel, private http: HttpClient) { }

    async send(message: PushMessage): Promise<void> {
        const headers: Record<string, string> = {
            'Content-Type': 'text/plain; charset=utf-8',
            Title: message.title,
            Priority: PRIORITY[message.status],
            Tags: TAGS[message.status]
        }
        if (this.config.authToken) headers.Authorization = `Bearer ${this.config.authToken}`

        await this.http.request({
            url: `${this.config.url.replace(/\/+$/, '')}/${encodeURIComponent(this.config.topic)}`,
            method: 'POST',
            data: message.text,
            headers
        })
    }
}
