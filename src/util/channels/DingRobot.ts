import { createHmac } from 'crypto'

import type { ConfigDingRobotChannel } from '../../interface/Config'
import type { NotificationChannel, PushMessage } from '../../interface/Notification'
import type { HttpClient } from '../Axios'

/** `timestamp\nsecret` signed with HMAC-SHA256 keyed by the secret, base64 encoded */
export function dingSign(timestamp: string, secret: string): string {
    return createHmac('sha256', secret).update(`${timestamp}\n${secret}`).digest('base64')
}

export class DingRobotChannel implements NotificationChannel {
    readonly name = 'dingrobot'

    constructor(private config: ConfigDingRobotChannel, private http: HttpClient, private now: () => number = Date.now) { }

    async send(message: PushMessage): Promise<void> {
        let params: Record<string, string> | undefined
        if (this.config.secret) {
            const timestamp = String(this.now())
            params = { timestamp, sign: dingSign(timestamp, this.config.secret) }
        }

        const res = await this.http.request<{ errcode?: number; errmsg?: string }>({
            url: this.config.webhook,
            method: 'POST',
            params,
            data: { msgtype: 'text', text: { content: `${message.title}\n\n${message.text}` } },
            headers: { 'Content-Type': 'application/json; charset=utf-8' }
        })

        const errcode = res.data?.errcode ?? 0
        if (errcode !== 0) {
            throw new Error(`dingrobot rejected the message: ${errcode} ${res.data?.errmsg ?? ''}`.trim())
        }
    }
}
