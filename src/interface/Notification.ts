export type ReportStatus = 'success' | 'partial' | 'failure' | 'verification'

export interface PushMessage {
    title: string
    text: string
    status: ReportStatus
}

/** A configured push target. send() rejects when delivery fails. */
export interface NotificationChannel {
    readonly name: string
    send(message: PushMessage): Promise<void>
}

export interface ChannelOutcome {
    channel: string
    ok: boolean
    error?: string
}
