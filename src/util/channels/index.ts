import type { ConfigChannel } from '../../interface/Config'
import type { NotificationChannel } from '../../interface/Notification'
import type { HttpClient } from '../Axios'

import { BarkChannel } from './Bark'
import { DingRobotChannel } from './DingRobot'
import { DiscordChannel } from './Discord'
import { FeishuBotChannel } from './FeishuBot'
import { GotifyChannel } from './Gotify'
import { NtfyChannel } from './Ntfy'
import { TelegramChannel } from './Telegram'
import { WebhookChannel } from './Webhook'

export function createChannel(config: ConfigChannel, http: HttpClient): NotificationChannel {
    switch (config.type) {
        case 'discord': return new DiscordChannel(config, http)
        case 'ntfy': return new NtfyChannel(config, http)
        case 'telegram': return new TelegramChannel(config, http)
        case 'dingrobot': return new DingRobotChannel(config, http)
        case 'feishubot': return new FeishuBotChannel(config, http)
        case 'bark': return new BarkChannel(config, http)
        case 'gotify': return new GotifyChannel(config, http)
        case 'webhook': return new WebhookChannel(config, http)
    }
}

export function createChannels(configs: readonly ConfigChannel[], http: HttpClient): NotificationChannel[] {
    return configs.map(c => createChannel(c, http))
}

export { BarkChannel, DingRobotChannel, DiscordChannel, FeishuBotChannel, GotifyChannel, NtfyChannel, TelegramChannel, WebhookChannel }
