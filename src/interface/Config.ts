// src/interface/Config.ts

import type { TaskKind } from './Account'

export interface Config {
    // Execution & concurrency
    execution: ConfigExecution;

    // Retry/backoff policy for a single task
    retryPolicy: ConfigRetryPolicy;

    // Networking
    network: ConfigNetwork;

    // Human-verification solving backend
    verification: ConfigVerification;

    // Logging controls
    logging: ConfigLogging;

    // Push notifications for the final report
    notifications: ConfigNotifications;

    // Local JSON report
    reports: ConfigReports;
}

/* ---------------------------
   Sub-interfaces & helpers
   --------------------------- */

export interface ConfigExecution {
    maxConcurrentAccounts: number; // accounts processed at the same time
    sleepTime: number | string; // cooldown between two tasks of the same account
    enabledTasks: TaskKind[]; // run-level filter on top of each account's tasks
}

export interface ConfigRetryPolicy {
    maxRetries: number; // retries after the first attempt (NetworkError / RateLimited)
    cooldown: number | string; // fixed delay between attempts
}

export interface ConfigNetwork {
    timeout: number | string; // applies to game APIs, verification and channels
    appVersion: string; // x-rpc-app_version
    salts: ConfigSalts; // DS signature salts
}

export interface ConfigSalts {
    ios: string; // game sign-in calls from an ios account
    android: string; // game sign-in calls from an android account, and forum missions
    record: string; // game record calls (real-time notes), second DS variant
}

export interface ConfigVerification {
    global?: boolean; // if true, ignore per-account backends
    url: string; // empty disables solving
    params?: Record<string, string>; // query parameters, `{key}` placeholders allowed
    body?: Record<string, unknown>; // JSON body, `{key}` placeholders allowed
    tokenPath?: string; // dotted path to the solved token (default data.validate)
    seccodePath?: string; // dotted path to the seccode (default data.seccode)
}

export interface ConfigLogging {
    excludeFunc: string[]; // titles to exclude from console logs
    redactSecrets: boolean; // mask cookie/token values in log lines
}

export interface ConfigReports {
    enabled: boolean;
    dir: string; // base directory, one sub-directory per day
}

export interface ConfigNotifications {
    enabled: boolean;
    errorPushOnly: boolean; // only push when something failed
    blockKeys: string[]; // words masked with * before sending
    channels: ConfigChannel[];
}

export type ConfigChannel =
    | ConfigDiscordChannel
    | ConfigNtfyChannel
    | ConfigTelegramChannel
    | ConfigDingRobotChannel
    | ConfigFeishuBotChannel
    | ConfigBarkChannel
    | ConfigGotifyChannel
    | ConfigWebhookChannel

export interface ConfigDiscordChannel {
    type: 'discord';
    url: string;
    /** Optional: custom username for webhook messages */
    username?: string;
    /** Optional: custom avatar url for webhook messages */
    avatarUrl?: string;
}

export interface ConfigNtfyChannel {
    type: 'ntfy';
    url: string;
    topic: string;
    authToken?: string; // Optional authentication token
}

export interface ConfigTelegramChannel {
    type: 'telegram';
    apiUrl?: string; // defaults to api.telegram.org
    botToken: string;
    chatId: string;
}

export interface ConfigDingRobotChannel {
    type: 'dingrobot';
    webhook: string;
    secret?: string; // enables the timestamp/sign query
}

export interface ConfigFeishuBotChannel {
    type: 'feishubot';
    webhook: string;
}

export interface ConfigBarkChannel {
    type: 'bark';
    apiUrl: string;
    token: string;
    icon?: string;
}

export interface ConfigGotifyChannel {
    type: 'gotify';
    apiUrl: string;
    token: string;
    priority?: number; // 0..10, default 5
}

export interface ConfigWebhookChannel {
    type: 'webhook';
    url: string;
    headers?: Record<string, string>;
}
