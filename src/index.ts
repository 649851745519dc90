#!/usr/bin/env node
import fs from 'fs'
import path from 'path'

import { AxiosClientPool } from './util/Axios'
import { createChannels } from './util/channels'
import { shortErr } from './util/Errors'
import { isTaskKind, loadAccounts, loadConfig } from './util/Load'
import { Log, createLogger } from './util/Logger'
import Util from './util/Utils'

import { PushNotifier } from './functions/PushNotifier'
import { TaskOrchestrator } from './functions/TaskOrchestrator'
import { VerificationClient } from './functions/VerificationClient'
import { createGameApis } from './games'

import type { Account, TaskKind } from './interface/Account'
import type { Config } from './interface/Config'
import type { GameApiRegistry } from './interface/GameApi'
import type { ChannelOutcome } from './interface/Notification'
import type { Report } from './interface/Task'

export interface BotOptions {
    configPath?: string
    accountsPath?: string
    /** Run-level task selection; defaults to config.execution.enabledTasks */
    tasks?: TaskKind[]
    /** Override the game registry, mainly for embedding and tests */
    games?: GameApiRegistry
    log?: Log
}

export interface RunOutcome {
    report: Report
    push: ChannelOutcome[]
    reportFile?: string
}

/** Parse `-tasks sign-in,read` from argv */
export function parseTaskFlag(argv: readonly string[]): TaskKind[] | undefined {
    const idx = argv.indexOf('-tasks')
    if (idx < 0) return undefined
    const value = argv[idx + 1]
    if (!value || value.startsWith('-')) throw new Error('-tasks expects a comma separated list, e.g. -tasks sign-in,read')

    const kinds: TaskKind[] = []
    for (const part of value.split(',').map(s => s.trim()).filter(Boolean)) {
        if (!isTaskKind(part)) throw new Error(`Unknown task kind in -tasks: ${part}`)
        if (!kinds.includes(part)) kinds.push(part)
    }
    return kinds
}

export class CheckInBot {
    public log: Log
    public config: Config
    public configSource: string
    private options: BotOptions
    private accounts: Account[] = []

    constructor(options: BotOptions = {}) {
        this.options = options
        const { config, source } = loadConfig(options.configPath)
        this.config = config
        this.configSource = source
        this.log = options.log ?? createLogger(config.logging)
    }

    async initialize() {
        this.log('main', 'LOAD', `Using config ${this.configSource}`)
        this.accounts = loadAccounts(this.options.accountsPath, this.log)
    }

    async run(signal?: AbortSignal): Promise<RunOutcome> {
        const config = this.config
        const timeoutMs = Util.stringToMs(config.network.timeout)
        const pool = new AxiosClientPool(timeoutMs)

        const games = this.options.games ?? createGameApis({
            http: account => pool.forAccount(account),
            appVersion: config.network.appVersion,
            salts: config.network.salts
        })
        const orchestrator = new TaskOrchestrator({
            config,
            games,
            verifier: new VerificationClient(config.verification, pool.shared(), this.log),
            log: this.log
        })

        const tasks = this.options.tasks ?? config.execution.enabledTasks
        this.log('main', 'MAIN', `Bot started: ${this.accounts.length} account(s), tasks ${tasks.join(', ')}`)

        const report = await orchestrator.run(this.accounts, tasks, signal)
        const reportFile = config.reports.enabled ? this.saveReport(report) : undefined

        const notifier = new PushNotifier(config.notifications, createChannels(config.notifications.channels, pool.shared()), this.log)
        const push = await notifier.notify(report)

        return { report, push, ...(reportFile ? { reportFile } : {}) }
    }

    /** Write reports/<YYYY-MM-DD>/summary_<runId>.json; failures are logged, not raised */
    private saveReport(report: Report): string | undefined {
        try {
            const baseDir = path.resolve(process.cwd(), this.config.reports.dir, Util.formatDay(new Date(report.startedAt)))
            if (!fs.existsSync(baseDir)) fs.mkdirSync(baseDir, { recursive: true })
            const file = path.join(baseDir, `summary_${report.runId}.json`)
            fs.writeFileSync(file, JSON.stringify(report, null, 2), 'utf-8')
            this.log('main', 'REPORT', `Saved report to ${file}`)
            return file
        } catch (e) {
            this.log('main', 'REPORT', `Failed to save report: ${shortErr(e)}`, 'warn')
            return undefined
        }
    }
}

/** First signal cancels the run cooperatively; a second one exits at once with 130 */
export function stopHandler(controller: AbortController, log: Log, exit: (code: number) => void = code => process.exit(code)): (sig: string) => void {
    return sig => {
        if (controller.signal.aborted) {
            log('main', 'MAIN', `${sig} received again, exiting now`, 'warn')
            exit(130)
            return
        }
        log('main', 'MAIN', `${sig} received, finishing current calls and skipping the rest (repeat to exit now)`, 'warn')
        controller.abort()
    }
}

async function main(): Promise<number> {
    let log: Log = createLogger()
    const controller = new AbortController()

    const stop = stopHandler(controller, (...args) => log(...args))
    process.on('SIGINT', () => stop('SIGINT'))
    process.on('SIGTERM', () => stop('SIGTERM'))

    const tasks = parseTaskFlag(process.argv)
    const bot = new CheckInBot(tasks ? { tasks } : {})
    log = bot.log

    await bot.initialize()
    const { report } = await bot.run(controller.signal)

    const { succeeded, failed, skipped } = report.summary
    log('main', 'MAIN', `Completed: ${succeeded} succeeded, ${failed} failed, ${skipped} skipped`, 'log', failed ? 'yellow' : 'green')
    return 0
}

if (require.main === module) {
    main().then(code => process.exit(code)).catch(error => {
        createLogger()('main', 'MAIN-ERROR', `Fatal: ${shortErr(error)}`, 'error')
        process.exit(1)
    })
}
