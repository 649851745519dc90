import chalk from 'chalk'

import type { ConfigLogging } from '../interface/Config'

export type LogType = 'log' | 'warn' | 'error'

export type LogColor = 'red' | 'green' | 'yellow' | 'blue' | 'cyan' | 'magenta' | 'gray'

/**
 * scope: account id, or 'main' for the overall runner
 * title: short title/category of the log (used for exclusion checks)
 * message: full human-readable message
 * type: 'log' | 'warn' | 'error'
 * color: optional chalk color key
 *
 * Returns an Error when type === 'error' so callers can `throw log(...)`.
 */
export type Log = (scope: string, title: string, message: string, type?: LogType, color?: LogColor) => Error | void

// cookie / token style `key=value` pairs and bearer tokens
const SECRET_PATTERN = /\b(cookie_token|cookie_token_v2|ltoken|ltoken_v2|stoken|login_ticket|account_mid_v2|token|secret|authorization)(=|:\s*)([^;&\s]+)/gi

export function redactSecrets(input: string): string {
    return input.replace(SECRET_PATTERN, (_m, key: string, sep: string, value: string) => `${key}${sep}${value.slice(0, 2)}***`)
}

/**
 * Build the run's logger. Options come from the run-scoped config, so there is
 * no process-wide logger state.
 */
export function createLogger(options: Partial<ConfigLogging> = {}): Log {
    const exclude = (options.excludeFunc ?? []).map(x => x.toLowerCase())
    const shouldRedact = options.redactSecrets !== false

    return (scope, title, message, type = 'log', color) => {
        if (exclude.includes(title.toLowerCase())) {
            return type === 'error' ? new Error(`[${title}] ${message}`) : undefined
        }

        const currentTime = new Date().toLocaleString()
        const scopeText = scope === 'main' ? 'MAIN' : scope
        const redact = (s: string) => shouldRedact ? redactSecrets(s) : s
        const cleanStr = redact(`[${currentTime}] [PID: ${process.pid}] [${type.toUpperCase()}] ${scopeText} [${title}] ${message}`)

        // Console formatting & icons
        const typeIndicator = type === 'error' ? '✗' : type === 'warn' ? '⚠' : '✓'
        const scopeColor = scope === 'main' ? chalk.cyan : chalk.magenta
        const typeColor = type === 'error' ? chalk.red : type === 'warn' ? chalk.yellow : chalk.green

        const formattedStr = [
            chalk.gray(`[${currentTime}]`),
            chalk.gray(`[${process.pid}]`),
            typeColor(typeIndicator),
            scopeColor(`[${scopeText}]`),
            chalk.bold(`[${title}]`),
            redact(message)
        ].join(' ')

        const line = color ? chalk[color](formattedStr) : formattedStr

        switch (type) {
            case 'warn':
                console.warn(line)
                break
            case 'error':
                console.error(line)
                break
            default:
                console.log(line)
                break
        }

        if (type === 'error') {
            return new Error(cleanStr)
        }
    }
}

/** Logger that drops everything, for embedding components without output */
export const silentLog: Log = (_scope, title, message, type) => {
    if (type === 'error') return new Error(`[${title}] ${message}`)
}
