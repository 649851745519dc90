import { CancelledError } from './Errors'

export type WaitFn = (ms: number, signal?: AbortSignal) => Promise<void>

export default class Util {

    /**
     * Sleep for `ms`. Rejects with CancelledError as soon as `signal` aborts,
     * including when it is already aborted on entry.
     */
    static wait: WaitFn = (ms, signal) => {
        return new Promise<void>((resolve, reject) => {
            if (signal?.aborted) {
                reject(new CancelledError())
                return
            }

            const onAbort = () => {
                clearTimeout(timer)
                reject(new CancelledError())
            }
            const timer = setTimeout(() => {
                signal?.removeEventListener('abort', onAbort)
                resolve()
            }, Math.max(0, ms))

            signal?.addEventListener('abort', onAbort, { once: true })
        })
    }

    /**
     * Accepts plain milliseconds or strings like '500ms', '2s', '1.5min', '1h'.
     */
    static stringToMs(input: string | number): number {
        if (typeof input === 'number') {
            if (!Number.isFinite(input) || input < 0) throw new Error(`Invalid duration: ${input}`)
            return Math.floor(input)
        }

        const match = /^\s*(\d+(?:\.\d+)?)\s*(ms|s|sec|min|m|h)?\s*$/i.exec(input)
        if (!match || match[1] === undefined) throw new Error(`Invalid duration: ${input}`)

        const value = parseFloat(match[1])
        const unit = (match[2] ?? 'ms').toLowerCase()
        const factor: Record<string, number> = { ms: 1, s: 1000, sec: 1000, m: 60_000, min: 60_000, h: 3_600_000 }
        return Math.floor(value * (factor[unit] ?? 1))
    }

    // YYYY-MM-DD in local time
    static formatDay(date: Date): string {
        return `${date.getFullYear()}-${String(date.getMonth() + 1).padStart(2, '0')}-${String(date.getDate()).padStart(2, '0')}`
    }
}
