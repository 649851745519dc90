import type { Report, ReportAccounts, ReportSummary, TaskRef, TaskResult } from '../interface/Task'

/**
 * Collects task results as they stream in, in any interleaving across accounts.
 * Appends happen on the event loop, so no locking is involved.
 */
export class ResultAggregator {
    readonly runId: string
    private startedAt: Date
    private expected = new Map<string, TaskRef>()
    private results = new Map<string, TaskResult>()
    private finalized?: Report
    private cancelled = false

    constructor(runId: string, startedAt: Date = new Date()) {
        this.runId = runId
        this.startedAt = startedAt
    }

    /** Declare the tasks of the run so none can go missing from the report */
    register(tasks: readonly TaskRef[]): void {
        for (const task of tasks) this.expected.set(task.id, task)
    }

    add(result: TaskResult): void {
        if (this.finalized) throw new Error(`result for ${result.task.id} arrived after the report was finalized`)
        if (this.results.has(result.task.id)) throw new Error(`duplicate result for task ${result.task.id}`)
        this.results.set(result.task.id, result)
    }

    has(taskId: string): boolean {
        return this.results.has(taskId)
    }

    markCancelled(): void {
        this.cancelled = true
    }

    /** Report of what has arrived so far; does not close the aggregator */
    snapshot(finishedAt: Date = new Date()): Report {
        return buildReport(this.runId, this.startedAt, finishedAt, this.cancelled, [...this.results.values()])
    }

    finalize(finishedAt: Date = new Date()): Report {
        if (this.finalized) return this.finalized

        for (const [id, task] of this.expected) {
            if (this.results.has(id)) continue
            this.results.set(id, { task, outcome: 'skipped', attempts: 0, detail: 'no result reported', durationMs: 0 })
        }

        this.finalized = this.snapshot(finishedAt)
        return this.finalized
    }
}

export function summarize(results: readonly TaskResult[]): ReportSummary {
    const summary: ReportSummary = { total: results.length, succeeded: 0, alreadyDone: 0, failed: 0, skipped: 0 }
    for (const r of results) {
        switch (r.outcome) {
            case 'success':
                summary.succeeded++
                break
            case 'already-done':
                summary.succeeded++
                summary.alreadyDone++
                break
            case 'failed':
                summary.failed++
                break
            case 'skipped':
                summary.skipped++
                break
        }
    }
    return summary
}

function buildReport(runId: string, startedAt: Date, finishedAt: Date, cancelled: boolean, results: TaskResult[]): Report {
    const accounts: ReportAccounts = {}
    for (const r of results) {
        const games = accounts[r.task.accountId] ?? (accounts[r.task.accountId] = {})
        const kinds = games[r.task.game] ?? (games[r.task.game] = {})
        kinds[r.task.kind] = r
    }

    return {
        runId,
        startedAt: startedAt.toISOString(),
        finishedAt: finishedAt.toISOString(),
        cancelled,
        accounts,
        results,
        summary: summarize(results)
    }
}

export default ResultAggregator
