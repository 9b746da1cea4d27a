import { AggregateResult } from '../types/news.js'
import { errorMessage } from '../errors.js'

interface Refreshable {
	refresh(): Promise<AggregateResult>
}

/**
 * Periodically forces a fresh pipeline run. Sits outside the pipeline so callers decide the cadence.
 */
export class RefreshScheduler {
	private pipeline: Refreshable
	private intervalSeconds: number
	private timer: NodeJS.Timeout | null = null
	private running = false

	constructor(pipeline: Refreshable, intervalSeconds: number) {
		if (intervalSeconds <= 0) {
			throw new Error(`Refresh interval must be positive, got ${intervalSeconds}`)
		}
		this.pipeline = pipeline
		this.intervalSeconds = intervalSeconds
	}

	get isStarted(): boolean {
		return this.timer !== null
	}

	start(): void {
		if (this.timer) return
		this.timer = setInterval(() => {
			void this.tick()
		}, this.intervalSeconds * 1000)
		this.timer.unref()
	}

	stop(): void {
		if (!this.timer) return
		clearInterval(this.timer)
		this.timer = null
	}

	/**
	 * One refresh; skipped while the previous one is still running
	 */
	async tick(): Promise<void> {
		if (this.running) return
		this.running = true
		try {
			const result = await this.pipeline.refresh()
			console.error(`Headlines refreshed: ${result.counts.total} articles, ${result.warnings.length} warnings`)
		} catch (error) {
			console.error(`Scheduled refresh failed: ${errorMessage(error)}`)
		} finally {
			this.running = false
		}
	}
}
