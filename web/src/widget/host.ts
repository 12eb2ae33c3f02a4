import type { RefreshSignal } from './signal'
import type { WidgetEntry, WidgetTimelineProvider } from './provider'

const LOG_PREFIX = '[WidgetHost]'

/**
 * Drives the widget process: renders on start, whenever the current timeline
 * runs out and whenever the primary process signals new data. Requests that
 * arrive while a render is running are folded into one follow-up render.
 */
export class WidgetHost {
	private timer: ReturnType<typeof setTimeout> | undefined
	private unsubscribe: (() => void) | undefined
	private rendering: Promise<void> | undefined
	private pending = false
	private running = false

	constructor(
		private readonly provider: WidgetTimelineProvider,
		private readonly signal: RefreshSignal | undefined,
		private readonly render: (entry: WidgetEntry) => void,
	) {}

	async start(): Promise<void> {
		if (this.running) return
		this.running = true
		this.unsubscribe = this.signal?.subscribe(() => {
			this.requestRefresh()
		})
		await this.refresh()
	}

	stop(): void {
		this.running = false
		this.pending = false
		if (this.timer) clearTimeout(this.timer)
		this.timer = undefined
		this.unsubscribe?.()
		this.unsubscribe = undefined
	}

	requestRefresh(): void {
		if (!this.running) return
		if (this.rendering) {
			this.pending = true
			return
		}
		this.refresh().catch((e: unknown) => console.error(LOG_PREFIX, 'Refresh failed', e))
	}

	/** Renders once; resolves after any folded-in follow-up render as well. */
	async refresh(): Promise<void> {
		if (this.rendering) {
			this.pending = true
			return this.rendering
		}
		this.rendering = this.renderLoop()
		try {
			await this.rendering
		} finally {
			this.rendering = undefined
		}
	}

	private async renderLoop(): Promise<void> {
		do {
			this.pending = false
			const timeline = await this.provider.timeline()
			if (!this.running) return
			for (const entry of timeline.entries) this.render(entry)
			this.schedule(timeline.refreshAt)
		} while (this.pending && this.running)
	}

	private schedule(at: Date) {
		if (this.timer) clearTimeout(this.timer)
		const delay = Math.max(0, at.getTime() - Date.now())
		this.timer = setTimeout(() => {
			this.timer = undefined
			this.requestRefresh()
		}, delay)
	}
}
