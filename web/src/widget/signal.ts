/**
 * Fire-and-forget "please re-render" notification from the primary process to
 * the widget process. Delivery is best effort; the widget also refreshes on
 * its own timer and must never rely on a signal arriving.
 */
export interface RefreshSignal {
	reloadAllTimelines(): void
	subscribe(listener: () => void): () => void
	close(): void
}

const RELOAD_MESSAGE = 'reload-timelines'

export class BroadcastRefreshSignal implements RefreshSignal {
	private channel: BroadcastChannel | undefined

	constructor(private readonly name: string) {}

	private open(): BroadcastChannel | undefined {
		if (this.channel) return this.channel
		if (typeof BroadcastChannel === 'undefined') {
			console.warn('[Widget]', 'BroadcastChannel not available; refresh signals disabled')
			return undefined
		}
		this.channel = new BroadcastChannel(this.name)
		return this.channel
	}

	reloadAllTimelines(): void {
		const channel = this.open()
		if (!channel) return
		try {
			channel.postMessage({ type: RELOAD_MESSAGE, at: Date.now() })
		} catch (e) {
			console.warn('[Widget]', 'Refresh signal not delivered', e)
		}
	}

	subscribe(listener: () => void): () => void {
		const channel = this.open()
		if (!channel) return () => {}
		const onMessage = (event: MessageEvent<unknown>) => {
			const data = event.data
			if (typeof data === 'object' && data !== null && 'type' in data && data.type === RELOAD_MESSAGE) listener()
		}
		channel.addEventListener('message', onMessage)
		return () => channel.removeEventListener('message', onMessage)
	}

	close(): void {
		this.channel?.close()
		this.channel = undefined
	}
}

/** In-process signal; used when both sides live in the same process. */
export class LocalRefreshSignal implements RefreshSignal {
	private listeners = new Set<() => void>()

	reloadAllTimelines(): void {
		for (const listener of Array.from(this.listeners)) listener()
	}

	subscribe(listener: () => void): () => void {
		this.listeners.add(listener)
		return () => {
			this.listeners.delete(listener)
		}
	}

	close(): void {
		this.listeners.clear()
	}
}
