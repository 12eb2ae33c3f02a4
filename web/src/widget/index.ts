import type { AppConfig } from '../config'
import { openKeyValueStore } from '../kv'
import { WidgetBridge } from './bridge'
import { WidgetHost } from './host'
import { WidgetTimelineProvider } from './provider'
import type { WidgetEntry } from './provider'
import { BroadcastRefreshSignal } from './signal'
import type { RefreshSignal } from './signal'

export interface WidgetProcess {
	host: WidgetHost
	provider: WidgetTimelineProvider
	shutdown: () => void
}

/**
 * Starts the read-only widget process. It opens only the shared key/value
 * store and renders whatever snapshot it finds there.
 */
export async function startWidget(
	config: AppConfig,
	render: (entry: WidgetEntry) => void,
	signal: RefreshSignal = new BroadcastRefreshSignal(config.appGroup),
): Promise<WidgetProcess> {
	const shared = openKeyValueStore(config.appGroup)
	const bridge = new WidgetBridge(shared)
	const provider = new WidgetTimelineProvider(bridge, {
		refreshMinutes: config.widgetRefreshMinutes,
		staleAfterMinutes: config.staleAfterMinutes,
	})
	const host = new WidgetHost(provider, signal, render)
	await host.start()
	return {
		host,
		provider,
		shutdown() {
			host.stop()
			signal.close()
			shared?.close()
		},
	}
}
