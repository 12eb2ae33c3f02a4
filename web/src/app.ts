import type { AppConfig } from './config'
import { NotenbuchDB } from './db'
import { Gradebook } from './gradebook'
import { KeyValueDB, openKeyValueStore } from './kv'
import { GradingSystemMigrator } from './migration'
import type { MigrationResult } from './migration'
import { currentStartYear } from './period'
import { createAppStore } from './store'
import type { AppStore } from './store'
import { WidgetBridge } from './widget/bridge'
import { BroadcastRefreshSignal } from './widget/signal'
import type { RefreshSignal } from './widget/signal'

export interface App {
	store: AppStore
	gradebook: Gradebook
	bridge: WidgetBridge
	migration: MigrationResult
	shutdown: () => void
}

export interface BootstrapOptions {
	now?: () => Date
	/** defaults to a BroadcastChannel named after the app group */
	signal?: RefreshSignal
}

/**
 * Starts the primary process: settings migration first, then the current
 * period is resolved, computed and published once.
 */
export async function bootstrap(config: AppConfig, options: BootstrapOptions = {}): Promise<App> {
	const now = options.now ?? (() => new Date())
	const db = new NotenbuchDB(config.databaseName)
	const settings = new KeyValueDB(config.settingsDatabaseName)
	const signal = options.signal ?? new BroadcastRefreshSignal(config.appGroup)
	const shared = openKeyValueStore(config.appGroup)
	const bridge = new WidgetBridge(shared, signal, now)
	const gradebook = new Gradebook(db, now)

	const migration = await new GradingSystemMigrator(db, settings, now).migrate()

	const initialSchoolYear = await gradebook.resolveSchoolYear(currentStartYear(now()))
	const store = createAppStore({ gradebook, bridge, settings, initialSchoolYear })
	await store.getState().loadSettings()
	await store.getState().refresh()

	return {
		store,
		gradebook,
		bridge,
		migration,
		shutdown() {
			signal.close()
			db.close()
			settings.close()
			shared?.close()
		},
	}
}
