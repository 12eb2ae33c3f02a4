export interface AppConfig {
	databaseName: string
	settingsDatabaseName: string
	/** name of the key/value database both processes open */
	appGroup: string
	widgetRefreshMinutes: number
	staleAfterMinutes: number
}

export const DEFAULT_CONFIG: AppConfig = {
	databaseName: 'NotenbuchDB',
	settingsDatabaseName: 'NotenbuchSettings',
	appGroup: 'group.notenbuch.shared',
	widgetRefreshMinutes: 60,
	staleAfterMinutes: 24 * 60,
}

type Env = Record<string, string | undefined>

function readString(env: Env, key: string, fallback: string): string {
	const raw = env[key]?.trim()
	return raw ? raw : fallback
}

function readPositiveNumber(env: Env, key: string, fallback: number): number {
	const raw = env[key]?.trim()
	if (!raw) return fallback
	const value = Number(raw)
	if (!Number.isFinite(value) || value <= 0) {
		console.warn('[Config]', 'Ignoring invalid value', { key, raw, fallback })
		return fallback
	}
	return value
}

export function loadConfig(env: Env = process.env): AppConfig {
	return {
		databaseName: readString(env, 'NOTENBUCH_DB_NAME', DEFAULT_CONFIG.databaseName),
		settingsDatabaseName: readString(env, 'NOTENBUCH_SETTINGS_DB_NAME', DEFAULT_CONFIG.settingsDatabaseName),
		appGroup: readString(env, 'NOTENBUCH_APP_GROUP', DEFAULT_CONFIG.appGroup),
		widgetRefreshMinutes: readPositiveNumber(env, 'NOTENBUCH_WIDGET_REFRESH_MINUTES', DEFAULT_CONFIG.widgetRefreshMinutes),
		staleAfterMinutes: readPositiveNumber(env, 'NOTENBUCH_STALE_AFTER_MINUTES', DEFAULT_CONFIG.staleAfterMinutes),
	}
}
