import { afterEach, describe, expect, it, vi } from 'vitest'
import { DEFAULT_CONFIG, loadConfig } from './config'

describe('loadConfig', () => {
	afterEach(() => {
		vi.restoreAllMocks()
	})

	it('uses defaults for an empty environment', () => {
		expect(loadConfig({})).toEqual({
			databaseName: 'NotenbuchDB',
			settingsDatabaseName: 'NotenbuchSettings',
			appGroup: 'group.notenbuch.shared',
			widgetRefreshMinutes: 60,
			staleAfterMinutes: 1440,
		})
	})

	it('reads overrides', () => {
		expect(
			loadConfig({
				NOTENBUCH_DB_NAME: ' GradesTest ',
				NOTENBUCH_SETTINGS_DB_NAME: 'SettingsTest',
				NOTENBUCH_APP_GROUP: 'group.test',
				NOTENBUCH_WIDGET_REFRESH_MINUTES: '15',
				NOTENBUCH_STALE_AFTER_MINUTES: '90',
			}),
		).toEqual({
			databaseName: 'GradesTest',
			settingsDatabaseName: 'SettingsTest',
			appGroup: 'group.test',
			widgetRefreshMinutes: 15,
			staleAfterMinutes: 90,
		})
	})

	it('ignores invalid numbers', () => {
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
		const config = loadConfig({ NOTENBUCH_WIDGET_REFRESH_MINUTES: 'soon', NOTENBUCH_STALE_AFTER_MINUTES: '0' })
		expect(config.widgetRefreshMinutes).toBe(DEFAULT_CONFIG.widgetRefreshMinutes)
		expect(config.staleAfterMinutes).toBe(DEFAULT_CONFIG.staleAfterMinutes)
		expect(warn).toHaveBeenCalledWith('[Config]', 'Ignoring invalid value', {
			key: 'NOTENBUCH_WIDGET_REFRESH_MINUTES',
			raw: 'soon',
			fallback: 60,
		})
		expect(warn).toHaveBeenCalledTimes(2)
	})
})
