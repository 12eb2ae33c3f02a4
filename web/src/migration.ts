import type { NotenbuchDB } from './db'
import { isGradingSystem } from './grading'
import type { GradingSystem } from './grading'
import { getBoolean } from './kv'
import type { KeyValueStore } from './kv'
import type { GradingSystemAssignment } from './types'

const LOG_PREFIX = '[Migration]'

export const MIGRATION_COMPLETED_KEY = 'gradingSystemMigrationCompleted'
export const LEGACY_GRADING_SYSTEM_PREFIX = 'gradingSystem_'

export type MigrationState = 'notStarted' | 'completed'

export interface MigrationResult {
	state: MigrationState
	/** start years whose durable assignment was written by this run */
	migratedYears: number[]
	/** true when this call found the completion flag and did nothing */
	skipped: boolean
}

export function legacyGradingSystemKey(startYear: number): string {
	return `${LEGACY_GRADING_SYSTEM_PREFIX}${startYear}`
}

interface LegacyPreference {
	startYear: number
	gradingSystem: GradingSystem
}

function parseLegacyEntry(key: string, value: unknown): LegacyPreference | undefined {
	const startYear = Number(key.slice(LEGACY_GRADING_SYSTEM_PREFIX.length))
	if (!Number.isInteger(startYear) || startYear <= 0) return undefined
	if (!isGradingSystem(value)) return undefined
	return { startYear, gradingSystem: value }
}

/**
 * Moves per-year grading system preferences from the plain settings store into
 * the durable store, once. The completion flag is only written after the
 * durable write succeeded, so a failed run is retried on the next launch.
 */
export class GradingSystemMigrator {
	constructor(
		private readonly db: NotenbuchDB,
		private readonly settings: KeyValueStore,
		private readonly now: () => Date = () => new Date(),
	) {}

	async state(): Promise<MigrationState> {
		return (await getBoolean(this.settings, MIGRATION_COMPLETED_KEY)) === true ? 'completed' : 'notStarted'
	}

	async migrate(): Promise<MigrationResult> {
		let legacy: LegacyPreference[]
		try {
			if ((await this.state()) === 'completed') {
				console.log(LOG_PREFIX, 'Grading system migration already completed, skipping')
				return { state: 'completed', migratedYears: [], skipped: true }
			}
			const entries = await this.settings.entriesWithPrefix(LEGACY_GRADING_SYSTEM_PREFIX)
			legacy = entries.flatMap((e) => {
				const parsed = parseLegacyEntry(e.key, e.value)
				if (!parsed) console.warn(LOG_PREFIX, 'Ignoring unreadable legacy entry', e)
				return parsed ? [parsed] : []
			})
		} catch (e) {
			console.warn(LOG_PREFIX, 'Settings store unavailable; migration postponed', e)
			return { state: 'notStarted', migratedYears: [], skipped: false }
		}

		let migratedYears: number[]
		try {
			migratedYears = await this.writeAssignments(legacy)
		} catch (e) {
			console.warn(LOG_PREFIX, 'Durable store unavailable; migration postponed', e)
			return { state: 'notStarted', migratedYears: [], skipped: false }
		}

		try {
			await this.settings.set(MIGRATION_COMPLETED_KEY, true)
		} catch (e) {
			// assignments written above are explicit now; a rerun leaves them alone
			console.warn(LOG_PREFIX, 'Could not persist completion flag; migration will rerun', e)
			return { state: 'notStarted', migratedYears, skipped: false }
		}
		console.log(LOG_PREFIX, 'Grading system migration completed', { migratedYears })
		return { state: 'completed', migratedYears, skipped: false }
	}

	private async writeAssignments(legacy: LegacyPreference[]): Promise<number[]> {
		await this.db.open()
		if (legacy.length === 0) return []
		return this.db.transaction('rw', this.db.gradingSystems, async () => {
			const written: number[] = []
			for (const { startYear, gradingSystem } of legacy) {
				const existing = await this.db.gradingSystems.get(startYear)
				if (existing?.isExplicit) continue
				const record: GradingSystemAssignment = {
					schoolYearStart: startYear,
					gradingSystem,
					isExplicit: true,
					updatedAt: this.now().toISOString(),
				}
				await this.db.gradingSystems.put(record)
				written.push(startYear)
			}
			return written.sort((a, b) => a - b)
		})
	}
}
