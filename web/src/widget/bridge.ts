import { DEFAULT_DISPLAY_OPTIONS, DEFAULT_GRADING_SYSTEM, parseGradingSystem } from '../grading'
import type { DisplayOptions, GradingSystem } from '../grading'
import { getBoolean, getNumber, getString } from '../kv'
import type { KeyValueStore } from '../kv'
import { currentSchoolYear, DEFAULT_SEMESTER, parseSemester, schoolYear, schoolYearFromStorage } from '../period'
import type { SchoolYear, Semester } from '../period'
import type { RefreshSignal } from './signal'

const LOG_PREFIX = '[Widget]'

export const SNAPSHOT_KEYS = {
	overallAverage: 'widget_overall_average',
	subjectCount: 'widget_subject_count',
	gradeCount: 'widget_grade_count',
	selectedSchoolYearStart: 'widget_selected_school_year',
	selectedSemester: 'widget_selected_semester',
	gradingSystem: 'widget_grading_system',
	lastUpdate: 'widget_last_update',
} as const

export const SETTINGS_KEYS = {
	roundPointAverages: 'roundPointAverages',
} as const

const ACCESS_TEST_KEY = 'widget_test_key'
const ACCESS_TEST_VALUE = 'test_value'

export interface WidgetSnapshot {
	/** absent means "no data", which is not the same as an average of 0 */
	overallAverage?: number
	subjectCount: number
	gradeCount: number
	schoolYear: SchoolYear
	semester: Semester
	gradingSystem: GradingSystem
	/** epoch ms; absent only in the empty snapshot */
	lastUpdate?: number
}

export type SnapshotInput = Omit<WidgetSnapshot, 'lastUpdate'> & { lastUpdate?: number }

export type BridgeState = 'uninitialized' | 'populated'

export function emptySnapshot(now: Date = new Date()): WidgetSnapshot {
	return {
		subjectCount: 0,
		gradeCount: 0,
		schoolYear: currentSchoolYear(now, DEFAULT_GRADING_SYSTEM),
		semester: DEFAULT_SEMESTER,
		gradingSystem: DEFAULT_GRADING_SYSTEM,
	}
}

function nonNegativeInt(value: number | undefined): number {
	return value !== undefined && Number.isInteger(value) && value >= 0 ? value : 0
}

/**
 * One-way snapshot replication between the primary process (writer) and the
 * widget process (reader) through a shared key/value store.
 *
 * `store` is undefined when the shared storage is not provisioned. Reads then
 * yield the empty snapshot and writes are logged no-ops.
 */
export class WidgetBridge {
	// publish and clear run one at a time, in call order
	private writes: Promise<unknown> = Promise.resolve()

	constructor(
		private readonly store: KeyValueStore | undefined,
		private readonly signal?: RefreshSignal,
		private readonly clock: () => Date = () => new Date(),
	) {}

	get isProvisioned(): boolean {
		return this.store !== undefined
	}

	private serialized<T>(task: () => Promise<T>): Promise<T> {
		const run = this.writes.then(task)
		this.writes = run.then(
			() => undefined,
			() => undefined,
		)
		return run
	}

	/**
	 * Writes every field, stamps the update time and asks the widget to
	 * re-render. The stamp never moves backwards.
	 */
	publish(input: SnapshotInput): Promise<WidgetSnapshot | undefined> {
		return this.serialized(() => this.write(input))
	}

	private async write(input: SnapshotInput): Promise<WidgetSnapshot | undefined> {
		const store = this.store
		if (!store) {
			console.warn(LOG_PREFIX, 'Shared store not provisioned; snapshot not published')
			return undefined
		}
		try {
			const previous = await getNumber(store, SNAPSHOT_KEYS.lastUpdate)
			const lastUpdate = Math.max(this.clock().getTime(), input.lastUpdate ?? 0, previous === undefined ? 0 : previous + 1)
			if (input.overallAverage === undefined || !Number.isFinite(input.overallAverage)) {
				await store.remove(SNAPSHOT_KEYS.overallAverage)
			} else {
				await store.set(SNAPSHOT_KEYS.overallAverage, input.overallAverage)
			}
			await store.set(SNAPSHOT_KEYS.subjectCount, input.subjectCount)
			await store.set(SNAPSHOT_KEYS.gradeCount, input.gradeCount)
			await store.set(SNAPSHOT_KEYS.selectedSchoolYearStart, input.schoolYear.startYear)
			await store.set(SNAPSHOT_KEYS.selectedSemester, input.semester)
			await store.set(SNAPSHOT_KEYS.gradingSystem, input.gradingSystem)
			await store.set(SNAPSHOT_KEYS.lastUpdate, lastUpdate)
			console.log(LOG_PREFIX, 'Snapshot published', {
				overallAverage: input.overallAverage ?? null,
				subjectCount: input.subjectCount,
				gradeCount: input.gradeCount,
			})
			this.signal?.reloadAllTimelines()
			return { ...input, lastUpdate }
		} catch (e) {
			console.error(LOG_PREFIX, 'Snapshot publish failed', e)
			return undefined
		}
	}

	/** Total: always returns a snapshot, falling back to the empty one. */
	async read(): Promise<WidgetSnapshot> {
		const now = this.clock()
		const store = this.store
		if (!store) {
			console.warn(LOG_PREFIX, 'Shared store not provisioned; showing empty snapshot')
			return emptySnapshot(now)
		}
		try {
			const lastUpdate = await getNumber(store, SNAPSHOT_KEYS.lastUpdate)
			if (lastUpdate === undefined) {
				console.log(LOG_PREFIX, 'No snapshot published yet')
				return emptySnapshot(now)
			}
			const [overallAverage, subjectCount, gradeCount, startYear, semesterRaw, systemRaw] = await Promise.all([
				getNumber(store, SNAPSHOT_KEYS.overallAverage),
				getNumber(store, SNAPSHOT_KEYS.subjectCount),
				getNumber(store, SNAPSHOT_KEYS.gradeCount),
				store.get(SNAPSHOT_KEYS.selectedSchoolYearStart),
				getString(store, SNAPSHOT_KEYS.selectedSemester),
				getString(store, SNAPSHOT_KEYS.gradingSystem),
			])
			const gradingSystem = parseGradingSystem(systemRaw)
			return {
				overallAverage,
				subjectCount: nonNegativeInt(subjectCount),
				gradeCount: nonNegativeInt(gradeCount),
				schoolYear: schoolYearFromStorage(startYear, gradingSystem, now),
				semester: parseSemester(semesterRaw),
				gradingSystem,
				lastUpdate,
			}
		} catch (e) {
			console.error(LOG_PREFIX, 'Snapshot read failed; showing empty snapshot', e)
			return emptySnapshot(now)
		}
	}

	async lastUpdate(): Promise<number | undefined> {
		if (!this.store) return undefined
		try {
			return await getNumber(this.store, SNAPSHOT_KEYS.lastUpdate)
		} catch (e) {
			console.error(LOG_PREFIX, 'Reading last update failed', e)
			return undefined
		}
	}

	/** Age of the published snapshot in ms, undefined if nothing was published. */
	async staleness(now: Date = this.clock()): Promise<number | undefined> {
		const lastUpdate = await this.lastUpdate()
		return lastUpdate === undefined ? undefined : Math.max(0, now.getTime() - lastUpdate)
	}

	async state(): Promise<BridgeState> {
		return (await this.lastUpdate()) === undefined ? 'uninitialized' : 'populated'
	}

	/** Removes every snapshot key and re-renders the widget with the empty snapshot. */
	clear(): Promise<void> {
		return this.serialized(() => this.removeSnapshot())
	}

	private async removeSnapshot(): Promise<void> {
		if (!this.store) return
		try {
			await this.store.removeMany(Object.values(SNAPSHOT_KEYS))
			console.log(LOG_PREFIX, 'Snapshot cleared')
			this.signal?.reloadAllTimelines()
		} catch (e) {
			console.error(LOG_PREFIX, 'Snapshot clear failed', e)
		}
	}

	/** Diagnostic write/read round trip. Never throws. */
	async validateAccess(): Promise<boolean> {
		if (!this.store) {
			console.warn(LOG_PREFIX, 'Shared store not provisioned')
			return false
		}
		try {
			await this.store.set(ACCESS_TEST_KEY, ACCESS_TEST_VALUE)
			const readBack = await getString(this.store, ACCESS_TEST_KEY)
			await this.store.remove(ACCESS_TEST_KEY)
			const ok = readBack === ACCESS_TEST_VALUE
			console.log(LOG_PREFIX, 'Shared store access test', { ok })
			return ok
		} catch (e) {
			console.warn(LOG_PREFIX, 'Shared store access test failed', e)
			return false
		}
	}

	/** Copies display preferences the widget needs into the shared store. */
	async syncSettings(options: DisplayOptions): Promise<void> {
		if (!this.store) return
		try {
			await this.store.set(SETTINGS_KEYS.roundPointAverages, options.roundPointAverages)
		} catch (e) {
			console.error(LOG_PREFIX, 'Settings sync failed', e)
		}
	}

	async readSettings(): Promise<DisplayOptions> {
		if (!this.store) return DEFAULT_DISPLAY_OPTIONS
		try {
			const round = await getBoolean(this.store, SETTINGS_KEYS.roundPointAverages)
			return { roundPointAverages: round ?? DEFAULT_DISPLAY_OPTIONS.roundPointAverages }
		} catch (e) {
			console.error(LOG_PREFIX, 'Settings read failed', e)
			return DEFAULT_DISPLAY_OPTIONS
		}
	}
}

export function snapshotFromSummary(summary: {
	overallAverage?: number
	subjectCount: number
	gradeCount: number
	schoolYear: SchoolYear
	semester: Semester
}): SnapshotInput {
	return {
		overallAverage: summary.overallAverage,
		subjectCount: summary.subjectCount,
		gradeCount: summary.gradeCount,
		schoolYear: schoolYear(summary.schoolYear.startYear, summary.schoolYear.gradingSystem),
		semester: summary.semester,
		gradingSystem: summary.schoolYear.gradingSystem,
	}
}
