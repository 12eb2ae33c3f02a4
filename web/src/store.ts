import { createStore } from 'zustand/vanilla'
import type { StoreApi } from 'zustand/vanilla'
import { summarizePeriod } from './aggregation'
import type { PeriodSummary } from './aggregation'
import { DEFAULT_DISPLAY_OPTIONS } from './grading'
import type { DisplayOptions, GradingSystem } from './grading'
import { getBoolean } from './kv'
import type { KeyValueStore } from './kv'
import type { Gradebook } from './gradebook'
import { DEFAULT_SEMESTER, schoolYear } from './period'
import type { SchoolYear, Semester } from './period'
import type { NewGrade, NewSubject, SubjectEntity } from './types'
import { snapshotFromSummary, SETTINGS_KEYS } from './widget/bridge'
import type { WidgetBridge } from './widget/bridge'

interface UIState {
	selectedSchoolYear: SchoolYear
	selectedSemester: Semester
	subjects: SubjectEntity[]
	summary?: PeriodSummary
	display: DisplayOptions
	isLoading: boolean
	error?: string
}

interface Actions {
	loadSettings: () => Promise<void>
	selectPeriod: (startYear: number, semester: Semester) => Promise<void>
	loadSubjects: () => Promise<SubjectEntity[]>
	refresh: () => Promise<PeriodSummary | undefined>
	createSubject: (input: NewSubject) => Promise<SubjectEntity | undefined>
	deleteSubject: (subjectId: string) => Promise<void>
	addGrade: (input: Omit<NewGrade, 'schoolYearStart' | 'semester'>) => Promise<void>
	deleteGrade: (gradeId: string) => Promise<void>
	setFinalGrade: (subjectId: string, value: number) => Promise<void>
	clearFinalGrade: (subjectId: string) => Promise<void>
	setGradingSystem: (gradingSystem: GradingSystem, options?: { convertExisting?: boolean }) => Promise<void>
	setRoundPointAverages: (round: boolean) => Promise<void>
}

export type AppState = UIState & Actions

export type AppStore = StoreApi<AppState>

export interface StoreDeps {
	gradebook: Gradebook
	bridge: WidgetBridge
	settings: KeyValueStore
	initialSchoolYear: SchoolYear
	initialSemester?: Semester
}

const LOG_PREFIX = '[Store]'

function errorMessage(e: unknown): string {
	return e instanceof Error ? e.message : String(e)
}

/**
 * Primary-process state. Every mutation goes through the gradebook, then the
 * period is recomputed from the durable store and republished to the widget.
 * Failures land in `error`; actions never reject.
 */
export function createAppStore(deps: StoreDeps): AppStore {
	const { gradebook, bridge, settings } = deps

	return createStore<AppState>((set, get) => {
		async function mutate(label: string, action: () => Promise<unknown>): Promise<boolean> {
			set({ isLoading: true, error: undefined })
			try {
				await action()
				return true
			} catch (e) {
				console.error(LOG_PREFIX, `${label} failed`, e)
				set({ error: errorMessage(e) })
				return false
			} finally {
				set({ isLoading: false })
			}
		}

		async function mutateAndRefresh(label: string, action: () => Promise<unknown>): Promise<boolean> {
			const ok = await mutate(label, action)
			if (ok) await get().refresh()
			return ok
		}

		return {
			selectedSchoolYear: deps.initialSchoolYear,
			selectedSemester: deps.initialSemester ?? DEFAULT_SEMESTER,
			subjects: [],
			display: DEFAULT_DISPLAY_OPTIONS,
			isLoading: false,

			async loadSettings() {
				try {
					const round = await getBoolean(settings, SETTINGS_KEYS.roundPointAverages)
					set({ display: { roundPointAverages: round ?? DEFAULT_DISPLAY_OPTIONS.roundPointAverages } })
				} catch (e) {
					console.warn(LOG_PREFIX, 'Settings unavailable; using defaults', e)
				}
			},

			async selectPeriod(startYear, semester) {
				await mutateAndRefresh('Select period', async () => {
					const year = await gradebook.resolveSchoolYear(startYear)
					set({ selectedSchoolYear: year, selectedSemester: semester })
				})
			},

			async loadSubjects() {
				try {
					const subjects = await gradebook.listSubjects()
					set({ subjects })
					return subjects
				} catch (e) {
					console.error(LOG_PREFIX, 'Loading subjects failed', e)
					set({ error: errorMessage(e) })
					return get().subjects
				}
			},

			async refresh() {
				const { selectedSchoolYear, selectedSemester } = get()
				try {
					const [summary, subjects] = await Promise.all([
						summarizePeriod(gradebook.db, selectedSchoolYear, selectedSemester),
						gradebook.listSubjects(),
					])
					set({ summary, subjects })
					await bridge.syncSettings(get().display)
					await bridge.publish(snapshotFromSummary(summary))
					return summary
				} catch (e) {
					console.error(LOG_PREFIX, 'Refresh failed', e)
					set({ error: errorMessage(e) })
					return undefined
				}
			},

			async createSubject(input) {
				let created: SubjectEntity | undefined
				await mutateAndRefresh('Create subject', async () => {
					created = await gradebook.createSubject(input)
				})
				return created
			},

			async deleteSubject(subjectId) {
				await mutateAndRefresh('Delete subject', () => gradebook.deleteSubject(subjectId))
			},

			async addGrade(input) {
				const { selectedSchoolYear, selectedSemester } = get()
				await mutateAndRefresh('Add grade', () =>
					gradebook.addGrade({
						...input,
						schoolYearStart: selectedSchoolYear.startYear,
						semester: selectedSemester,
					}),
				)
			},

			async deleteGrade(gradeId) {
				await mutateAndRefresh('Delete grade', () => gradebook.deleteGrade(gradeId))
			},

			async setFinalGrade(subjectId, value) {
				const { selectedSchoolYear, selectedSemester } = get()
				await mutateAndRefresh('Set final grade', () =>
					gradebook.setFinalGrade(subjectId, selectedSchoolYear.startYear, selectedSemester, value),
				)
			},

			async clearFinalGrade(subjectId) {
				const { selectedSchoolYear, selectedSemester } = get()
				await mutateAndRefresh('Clear final grade', () =>
					gradebook.clearFinalGrade(subjectId, selectedSchoolYear.startYear, selectedSemester),
				)
			},

			async setGradingSystem(gradingSystem, options) {
				const { startYear } = get().selectedSchoolYear
				await mutateAndRefresh('Set grading system', async () => {
					await gradebook.setGradingSystem(startYear, gradingSystem, options)
					set({ selectedSchoolYear: schoolYear(startYear, gradingSystem) })
				})
			},

			async setRoundPointAverages(round) {
				await mutateAndRefresh('Save rounding preference', async () => {
					await settings.set(SETTINGS_KEYS.roundPointAverages, round)
					set({ display: { roundPointAverages: round } })
				})
			},
		}
	})
}
