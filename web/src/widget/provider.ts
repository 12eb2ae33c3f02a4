import { gradeDisplayText, performanceLevel, PERFORMANCE_LEVELS } from '../grading'
import type { BandColor, DisplayOptions, PerformanceLevel } from '../grading'
import { currentSchoolYear, schoolYearDisplayName, semesterShortName } from '../period'
import type { WidgetBridge, WidgetSnapshot } from './bridge'

export interface WidgetEntry {
	date: Date
	snapshot: WidgetSnapshot
	/** display text of the average, absent when there are no grades */
	averageText?: string
	performance: PerformanceLevel
	color: BandColor
	semesterLabel: string
	schoolYearLabel: string
	subjectsLabel: string
	/** true when the snapshot is older than the configured threshold */
	isStale: boolean
}

export interface WidgetTimeline {
	entries: WidgetEntry[]
	/** the widget asks for a new timeline at this time at the latest */
	refreshAt: Date
}

export interface TimelineOptions {
	refreshMinutes: number
	staleAfterMinutes: number
}

export function buildEntry(snapshot: WidgetSnapshot, display: DisplayOptions, now: Date, staleAfterMs: number): WidgetEntry {
	const average = snapshot.overallAverage
	const performance = average === undefined ? 'none' : performanceLevel(average, snapshot.gradingSystem)
	return {
		date: now,
		snapshot,
		averageText: average === undefined ? undefined : gradeDisplayText(average, snapshot.gradingSystem, display),
		performance,
		color: PERFORMANCE_LEVELS[performance].color,
		semesterLabel: semesterShortName(snapshot.semester),
		schoolYearLabel: schoolYearDisplayName(snapshot.schoolYear),
		subjectsLabel: snapshot.subjectCount === 1 ? '1 Fach' : `${snapshot.subjectCount} Fächer`,
		isStale: snapshot.lastUpdate !== undefined && now.getTime() - snapshot.lastUpdate > staleAfterMs,
	}
}

/**
 * Reader side of the widget. Only ever looks at the shared snapshot, never at
 * the durable store.
 */
export class WidgetTimelineProvider {
	constructor(
		private readonly bridge: WidgetBridge,
		private readonly options: TimelineOptions,
		private readonly clock: () => Date = () => new Date(),
	) {}

	placeholder(): WidgetEntry {
		const now = this.clock()
		return buildEntry(
			{
				overallAverage: 2.1,
				subjectCount: 8,
				gradeCount: 24,
				schoolYear: currentSchoolYear(now, 'traditional'),
				semester: 'first',
				gradingSystem: 'traditional',
			},
			{ roundPointAverages: true },
			now,
			Number.POSITIVE_INFINITY,
		)
	}

	async currentEntry(): Promise<WidgetEntry> {
		const [snapshot, display] = await Promise.all([this.bridge.read(), this.bridge.readSettings()])
		return buildEntry(snapshot, display, this.clock(), this.options.staleAfterMinutes * 60_000)
	}

	async timeline(): Promise<WidgetTimeline> {
		const entry = await this.currentEntry()
		return {
			entries: [entry],
			refreshAt: new Date(entry.date.getTime() + this.options.refreshMinutes * 60_000),
		}
	}
}
