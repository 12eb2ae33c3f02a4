import { DEFAULT_GRADING_SYSTEM, parseGradingSystem } from './grading'
import type { GradingSystem } from './grading'

export interface SchoolYear {
	startYear: number
	endYear: number
	gradingSystem: GradingSystem
}

export const FIRST_SELECTABLE_YEAR = 2000
export const LAST_SELECTABLE_YEAR = 2099

// School years start in August
const FIRST_MONTH_OF_SCHOOL_YEAR = 8

export function schoolYear(startYear: number, gradingSystem: GradingSystem = DEFAULT_GRADING_SYSTEM): SchoolYear {
	return { startYear, endYear: startYear + 1, gradingSystem }
}

export function currentStartYear(now: Date = new Date()): number {
	const year = now.getFullYear()
	return now.getMonth() + 1 >= FIRST_MONTH_OF_SCHOOL_YEAR ? year : year - 1
}

export function currentSchoolYear(
	now: Date = new Date(),
	gradingSystem: GradingSystem = DEFAULT_GRADING_SYSTEM,
): SchoolYear {
	return schoolYear(currentStartYear(now), gradingSystem)
}

export function schoolYearDisplayName(year: SchoolYear): string {
	return `${year.startYear}/${year.endYear}`
}

export function sameSchoolYear(a: SchoolYear, b: SchoolYear): boolean {
	return a.startYear === b.startYear && a.gradingSystem === b.gradingSystem
}

export function isSelectableStartYear(startYear: number): boolean {
	return Number.isInteger(startYear) && startYear >= FIRST_SELECTABLE_YEAR && startYear <= LAST_SELECTABLE_YEAR
}

export function selectableStartYears(): number[] {
	return Array.from({ length: LAST_SELECTABLE_YEAR - FIRST_SELECTABLE_YEAR + 1 }, (_, i) => FIRST_SELECTABLE_YEAR + i)
}

/**
 * Rebuilds a school year from a persisted `(startYear, gradingSystemRaw)` pair.
 * A missing or non-positive start year means the current school year.
 */
export function schoolYearFromStorage(startYear: unknown, gradingSystemRaw: unknown, now: Date = new Date()): SchoolYear {
	const gradingSystem = parseGradingSystem(gradingSystemRaw)
	if (typeof startYear !== 'number' || !Number.isInteger(startYear) || startYear <= 0) {
		return currentSchoolYear(now, gradingSystem)
	}
	return schoolYear(startYear, gradingSystem)
}

export type Semester = 'first' | 'second'

export const SEMESTERS: readonly Semester[] = ['first', 'second']

export const DEFAULT_SEMESTER: Semester = 'first'

const SEMESTER_NAMES: Record<Semester, { displayName: string; shortName: string }> = {
	first: { displayName: '1. Halbjahr', shortName: '1. HJ' },
	second: { displayName: '2. Halbjahr', shortName: '2. HJ' },
}

export function isSemester(raw: unknown): raw is Semester {
	return raw === 'first' || raw === 'second'
}

export function parseSemester(raw: unknown): Semester {
	return isSemester(raw) ? raw : DEFAULT_SEMESTER
}

export function semesterDisplayName(semester: Semester): string {
	return SEMESTER_NAMES[semester].displayName
}

export function semesterShortName(semester: Semester): string {
	return SEMESTER_NAMES[semester].shortName
}
