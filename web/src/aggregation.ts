import type { NotenbuchDB } from './db'
import { DEFAULT_GRADING_SYSTEM } from './grading'
import type { GradingSystem } from './grading'
import { gradeTypeWeight } from './gradeTypes'
import type { SchoolYear, Semester } from './period'
import type { FinalGradeEntity, GradeEntity, SubjectEntity } from './types'

export interface WeightedValue {
	value: number
	weight: number
}

/** `undefined` for an empty set; there is no average of zero grades. */
export function computeWeightedAverage(items: WeightedValue[]): number | undefined {
	let weightedSum = 0
	let totalWeight = 0
	for (const { value, weight } of items) {
		weightedSum += value * weight
		totalWeight += weight
	}
	if (totalWeight <= 0) return undefined
	return weightedSum / totalWeight
}

export function meanOf(values: number[]): number | undefined {
	if (values.length === 0) return undefined
	return values.reduce((acc, v) => acc + v, 0) / values.length
}

export function gradeAverage(grades: GradeEntity[]): number | undefined {
	return computeWeightedAverage(grades.map((g) => ({ value: g.value, weight: gradeTypeWeight(g.type) })))
}

export interface SubjectSummary {
	subject: SubjectEntity
	/** final grade when set, computed average otherwise */
	average?: number
	computedAverage?: number
	finalGrade?: number
	gradeCount: number
}

export interface PeriodSummary {
	schoolYear: SchoolYear
	semester: Semester
	overallAverage?: number
	/** all subjects; subjects are not scoped to a period */
	subjectCount: number
	/** grades recorded in the period */
	gradeCount: number
	subjects: SubjectSummary[]
}

function byDate(a: GradeEntity, b: GradeEntity): number {
	const da = a.date ? Date.parse(a.date) : 0
	const db = b.date ? Date.parse(b.date) : 0
	return da - db
}

async function systemOfYear(db: NotenbuchDB, schoolYearStart: number): Promise<GradingSystem> {
	const assignment = await db.gradingSystems.get(schoolYearStart)
	return assignment?.gradingSystem ?? DEFAULT_GRADING_SYSTEM
}

// A school year is identified by start year and grading system; a query for
// the right year under the wrong system matches nothing.
async function isRecordedPeriod(db: NotenbuchDB, schoolYear: SchoolYear): Promise<boolean> {
	return (await systemOfYear(db, schoolYear.startYear)) === schoolYear.gradingSystem
}

interface SubjectPeriod {
	grades: GradeEntity[]
	finalGrade?: FinalGradeEntity
}

async function loadSubjectPeriod(
	db: NotenbuchDB,
	subjectId: string,
	schoolYear: SchoolYear,
	semester: Semester,
): Promise<SubjectPeriod> {
	if (!(await isRecordedPeriod(db, schoolYear))) return { grades: [] }
	const key = [subjectId, schoolYear.startYear, semester]
	const [grades, finalGrade] = await Promise.all([
		db.grades.where('[subjectId+schoolYearStart+semester]').equals(key).toArray(),
		db.finalGrades.where('[subjectId+schoolYearStart+semester]').equals(key).first(),
	])
	return { grades: grades.sort(byDate), finalGrade }
}

export async function gradesFor(
	db: NotenbuchDB,
	subjectId: string,
	schoolYear: SchoolYear,
	semester: Semester,
): Promise<GradeEntity[]> {
	return db.transaction('r', db.grades, db.finalGrades, db.gradingSystems, async () => {
		const { grades } = await loadSubjectPeriod(db, subjectId, schoolYear, semester)
		return grades
	})
}

export async function finalGradeFor(
	db: NotenbuchDB,
	subjectId: string,
	schoolYear: SchoolYear,
	semester: Semester,
): Promise<FinalGradeEntity | undefined> {
	return db.transaction('r', db.grades, db.finalGrades, db.gradingSystems, async () => {
		const { finalGrade } = await loadSubjectPeriod(db, subjectId, schoolYear, semester)
		return finalGrade
	})
}

/**
 * Average of one subject in one period. A final grade replaces the computed
 * average outright.
 */
export async function weightedAverage(
	db: NotenbuchDB,
	subjectId: string,
	schoolYear: SchoolYear,
	semester: Semester,
): Promise<number | undefined> {
	return db.transaction('r', db.grades, db.finalGrades, db.gradingSystems, async () => {
		const { grades, finalGrade } = await loadSubjectPeriod(db, subjectId, schoolYear, semester)
		return finalGrade ? finalGrade.value : gradeAverage(grades)
	})
}

function summarizeSubjects(subjects: SubjectEntity[], grades: GradeEntity[], finals: FinalGradeEntity[]): SubjectSummary[] {
	const gradesBySubject = new Map<string, GradeEntity[]>()
	for (const g of grades) {
		const list = gradesBySubject.get(g.subjectId)
		if (list) list.push(g)
		else gradesBySubject.set(g.subjectId, [g])
	}
	const finalBySubject = new Map(finals.map((f) => [f.subjectId, f.value]))
	return subjects.map((subject) => {
		const own = gradesBySubject.get(subject.id) ?? []
		const computedAverage = gradeAverage(own)
		const finalGrade = finalBySubject.get(subject.id)
		return {
			subject,
			average: finalGrade ?? computedAverage,
			computedAverage,
			finalGrade,
			gradeCount: own.length,
		}
	})
}

/**
 * Summary of a period in one consistent read: per-subject averages, the
 * overall average (each subject with data counts once) and the counts the
 * widget shows.
 */
export async function summarizePeriod(db: NotenbuchDB, schoolYear: SchoolYear, semester: Semester): Promise<PeriodSummary> {
	return db.transaction('r', [db.subjects, db.grades, db.finalGrades, db.gradingSystems], async () => {
		const subjects = await db.subjects.orderBy('name').toArray()
		const recorded = await isRecordedPeriod(db, schoolYear)
		let grades: GradeEntity[] = []
		let finals: FinalGradeEntity[] = []
		if (recorded) {
			const period = [schoolYear.startYear, semester]
			;[grades, finals] = await Promise.all([
				db.grades.where('[schoolYearStart+semester]').equals(period).toArray(),
				db.finalGrades.where('[schoolYearStart+semester]').equals(period).toArray(),
			])
		}
		const summaries = summarizeSubjects(subjects, grades, finals)
		const averages = summaries.flatMap((s) => (s.average === undefined ? [] : [s.average]))
		return {
			schoolYear,
			semester,
			overallAverage: meanOf(averages),
			subjectCount: subjects.length,
			gradeCount: summaries.reduce((acc, s) => acc + s.gradeCount, 0),
			subjects: summaries,
		}
	})
}

export async function overallAverage(db: NotenbuchDB, schoolYear: SchoolYear, semester: Semester): Promise<number | undefined> {
	const summary = await summarizePeriod(db, schoolYear, semester)
	return summary.overallAverage
}
