import { v4 as uuidv4 } from 'uuid'
import type { NotenbuchDB } from './db'
import { GradebookError } from './errors'
import { convertGrade, DEFAULT_GRADING_SYSTEM, validateGradeValue } from './grading'
import type { GradingSystem } from './grading'
import { isGradeTypeKey } from './gradeTypes'
import { isSelectableStartYear, schoolYear } from './period'
import type { SchoolYear, Semester } from './period'
import type { FinalGradeEntity, GradeEntity, GradingSystemAssignment, NewGrade, NewSubject, SubjectEntity } from './types'

const LOG_PREFIX = '[Gradebook]'

function assertSelectableYear(startYear: number) {
	if (!isSelectableStartYear(startYear)) {
		throw new GradebookError('SCHOOL_YEAR_OUT_OF_RANGE', String(startYear))
	}
}

function assertValueInRange(value: number, system: GradingSystem) {
	const validation = validateGradeValue(value, system)
	if (!validation.isValid) {
		throw new GradebookError('GRADE_OUT_OF_RANGE', validation.errors.join(', '))
	}
}

function normalizeName(name: string): string {
	const trimmed = name.trim()
	if (!trimmed) throw new GradebookError('SUBJECT_NAME_EMPTY')
	return trimmed
}

/**
 * All writes to the durable store. Every operation is one Dexie transaction,
 * and every value is validated here rather than during aggregation.
 */
export class Gradebook {
	constructor(
		readonly db: NotenbuchDB,
		private readonly now: () => Date = () => new Date(),
	) {}

	async listSubjects(): Promise<SubjectEntity[]> {
		return this.db.subjects.orderBy('name').toArray()
	}

	async createSubject(input: NewSubject): Promise<SubjectEntity> {
		const name = normalizeName(input.name)
		const subject: SubjectEntity = { id: uuidv4(), name, colorHex: input.colorHex, icon: input.icon }
		await this.db.transaction('rw', this.db.subjects, async () => {
			const existing = await this.db.subjects.where('name').equals(name).first()
			if (existing) throw new GradebookError('SUBJECT_NAME_TAKEN', name)
			await this.db.subjects.add(subject)
		})
		console.log(LOG_PREFIX, 'Subject created', { id: subject.id, name })
		return subject
	}

	async updateSubject(id: string, changes: Partial<NewSubject>): Promise<SubjectEntity> {
		return this.db.transaction('rw', this.db.subjects, async () => {
			const subject = await this.db.subjects.get(id)
			if (!subject) throw new GradebookError('SUBJECT_NOT_FOUND', id)
			const updated: SubjectEntity = { ...subject, ...changes, id }
			if (changes.name !== undefined) {
				updated.name = normalizeName(changes.name)
				const clash = await this.db.subjects.where('name').equals(updated.name).first()
				if (clash && clash.id !== id) throw new GradebookError('SUBJECT_NAME_TAKEN', updated.name)
			}
			await this.db.subjects.put(updated)
			return updated
		})
	}

	/**
	 * Removes the subject together with every grade and final grade that
	 * references it, in one transaction.
	 */
	async deleteSubject(id: string): Promise<{ grades: number; finalGrades: number }> {
		const removed = await this.db.transaction('rw', this.db.subjects, this.db.grades, this.db.finalGrades, async () => {
			const subject = await this.db.subjects.get(id)
			if (!subject) throw new GradebookError('SUBJECT_NOT_FOUND', id)
			const gradeIds = await this.db.grades.where('subjectId').equals(id).primaryKeys()
			if (gradeIds.length) await this.db.grades.bulkDelete(gradeIds)
			const finalIds = await this.db.finalGrades.where('subjectId').equals(id).primaryKeys()
			if (finalIds.length) await this.db.finalGrades.bulkDelete(finalIds)
			await this.db.subjects.delete(id)
			return { grades: gradeIds.length, finalGrades: finalIds.length }
		})
		console.log(LOG_PREFIX, 'Subject deleted', { id, ...removed })
		return removed
	}

	async addGrade(input: NewGrade): Promise<GradeEntity> {
		assertSelectableYear(input.schoolYearStart)
		if (!isGradeTypeKey(input.type)) throw new GradebookError('UNKNOWN_GRADE_TYPE', String(input.type))
		const grade: GradeEntity = { id: uuidv4(), ...input }
		await this.db.transaction('rw', this.db.subjects, this.db.grades, this.db.gradingSystems, async () => {
			const subject = await this.db.subjects.get(input.subjectId)
			if (!subject) throw new GradebookError('SUBJECT_NOT_FOUND', input.subjectId)
			const assignment = await this.assignmentFor(input.schoolYearStart)
			assertValueInRange(input.value, assignment.gradingSystem)
			await this.db.grades.add(grade)
		})
		console.log(LOG_PREFIX, 'Grade added', {
			subjectId: grade.subjectId,
			value: grade.value,
			schoolYearStart: grade.schoolYearStart,
			semester: grade.semester,
		})
		return grade
	}

	async updateGrade(id: string, changes: Partial<Pick<GradeEntity, 'value' | 'type' | 'date'>>): Promise<GradeEntity> {
		if (changes.type !== undefined && !isGradeTypeKey(changes.type)) {
			throw new GradebookError('UNKNOWN_GRADE_TYPE', String(changes.type))
		}
		return this.db.transaction('rw', this.db.grades, this.db.gradingSystems, async () => {
			const grade = await this.db.grades.get(id)
			if (!grade) throw new GradebookError('GRADE_NOT_FOUND', id)
			const updated: GradeEntity = { ...grade, ...changes, id }
			if (changes.value !== undefined) {
				const assignment = await this.assignmentFor(grade.schoolYearStart)
				assertValueInRange(changes.value, assignment.gradingSystem)
			}
			await this.db.grades.put(updated)
			return updated
		})
	}

	async deleteGrade(id: string): Promise<void> {
		await this.db.grades.delete(id)
		console.log(LOG_PREFIX, 'Grade deleted', { id })
	}

	async setFinalGrade(subjectId: string, schoolYearStart: number, semester: Semester, value: number): Promise<FinalGradeEntity> {
		assertSelectableYear(schoolYearStart)
		const saved = await this.db.transaction(
			'rw',
			this.db.subjects,
			this.db.finalGrades,
			this.db.gradingSystems,
			async () => {
				const subject = await this.db.subjects.get(subjectId)
				if (!subject) throw new GradebookError('SUBJECT_NOT_FOUND', subjectId)
				const assignment = await this.assignmentFor(schoolYearStart)
				assertValueInRange(value, assignment.gradingSystem)
				const existing = await this.db.finalGrades
					.where('[subjectId+schoolYearStart+semester]')
					.equals([subjectId, schoolYearStart, semester])
					.first()
				const finalGrade: FinalGradeEntity = {
					id: existing?.id ?? uuidv4(),
					subjectId,
					schoolYearStart,
					semester,
					value,
				}
				await this.db.finalGrades.put(finalGrade)
				return finalGrade
			},
		)
		console.log(LOG_PREFIX, 'Final grade set', { subjectId, schoolYearStart, semester, value })
		return saved
	}

	async clearFinalGrade(subjectId: string, schoolYearStart: number, semester: Semester): Promise<boolean> {
		const count = await this.db.finalGrades
			.where('[subjectId+schoolYearStart+semester]')
			.equals([subjectId, schoolYearStart, semester])
			.delete()
		return count > 0
	}

	/** Returns the year's assignment, creating the default record on first access. */
	async gradingSystemFor(schoolYearStart: number): Promise<GradingSystem> {
		const assignment = await this.db.transaction('rw', this.db.gradingSystems, () => this.assignmentFor(schoolYearStart))
		return assignment.gradingSystem
	}

	async resolveSchoolYear(schoolYearStart: number): Promise<SchoolYear> {
		return schoolYear(schoolYearStart, await this.gradingSystemFor(schoolYearStart))
	}

	/**
	 * Explicitly picks the grading system of a year. Grades and final grades
	 * already recorded for the year are converted to the new scale in the same
	 * transaction; with `convertExisting: false` they are kept as they are and
	 * the change is rejected if any of them falls outside the new range.
	 */
	async setGradingSystem(
		schoolYearStart: number,
		gradingSystem: GradingSystem,
		options: { convertExisting?: boolean } = {},
	): Promise<{ converted: number }> {
		assertSelectableYear(schoolYearStart)
		const result = await this.db.transaction(
			'rw',
			this.db.gradingSystems,
			this.db.grades,
			this.db.finalGrades,
			async () => {
				const previous = await this.assignmentFor(schoolYearStart)
				await this.db.gradingSystems.put({
					schoolYearStart,
					gradingSystem,
					isExplicit: true,
					updatedAt: this.now().toISOString(),
				})
				if (previous.gradingSystem === gradingSystem) return { converted: 0 }
				const from = previous.gradingSystem
				const grades = await this.db.grades.where('schoolYearStart').equals(schoolYearStart).toArray()
				const finals = await this.db.finalGrades.where('schoolYearStart').equals(schoolYearStart).toArray()
				if (options.convertExisting === false) {
					for (const { value } of [...grades, ...finals]) assertValueInRange(value, gradingSystem)
					return { converted: 0 }
				}
				await this.db.grades.bulkPut(grades.map((g) => ({ ...g, value: convertGrade(g.value, from, gradingSystem) })))
				await this.db.finalGrades.bulkPut(finals.map((f) => ({ ...f, value: convertGrade(f.value, from, gradingSystem) })))
				return { converted: grades.length + finals.length }
			},
		)
		console.log(LOG_PREFIX, 'Grading system set', { schoolYearStart, gradingSystem, ...result })
		return result
	}

	// Must run inside a transaction that includes gradingSystems in rw mode.
	private async assignmentFor(schoolYearStart: number): Promise<GradingSystemAssignment> {
		const existing = await this.db.gradingSystems.get(schoolYearStart)
		if (existing) return existing
		const created: GradingSystemAssignment = {
			schoolYearStart,
			gradingSystem: DEFAULT_GRADING_SYSTEM,
			isExplicit: false,
			updatedAt: this.now().toISOString(),
		}
		await this.db.gradingSystems.add(created)
		return created
	}
}
