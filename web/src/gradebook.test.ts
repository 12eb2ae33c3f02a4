import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import type { NotenbuchDB } from './db'
import { GradebookError, isGradebookError } from './errors'
import { Gradebook } from './gradebook'
import { newTestDb } from './test/helpers'

const NOW = new Date('2025-09-15T08:00:00.000Z')

describe('Gradebook', () => {
	let db: NotenbuchDB
	let gradebook: Gradebook

	beforeEach(() => {
		db = newTestDb()
		gradebook = new Gradebook(db, () => NOW)
	})

	afterEach(async () => {
		await db.delete()
	})

	async function subject(name: string) {
		return gradebook.createSubject({ name, colorHex: '#3366FF', icon: 'book' })
	}

	describe('subjects', () => {
		it('trims names and lists subjects by name', async () => {
			await subject('  Mathe ')
			await subject('Deutsch')
			const names = (await gradebook.listSubjects()).map((s) => s.name)
			expect(names).toEqual(['Deutsch', 'Mathe'])
		})

		it('rejects empty and duplicate names', async () => {
			await subject('Mathe')
			await expect(subject('   ')).rejects.toMatchObject({ code: 'SUBJECT_NAME_EMPTY' })
			await expect(subject('Mathe ')).rejects.toMatchObject({ code: 'SUBJECT_NAME_TAKEN' })
			expect(await db.subjects.count()).toBe(1)
		})

		it('renames a subject unless the name is taken', async () => {
			const math = await subject('Mathe')
			await subject('Physik')
			const renamed = await gradebook.updateSubject(math.id, { name: 'Mathematik' })
			expect(renamed.name).toBe('Mathematik')
			await expect(gradebook.updateSubject(math.id, { name: 'Physik' })).rejects.toMatchObject({
				code: 'SUBJECT_NAME_TAKEN',
			})
			await expect(gradebook.updateSubject('missing', { icon: 'x' })).rejects.toMatchObject({
				code: 'SUBJECT_NOT_FOUND',
			})
		})

		it('deletes grades and final grades together with the subject', async () => {
			const math = await subject('Mathe')
			const german = await subject('Deutsch')
			await gradebook.addGrade({ subjectId: math.id, type: 'exam', value: 2.0, schoolYearStart: 2025, semester: 'first' })
			await gradebook.addGrade({ subjectId: math.id, type: 'oral', value: 1.0, schoolYearStart: 2024, semester: 'second' })
			await gradebook.addGrade({ subjectId: german.id, type: 'test', value: 3.0, schoolYearStart: 2025, semester: 'first' })
			await gradebook.setFinalGrade(math.id, 2025, 'first', 2.0)

			expect(await gradebook.deleteSubject(math.id)).toEqual({ grades: 2, finalGrades: 1 })
			expect(await db.grades.count()).toBe(1)
			expect(await db.finalGrades.count()).toBe(0)
			expect((await gradebook.listSubjects()).map((s) => s.name)).toEqual(['Deutsch'])
		})
	})

	describe('grades', () => {
		it('stores a valid grade and creates the default assignment lazily', async () => {
			const math = await subject('Mathe')
			const grade = await gradebook.addGrade({
				subjectId: math.id,
				type: 'exam',
				value: 1.7,
				schoolYearStart: 2025,
				semester: 'first',
				date: '2025-10-01T00:00:00.000Z',
			})
			expect(await db.grades.get(grade.id)).toEqual(grade)
			expect(await db.gradingSystems.get(2025)).toEqual({
				schoolYearStart: 2025,
				gradingSystem: 'traditional',
				isExplicit: false,
				updatedAt: NOW.toISOString(),
			})
		})

		it('rejects values outside the range of the year', async () => {
			const math = await subject('Mathe')
			const error = await gradebook
				.addGrade({ subjectId: math.id, type: 'exam', value: 12, schoolYearStart: 2025, semester: 'first' })
				.catch((e: unknown) => e)
			expect(isGradebookError(error)).toBe(true)
			expect(error).toBeInstanceOf(GradebookError)
			expect(error).toMatchObject({
				code: 'GRADE_OUT_OF_RANGE',
				message: 'GRADE_OUT_OF_RANGE: Value must be between 0.7 and 6 for traditional',
			})

			await gradebook.setGradingSystem(2025, 'points')
			await gradebook.addGrade({ subjectId: math.id, type: 'exam', value: 12, schoolYearStart: 2025, semester: 'first' })
			expect(await db.grades.count()).toBe(1)
		})

		it('rejects unknown subjects and years outside 2000 to 2099', async () => {
			await expect(
				gradebook.addGrade({ subjectId: 'missing', type: 'oral', value: 2, schoolYearStart: 2025, semester: 'first' }),
			).rejects.toMatchObject({ code: 'SUBJECT_NOT_FOUND' })
			const math = await subject('Mathe')
			await expect(
				gradebook.addGrade({ subjectId: math.id, type: 'oral', value: 2, schoolYearStart: 1999, semester: 'first' }),
			).rejects.toMatchObject({ code: 'SCHOOL_YEAR_OUT_OF_RANGE' })
			expect(await db.grades.count()).toBe(0)
		})

		it('updates and deletes grades', async () => {
			const math = await subject('Mathe')
			const grade = await gradebook.addGrade({
				subjectId: math.id,
				type: 'test',
				value: 3.0,
				schoolYearStart: 2025,
				semester: 'second',
			})
			const updated = await gradebook.updateGrade(grade.id, { value: 2.3, type: 'exam' })
			expect(updated).toEqual({ ...grade, value: 2.3, type: 'exam' })
			await expect(gradebook.updateGrade(grade.id, { value: 0.3 })).rejects.toMatchObject({ code: 'GRADE_OUT_OF_RANGE' })
			await gradebook.deleteGrade(grade.id)
			await expect(gradebook.updateGrade(grade.id, { value: 2.0 })).rejects.toMatchObject({ code: 'GRADE_NOT_FOUND' })
		})
	})

	describe('final grades', () => {
		it('keeps one final grade per subject and period', async () => {
			const math = await subject('Mathe')
			const first = await gradebook.setFinalGrade(math.id, 2025, 'first', 2.0)
			const second = await gradebook.setFinalGrade(math.id, 2025, 'first', 3.0)
			expect(second.id).toBe(first.id)
			expect(await db.finalGrades.count()).toBe(1)
			expect((await db.finalGrades.get(first.id))?.value).toBe(3.0)
		})

		it('clears a final grade', async () => {
			const math = await subject('Mathe')
			await gradebook.setFinalGrade(math.id, 2025, 'second', 1.0)
			expect(await gradebook.clearFinalGrade(math.id, 2025, 'second')).toBe(true)
			expect(await gradebook.clearFinalGrade(math.id, 2025, 'second')).toBe(false)
		})

		it('validates against the grading system of the year', async () => {
			const math = await subject('Mathe')
			await expect(gradebook.setFinalGrade(math.id, 2025, 'first', 15)).rejects.toMatchObject({
				code: 'GRADE_OUT_OF_RANGE',
			})
			await expect(gradebook.setFinalGrade('missing', 2025, 'first', 2)).rejects.toMatchObject({
				code: 'SUBJECT_NOT_FOUND',
			})
		})
	})

	describe('grading system of a year', () => {
		it('defaults to traditional and resolves the school year', async () => {
			expect(await gradebook.gradingSystemFor(2024)).toBe('traditional')
			expect(await gradebook.resolveSchoolYear(2024)).toEqual({
				startYear: 2024,
				endYear: 2025,
				gradingSystem: 'traditional',
			})
		})

		it('converts existing grades when the system changes', async () => {
			const math = await subject('Mathe')
			const grade = await gradebook.addGrade({
				subjectId: math.id,
				type: 'exam',
				value: 2.0,
				schoolYearStart: 2025,
				semester: 'first',
			})
			const other = await gradebook.addGrade({
				subjectId: math.id,
				type: 'exam',
				value: 2.0,
				schoolYearStart: 2024,
				semester: 'first',
			})
			const finalGrade = await gradebook.setFinalGrade(math.id, 2025, 'second', 1.0)

			expect(await gradebook.setGradingSystem(2025, 'points')).toEqual({ converted: 2 })
			expect((await db.grades.get(grade.id))?.value).toBe(11)
			expect((await db.finalGrades.get(finalGrade.id))?.value).toBe(14)
			expect((await db.grades.get(other.id))?.value).toBe(2.0)
			expect(await db.gradingSystems.get(2025)).toMatchObject({ gradingSystem: 'points', isExplicit: true })
		})

		it('marks the year explicit even when the system stays the same', async () => {
			expect(await gradebook.setGradingSystem(2025, 'traditional')).toEqual({ converted: 0 })
			expect(await db.gradingSystems.get(2025)).toMatchObject({ gradingSystem: 'traditional', isExplicit: true })
		})

		it('keeps values when asked to, as long as they fit the new range', async () => {
			const math = await subject('Mathe')
			const grade = await gradebook.addGrade({
				subjectId: math.id,
				type: 'oral',
				value: 2.0,
				schoolYearStart: 2025,
				semester: 'first',
			})
			expect(await gradebook.setGradingSystem(2025, 'points', { convertExisting: false })).toEqual({ converted: 0 })
			expect((await db.grades.get(grade.id))?.value).toBe(2.0)
		})

		it('rolls back when kept values do not fit the new range', async () => {
			const math = await subject('Mathe')
			await gradebook.setGradingSystem(2025, 'points')
			await gradebook.addGrade({ subjectId: math.id, type: 'oral', value: 12, schoolYearStart: 2025, semester: 'first' })

			await expect(
				gradebook.setGradingSystem(2025, 'traditional', { convertExisting: false }),
			).rejects.toMatchObject({ code: 'GRADE_OUT_OF_RANGE' })
			expect(await gradebook.gradingSystemFor(2025)).toBe('points')
		})
	})
})
