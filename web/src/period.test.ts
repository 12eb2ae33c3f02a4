import { describe, expect, it } from 'vitest'
import {
	currentSchoolYear,
	isSelectableStartYear,
	parseSemester,
	sameSchoolYear,
	schoolYear,
	schoolYearDisplayName,
	schoolYearFromStorage,
	selectableStartYears,
	SEMESTERS,
	semesterDisplayName,
	semesterShortName,
} from './period'

describe('school year', () => {
	it('starts the school year in August', () => {
		expect(currentSchoolYear(new Date(2025, 6, 15)).startYear).toBe(2024)
		expect(currentSchoolYear(new Date(2025, 7, 1)).startYear).toBe(2025)
		expect(currentSchoolYear(new Date(2025, 8, 10)).startYear).toBe(2025)
		expect(currentSchoolYear(new Date(2026, 0, 5)).startYear).toBe(2025)
	})

	it('derives the end year and display name', () => {
		const year = schoolYear(2024)
		expect(year).toEqual({ startYear: 2024, endYear: 2025, gradingSystem: 'traditional' })
		expect(schoolYearDisplayName(year)).toBe('2024/2025')
	})

	it('compares by start year and grading system', () => {
		expect(sameSchoolYear(schoolYear(2024), schoolYear(2024, 'traditional'))).toBe(true)
		expect(sameSchoolYear(schoolYear(2024), schoolYear(2024, 'points'))).toBe(false)
		expect(sameSchoolYear(schoolYear(2024), schoolYear(2023))).toBe(false)
	})

	it('rebuilds from storage with fallbacks', () => {
		const september = new Date(2025, 8, 1)
		expect(schoolYearFromStorage(2023, 'points', september)).toEqual(schoolYear(2023, 'points'))
		expect(schoolYearFromStorage(2023, 'letters', september)).toEqual(schoolYear(2023, 'traditional'))
		expect(schoolYearFromStorage(0, 'points', september)).toEqual(schoolYear(2025, 'points'))
		expect(schoolYearFromStorage(undefined, undefined, september)).toEqual(schoolYear(2025))
	})

	it('limits selection to 2000 through 2099', () => {
		expect(isSelectableStartYear(1999)).toBe(false)
		expect(isSelectableStartYear(2000)).toBe(true)
		expect(isSelectableStartYear(2099)).toBe(true)
		expect(isSelectableStartYear(2100)).toBe(false)
		expect(isSelectableStartYear(2024.5)).toBe(false)
		const years = selectableStartYears()
		expect(years).toHaveLength(100)
		expect(years[0]).toBe(2000)
		expect(years[99]).toBe(2099)
	})
})

describe('semester', () => {
	it('has display and short names', () => {
		expect(SEMESTERS.map(semesterDisplayName)).toEqual(['1. Halbjahr', '2. Halbjahr'])
		expect(semesterDisplayName('first')).toBe('1. Halbjahr')
		expect(semesterDisplayName('second')).toBe('2. Halbjahr')
		expect(semesterShortName('second')).toBe('2. HJ')
	})

	it('reads unknown tags as the first semester', () => {
		expect(parseSemester('second')).toBe('second')
		expect(parseSemester('third')).toBe('first')
		expect(parseSemester(2)).toBe('first')
	})
})
