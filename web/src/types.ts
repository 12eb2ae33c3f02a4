import type { GradingSystem } from './grading'
import type { GradeTypeKey } from './gradeTypes'
import type { Semester } from './period'

export interface SubjectEntity {
	id: string
	/** unique across all subjects */
	name: string
	colorHex: string
	icon: string
}

export interface GradeEntity {
	id: string
	subjectId: string
	type: GradeTypeKey
	value: number
	schoolYearStart: number
	semester: Semester
	date?: string // ISO string
}

/**
 * Manually entered end-of-semester grade. Replaces the computed average of
 * its subject for that period.
 */
export interface FinalGradeEntity {
	id: string
	subjectId: string
	schoolYearStart: number
	semester: Semester
	value: number
}

export interface GradingSystemAssignment {
	schoolYearStart: number
	gradingSystem: GradingSystem
	/**
	 * false while the record only holds the lazily created default; set once
	 * the user (or the settings migration) picked a system for the year
	 */
	isExplicit: boolean
	updatedAt: string // ISO string
}

export type NewSubject = Omit<SubjectEntity, 'id'>

export interface NewGrade {
	subjectId: string
	type: GradeTypeKey
	value: number
	schoolYearStart: number
	semester: Semester
	date?: string
}
