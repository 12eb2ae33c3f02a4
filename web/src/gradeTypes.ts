export type GradeTypeKey = 'exam' | 'test' | 'homework' | 'oral'

export interface GradeType {
	key: GradeTypeKey
	name: string
	weight: number
	icon: string
}

export const GRADE_TYPES: Record<GradeTypeKey, GradeType> = {
	exam: { key: 'exam', name: 'Klassenarbeit', weight: 3, icon: 'doc.text' },
	test: { key: 'test', name: 'Test', weight: 2, icon: 'pencil' },
	homework: { key: 'homework', name: 'Hausaufgabe', weight: 1, icon: 'house' },
	oral: { key: 'oral', name: 'Mündlich', weight: 1, icon: 'bubble.fill' },
}

export function isGradeTypeKey(raw: unknown): raw is GradeTypeKey {
	return typeof raw === 'string' && Object.prototype.hasOwnProperty.call(GRADE_TYPES, raw)
}

export function gradeTypeWeight(key: GradeTypeKey): number {
	return GRADE_TYPES[key].weight
}
