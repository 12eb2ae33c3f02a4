import Dexie from 'dexie'
import type { DexieOptions, Table } from 'dexie'
import type { FinalGradeEntity, GradeEntity, GradingSystemAssignment, SubjectEntity } from './types'

export class NotenbuchDB extends Dexie {
	subjects!: Table<SubjectEntity, string>
	grades!: Table<GradeEntity, string>
	finalGrades!: Table<FinalGradeEntity, string>
	gradingSystems!: Table<GradingSystemAssignment, number>

	constructor(name = 'NotenbuchDB', options?: DexieOptions) {
		super(name, options)
		this.version(1).stores({
			subjects: 'id, &name',
			grades: 'id, subjectId, schoolYearStart, [schoolYearStart+semester], [subjectId+schoolYearStart+semester]',
			finalGrades: 'id, subjectId, schoolYearStart, [schoolYearStart+semester], &[subjectId+schoolYearStart+semester]',
			gradingSystems: 'schoolYearStart',
		})
	}
}
