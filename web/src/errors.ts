export type GradebookErrorCode =
	| 'SUBJECT_NAME_EMPTY'
	| 'SUBJECT_NAME_TAKEN'
	| 'SUBJECT_NOT_FOUND'
	| 'GRADE_NOT_FOUND'
	| 'UNKNOWN_GRADE_TYPE'
	| 'GRADE_OUT_OF_RANGE'
	| 'SCHOOL_YEAR_OUT_OF_RANGE'

/** Rejected input at the point of entry. Aggregation never throws these. */
export class GradebookError extends Error {
	readonly code: GradebookErrorCode

	constructor(code: GradebookErrorCode, message?: string) {
		super(message ? `${code}: ${message}` : code)
		this.name = 'GradebookError'
		this.code = code
	}
}

export function isGradebookError(e: unknown): e is GradebookError {
	return e instanceof GradebookError
}
