/**
 * Grading system definitions: value ranges, display text, performance bands
 * and conversion between the two German scales.
 *
 * Everything in here is pure. User preferences are passed in, never read.
 */

export type GradingSystem = 'traditional' | 'points'

export const GRADING_SYSTEMS: readonly GradingSystem[] = ['traditional', 'points']

export interface GradingSystemInfo {
	displayName: string
	minValue: number
	maxValue: number
	/** true when a lower value is the better grade */
	lowerIsBetter: boolean
}

export const GRADING_SYSTEM_INFO: Record<GradingSystem, GradingSystemInfo> = {
	traditional: { displayName: 'Noten (1-6)', minValue: 0.7, maxValue: 6.0, lowerIsBetter: true },
	points: { displayName: 'Punkte (0-15)', minValue: 0.0, maxValue: 15.0, lowerIsBetter: false },
}

export const DEFAULT_GRADING_SYSTEM: GradingSystem = 'traditional'

export function isGradingSystem(raw: unknown): raw is GradingSystem {
	return raw === 'traditional' || raw === 'points'
}

/** Unknown tags (e.g. written by a newer app version) read as traditional. */
export function parseGradingSystem(raw: unknown): GradingSystem {
	return isGradingSystem(raw) ? raw : DEFAULT_GRADING_SYSTEM
}

export interface DisplayOptions {
	roundPointAverages: boolean
}

export const DEFAULT_DISPLAY_OPTIONS: DisplayOptions = { roundPointAverages: true }

const TRADITIONAL_NOTATION: readonly (readonly [number, string])[] = [
	[0.7, '1+'], [1.0, '1'], [1.3, '1-'],
	[1.7, '2+'], [2.0, '2'], [2.3, '2-'],
	[2.7, '3+'], [3.0, '3'], [3.3, '3-'],
	[3.7, '4+'], [4.0, '4'], [4.3, '4-'],
	[4.7, '5+'], [5.0, '5'], [5.3, '5-'],
	[5.7, '6+'], [6.0, '6'],
]

const TABLE_TOLERANCE = 1e-9

function traditionalNotation(value: number): string | undefined {
	const hit = TRADITIONAL_NOTATION.find(([v]) => Math.abs(v - value) < TABLE_TOLERANCE)
	return hit?.[1]
}

/**
 * One-decimal text with ties rounded to even. The only doubles that sit
 * exactly on a tie at one decimal are the quarters (x.25, x.75).
 */
function oneDecimal(value: number): string {
	if (Number.isInteger(value * 4) && !Number.isInteger(value * 2)) {
		const lower = Math.floor(value * 10)
		return ((lower % 2 === 0 ? lower : lower + 1) / 10).toFixed(1)
	}
	return value.toFixed(1)
}

export function gradeDisplayText(
	value: number,
	system: GradingSystem,
	options: DisplayOptions = DEFAULT_DISPLAY_OPTIONS,
): string {
	if (system === 'traditional') {
		return traditionalNotation(value) ?? oneDecimal(value)
	}
	if (options.roundPointAverages) return `${Math.round(value)} P`
	return `${oneDecimal(value)} P`
}

export type PerformanceLevel =
	| 'excellent'
	| 'good'
	| 'satisfactory'
	| 'sufficient'
	| 'poor'
	| 'insufficient'
	| 'none'

export type BandColor = 'green' | 'blue' | 'cyan' | 'orange' | 'red' | 'pink' | 'gray'

export const PERFORMANCE_LEVELS: Record<PerformanceLevel, { title: string; color: BandColor }> = {
	excellent: { title: 'Sehr gut', color: 'green' },
	good: { title: 'Gut', color: 'blue' },
	satisfactory: { title: 'Befriedigend', color: 'cyan' },
	sufficient: { title: 'Ausreichend', color: 'orange' },
	poor: { title: 'Mangelhaft', color: 'red' },
	insufficient: { title: 'Ungenügend', color: 'pink' },
	none: { title: 'Keine Noten', color: 'gray' },
}

// Lower bound inclusive, upper bound exclusive, except the band touching the
// worst end of the traditional scale and the best end of the points scale.
const TRADITIONAL_BANDS: readonly (readonly [number, number, PerformanceLevel])[] = [
	[0.7, 1.7, 'excellent'],
	[1.7, 2.7, 'good'],
	[2.7, 3.7, 'satisfactory'],
	[3.7, 4.7, 'sufficient'],
	[4.7, 5.7, 'poor'],
]

// 0 alone is insufficient; poor starts right above it
const POINTS_BANDS: readonly (readonly [number, number, PerformanceLevel])[] = [
	[3, 6, 'sufficient'],
	[6, 9, 'satisfactory'],
	[9, 12, 'good'],
]

export function performanceLevel(value: number, system: GradingSystem): PerformanceLevel {
	if (!Number.isFinite(value)) return 'none'
	if (system === 'traditional') {
		const band = TRADITIONAL_BANDS.find(([lo, hi]) => value >= lo && value < hi)
		if (band) return band[2]
		return value >= 5.7 && value <= 6.0 ? 'insufficient' : 'none'
	}
	if (value === 0) return 'insufficient'
	if (value > 0 && value < 3) return 'poor'
	const band = POINTS_BANDS.find(([lo, hi]) => value >= lo && value < hi)
	if (band) return band[2]
	return value >= 12 && value <= 15 ? 'excellent' : 'none'
}

export function gradeColor(value: number, system: GradingSystem): BandColor {
	return PERFORMANCE_LEVELS[performanceLevel(value, system)].color
}

export function isValidGrade(value: number | null | undefined, system: GradingSystem): value is number {
	if (value === null || value === undefined || !Number.isFinite(value)) return false
	const { minValue, maxValue } = GRADING_SYSTEM_INFO[system]
	return value >= minValue && value <= maxValue
}

export interface ValidationResult {
	isValid: boolean
	errors: string[]
}

export function validateGradeValue(value: number, system: GradingSystem): ValidationResult {
	const errors: string[] = []
	const { minValue, maxValue } = GRADING_SYSTEM_INFO[system]
	if (!Number.isFinite(value)) {
		errors.push('Value must be a valid number')
	} else if (value < minValue || value > maxValue) {
		errors.push(`Value must be between ${minValue} and ${maxValue} for ${system}`)
	}
	return { isValid: errors.length === 0, errors }
}

export function validationDescription(system: GradingSystem): string {
	return system === 'traditional' ? 'Noten zwischen 1+ (0,7) und 6 (6,0)' : 'Punkte zwischen 0 und 15'
}

export interface GradeOption {
	value: number
	display: string
	color: BandColor
}

export function gradeOptions(system: GradingSystem): GradeOption[] {
	const values =
		system === 'traditional'
			? TRADITIONAL_NOTATION.map(([v]) => v)
			: Array.from({ length: 16 }, (_, i) => 15 - i)
	return values.map((value) => ({
		value,
		display: gradeDisplayText(value, system),
		color: gradeColor(value, system),
	}))
}

/** Final grades in the traditional system are whole grades only. */
export function finalGradeOptions(system: GradingSystem): GradeOption[] {
	if (system === 'points') return gradeOptions(system)
	return [1, 2, 3, 4, 5, 6].map((value) => ({
		value,
		display: gradeDisplayText(value, system),
		color: gradeColor(value, system),
	}))
}

// 6+ and 6 both map to 0 points
const TRADITIONAL_TO_POINTS: readonly (readonly [number, number])[] = [
	[0.7, 15], [1.0, 14], [1.3, 13],
	[1.7, 12], [2.0, 11], [2.3, 10],
	[2.7, 9], [3.0, 8], [3.3, 7],
	[3.7, 6], [4.0, 5], [4.3, 4],
	[4.7, 3], [5.0, 2], [5.3, 1],
	[5.7, 0], [6.0, 0],
]

const POINTS_TO_TRADITIONAL: readonly number[] = [
	6.0, 5.3, 5.0, 4.7, 4.3, 4.0, 3.7, 3.3, 3.0, 2.7, 2.3, 2.0, 1.7, 1.3, 1.0, 0.7,
]

function clamp(value: number, min: number, max: number): number {
	return Math.max(min, Math.min(max, value))
}

function traditionalToPoints(value: number): number {
	const hit = TRADITIONAL_TO_POINTS.find(([v]) => Math.abs(v - value) < TABLE_TOLERANCE)
	if (hit) return hit[1]
	const normalized = (clamp(value, 0.7, 6.0) - 0.7) / (6.0 - 0.7)
	return clamp(Math.round(15 - normalized * 15), 0, 15)
}

function pointsToTraditional(value: number): number {
	const rounded = Math.round(value)
	const hit = POINTS_TO_TRADITIONAL[rounded]
	if (hit !== undefined) return hit
	const normalized = (15 - clamp(value, 0, 15)) / 15
	return clamp(0.7 + normalized * (6.0 - 0.7), 0.7, 6.0)
}

export function convertGrade(value: number, from: GradingSystem, to: GradingSystem): number {
	if (from === to) return value
	return from === 'traditional' ? traditionalToPoints(value) : pointsToTraditional(value)
}
