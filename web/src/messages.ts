import seedrandom from 'seedrandom'
import type { GradingSystem } from './grading'

export interface MessageOptions {
	/** fixed seed for a repeatable pick */
	seed?: string
}

const START = [
	"Los geht's! Deine Erfolgsgeschichte beginnt jetzt!",
	'Auf zu neuen Höhen! Jede Note bringt dich weiter!',
]
const EXCELLENT = [
	'Hervorragend! Du bist ein echtes Talent!',
	'Fantastische Leistung! Du zeigst, was in dir steckt!',
]
const SOLID = [
	'Solide Arbeit! Mit etwas mehr Einsatz schaffst du noch mehr!',
	'Guter Grundstein! Du bist auf dem richtigen Weg nach oben!',
]
const KEEP_GOING = [
	'Du packst das! Jede Anstrengung zahlt sich aus!',
	'Bleib dran! Der Erfolg ist näher als du denkst!',
]
const DONT_GIVE_UP = [
	'Jeder Anfang ist schwer! Du schaffst die Wende!',
	'Nicht aufgeben! In dir steckt mehr, als du glaubst!',
]

export const NO_GRADES_MESSAGE = 'Hey, lass uns gemeinsam durchstarten!'

function messagesFor(average: number, system: GradingSystem): string[] {
	if (system === 'traditional') {
		if (average >= 0.7 && average < 2.5) return EXCELLENT
		if (average >= 2.5 && average < 3.5) return SOLID
		if (average >= 3.5 && average < 4.5) return KEEP_GOING
		if (average >= 4.5 && average <= 6.0) return DONT_GIVE_UP
		return START
	}
	if (average >= 12 && average <= 15) return EXCELLENT
	if (average >= 8 && average < 12) return SOLID
	if (average >= 4 && average < 8) return KEEP_GOING
	if (average >= 0 && average < 4) return DONT_GIVE_UP
	return START
}

export function pickMessage(messages: readonly string[], options?: MessageOptions): string {
	const rng = seedrandom(options?.seed ?? undefined)
	const index = Math.min(messages.length - 1, Math.floor(rng.quick() * messages.length))
	return messages[index] ?? ''
}

export function performanceMessage(
	average: number | undefined,
	system: GradingSystem,
	options?: MessageOptions,
): string {
	if (average === undefined) return NO_GRADES_MESSAGE
	return pickMessage(messagesFor(average, system), options)
}
