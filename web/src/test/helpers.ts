import { v4 as uuidv4 } from 'uuid'
import { NotenbuchDB } from '../db'
import { KeyValueDB } from '../kv'
import type { KeyValueEntry, KeyValueStore, StoredValue } from '../kv'

export function newTestDb(): NotenbuchDB {
	return new NotenbuchDB(`test-${uuidv4()}`)
}

export function newTestKeyValueDB(): KeyValueDB {
	return new KeyValueDB(`test-kv-${uuidv4()}`)
}

/** Promise-only store for tests that run under fake timers. */
export class MemoryStore implements KeyValueStore {
	readonly data = new Map<string, StoredValue>()

	async get(key: string) {
		return this.data.get(key)
	}

	async set(key: string, value: StoredValue) {
		this.data.set(key, value)
	}

	async remove(key: string) {
		this.data.delete(key)
	}

	async removeMany(keys: string[]) {
		for (const key of keys) this.data.delete(key)
	}

	async entriesWithPrefix(prefix: string): Promise<KeyValueEntry[]> {
		return Array.from(this.data.entries())
			.filter(([key]) => key.startsWith(prefix))
			.map(([key, value]) => ({ key, value }))
	}
}

/** Store whose every operation fails, as an unreachable shared container would. */
export class BrokenStore implements KeyValueStore {
	private fail(): Promise<never> {
		return Promise.reject(new Error('storage unavailable'))
	}

	get() {
		return this.fail()
	}

	set() {
		return this.fail()
	}

	remove() {
		return this.fail()
	}

	removeMany() {
		return this.fail()
	}

	entriesWithPrefix() {
		return this.fail()
	}
}
