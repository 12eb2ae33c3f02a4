import Dexie from 'dexie'
import type { DexieOptions, Table } from 'dexie'

export type StoredValue = string | number | boolean

export interface KeyValueEntry {
	key: string
	value: StoredValue
}

/**
 * Minimal key/value storage. The primary process uses one for plain user
 * settings and one shared with the widget process.
 */
export interface KeyValueStore {
	get(key: string): Promise<StoredValue | undefined>
	set(key: string, value: StoredValue): Promise<void>
	remove(key: string): Promise<void>
	removeMany(keys: string[]): Promise<void>
	entriesWithPrefix(prefix: string): Promise<KeyValueEntry[]>
}

export class KeyValueDB extends Dexie implements KeyValueStore {
	entries!: Table<KeyValueEntry, string>

	constructor(name: string, options?: DexieOptions) {
		super(name, options)
		this.version(1).stores({
			entries: 'key',
		})
	}

	async get(key: string): Promise<StoredValue | undefined> {
		const entry = await this.entries.get(key)
		return entry?.value
	}

	async set(key: string, value: StoredValue): Promise<void> {
		await this.entries.put({ key, value })
	}

	async remove(key: string): Promise<void> {
		await this.entries.delete(key)
	}

	async removeMany(keys: string[]): Promise<void> {
		await this.entries.bulkDelete(keys)
	}

	async entriesWithPrefix(prefix: string): Promise<KeyValueEntry[]> {
		return this.entries.where('key').startsWith(prefix).toArray()
	}
}

/**
 * Opens a shared key/value database, or returns undefined when the host has no
 * IndexedDB to put it in (the equivalent of an unprovisioned app group).
 */
export function openKeyValueStore(name: string, indexedDB?: IDBFactory): KeyValueDB | undefined {
	const factory = indexedDB ?? (typeof globalThis.indexedDB === 'undefined' ? undefined : globalThis.indexedDB)
	if (!factory) {
		console.warn('[Storage]', 'IndexedDB not available; key/value store not provisioned', { name })
		return undefined
	}
	return new KeyValueDB(name, { indexedDB: factory, IDBKeyRange: Dexie.dependencies.IDBKeyRange })
}

export async function getNumber(store: KeyValueStore, key: string): Promise<number | undefined> {
	const value = await store.get(key)
	return typeof value === 'number' && Number.isFinite(value) ? value : undefined
}

export async function getString(store: KeyValueStore, key: string): Promise<string | undefined> {
	const value = await store.get(key)
	return typeof value === 'string' ? value : undefined
}

export async function getBoolean(store: KeyValueStore, key: string): Promise<boolean | undefined> {
	const value = await store.get(key)
	return typeof value === 'boolean' ? value : undefined
}
