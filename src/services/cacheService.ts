import NodeCache from 'node-cache'
import { AggregateResult } from '../types/news.js'

export const DEFAULT_TTL_SECONDS = 300

export interface CacheEntry {
	result: AggregateResult
	createdAt: Date
	ttlSeconds: number
}

interface CacheStats {
	keys: number
	hits: number
	misses: number
	hitRate: number
}

export class CacheService {
	private cache: NodeCache
	private stats: { hits: number; misses: number }
	private defaultTtl: number

	constructor(ttlSeconds: number = DEFAULT_TTL_SECONDS) {
		this.defaultTtl = ttlSeconds
		this.cache = new NodeCache({
			stdTTL: ttlSeconds,
			// Expired entries are dropped on read, no background timer
			checkperiod: 0,
			useClones: false
		})

		this.stats = { hits: 0, misses: 0 }
	}

	/**
	 * Cached result for a key, or undefined on a miss
	 */
	get(key: string): AggregateResult | undefined {
		const entry = this.getEntry(key)
		if (entry) {
			this.stats.hits++
		} else {
			this.stats.misses++
		}
		return entry?.result
	}

	/**
	 * Full entry for a key, without touching the hit counters
	 */
	getEntry(key: string): CacheEntry | undefined {
		return this.cache.get<CacheEntry>(key)
	}

	put(key: string, result: AggregateResult, ttlSeconds: number = this.defaultTtl): void {
		const entry: CacheEntry = { result, createdAt: new Date(), ttlSeconds }
		this.cache.set(key, entry, ttlSeconds)
	}

	invalidate(key: string): boolean {
		return this.cache.del(key) > 0
	}

	/**
	 * Drops every entry and resets the counters
	 */
	clear(): void {
		this.cache.flushAll()
		this.stats = { hits: 0, misses: 0 }
	}

	getStats(): CacheStats {
		const lookups = this.stats.hits + this.stats.misses
		const hitRate = lookups > 0 ? (this.stats.hits / lookups) * 100 : 0

		return {
			keys: this.cache.keys().length,
			hits: this.stats.hits,
			misses: this.stats.misses,
			hitRate: parseFloat(hitRate.toFixed(2))
		}
	}
}
