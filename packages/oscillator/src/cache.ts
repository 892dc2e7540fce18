/**
 * Single-Flight TTL Cache
 *
 * Memoizes oscillator computations per request key. Concurrent callers of
 * the same key share one in-flight computation; a failed computation is not
 * stored. Entries expire after a TTL and the least recently used entry is
 * evicted once the cache is full.
 *
 * Stored values are deep-frozen: every caller of a key receives the same
 * object, so none of them may change it.
 */

import type { DateRange } from "@oscillo/indicators";

export interface SingleFlightCacheOptions {
	ttlMs: number;
	maxEntries: number;
	/** Clock, injectable for tests */
	now?: () => number;
}

export interface CacheMetrics {
	hits: number;
	misses: number;
	/** Callers that joined a computation already in flight */
	coalesced: number;
	evictions: number;
	size: number;
	inFlight: number;
}

interface CacheEntry<T> {
	value: T;
	expiresAt: number;
}

/**
 * Freeze a value and everything reachable from it.
 */
export function deepFreeze<T>(value: T): T {
	if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
		Object.freeze(value);
		for (const child of Object.values(value)) {
			deepFreeze(child);
		}
	}
	return value;
}

export class SingleFlightCache<T> {
	private readonly entries = new Map<string, CacheEntry<T>>();
	private readonly inFlight = new Map<string, Promise<T>>();
	private readonly ttlMs: number;
	private readonly maxEntries: number;
	private readonly now: () => number;

	private hits = 0;
	private misses = 0;
	private coalesced = 0;
	private evictions = 0;
	/** Bumped by clear(); results of older computations are not stored */
	private generation = 0;

	constructor(options: SingleFlightCacheOptions) {
		this.ttlMs = options.ttlMs;
		this.maxEntries = options.maxEntries;
		this.now = options.now ?? Date.now;
	}

	/**
	 * Fresh value for the key, refreshing its recency. Does not touch metrics.
	 */
	peek(key: string): T | undefined {
		const entry = this.entries.get(key);
		if (!entry) {
			return undefined;
		}
		if (this.now() >= entry.expiresAt) {
			this.entries.delete(key);
			return undefined;
		}
		// Map iteration order doubles as recency order
		this.entries.delete(key);
		this.entries.set(key, entry);
		return entry.value;
	}

	set(key: string, value: T): void {
		this.entries.delete(key);
		this.entries.set(key, { value: deepFreeze(value), expiresAt: this.now() + this.ttlMs });
		while (this.entries.size > this.maxEntries) {
			const oldest = this.entries.keys().next();
			if (oldest.done) {
				break;
			}
			this.entries.delete(oldest.value);
			this.evictions++;
		}
	}

	/**
	 * Cached value for the key, or the result of `compute`, started at most
	 * once per key at a time.
	 */
	async getOrCompute(key: string, compute: () => Promise<T>): Promise<T> {
		const cached = this.peek(key);
		if (cached !== undefined) {
			this.hits++;
			return cached;
		}

		const pending = this.inFlight.get(key);
		if (pending) {
			this.coalesced++;
			return pending;
		}

		this.misses++;
		const generation = this.generation;
		const computation = Promise.resolve()
			.then(compute)
			.then((value) => {
				if (generation !== this.generation) {
					return deepFreeze(value);
				}
				this.set(key, value);
				return value;
			})
			.finally(() => {
				if (generation === this.generation) {
					this.inFlight.delete(key);
				}
			});
		this.inFlight.set(key, computation);
		return computation;
	}

	delete(key: string): boolean {
		return this.entries.delete(key);
	}

	/**
	 * Drop every stored value. Computations already in flight still resolve
	 * for their callers but are not stored, and later callers start afresh.
	 */
	clear(): void {
		this.generation++;
		this.entries.clear();
		this.inFlight.clear();
	}

	metrics(): CacheMetrics {
		return {
			hits: this.hits,
			misses: this.misses,
			coalesced: this.coalesced,
			evictions: this.evictions,
			size: this.entries.size,
			inFlight: this.inFlight.size,
		};
	}
}

export interface CacheKeyParts {
	datasetId: string;
	window: number;
	range: DateRange;
	/** Anything else the result depends on (mode, method, weights) */
	variant?: string;
}

export function buildCacheKey({ datasetId, window, range, variant }: CacheKeyParts): string {
	const key = `${datasetId}|w${window}|${range.start}-${range.end}`;
	return variant ? `${key}|${variant}` : key;
}
