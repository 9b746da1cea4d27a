import { AggregateResult, ScoredArticle, SentimentCounts, SourcedEntry } from '../types/news.js'
import { FeedService } from './feedService.js'
import { DuplicateService } from './duplicateService.js'
import { SentimentClassifier } from './sentimentService.js'
import { CacheService } from './cacheService.js'

export const AGGREGATE_CACHE_KEY = 'headlines:all'

export interface PipelineOptions {
	articleLimit?: number
	cacheTtlSeconds?: number
	cacheKey?: string
}

export function countSentiments(rows: readonly ScoredArticle[]): SentimentCounts {
	const counts: SentimentCounts = { total: rows.length, positive: 0, negative: 0, neutral: 0 }
	for (const row of rows) {
		if (row.sentiment === 'Positive') counts.positive++
		else if (row.sentiment === 'Negative') counts.negative++
		else counts.neutral++
	}
	return counts
}

export class PipelineService {
	private feedService: FeedService
	private duplicateService: DuplicateService
	private classifier: SentimentClassifier
	private cacheService: CacheService
	private articleLimit: number
	private cacheTtlSeconds: number
	private cacheKey: string
	private inFlight: Promise<AggregateResult> | null = null
	private lastEntries: SourcedEntry[] = []

	constructor(
		feedService: FeedService,
		duplicateService: DuplicateService,
		classifier: SentimentClassifier,
		cacheService: CacheService,
		options: PipelineOptions = {}
	) {
		this.feedService = feedService
		this.duplicateService = duplicateService
		this.classifier = classifier
		this.cacheService = cacheService
		this.articleLimit = options.articleLimit ?? 30
		this.cacheTtlSeconds = options.cacheTtlSeconds ?? 300
		this.cacheKey = options.cacheKey ?? AGGREGATE_CACHE_KEY
	}

	get classifierName(): string {
		return this.classifier.name
	}

	/**
	 * Entries from the most recent fetch, before deduplication
	 */
	getLastEntries(): SourcedEntry[] {
		return [...this.lastEntries]
	}

	/**
	 * Fetch, dedupe, truncate, classify and count, bypassing the cache
	 */
	async computeAggregate(): Promise<AggregateResult> {
		const { entries, warnings } = await this.feedService.fetchAll()
		this.lastEntries = entries

		const articles = this.duplicateService.deduplicate(entries).slice(0, this.articleLimit)
		const rows = articles.map(
			(article): ScoredArticle =>
				Object.freeze({
					title: article.title,
					source: article.source,
					link: article.link,
					publishedAt: article.publishedAt,
					sentiment: this.classifier.classify(article.title)
				})
		)

		return Object.freeze({
			rows: Object.freeze(rows),
			counts: Object.freeze(countSentiments(rows)),
			warnings: Object.freeze(warnings.map((warning) => Object.freeze({ ...warning }))),
			generatedAt: new Date(),
			classifier: this.classifier.name
		})
	}

	/**
	 * Cached aggregate, computed on a miss. Concurrent misses share one run.
	 */
	async runPipeline(): Promise<AggregateResult> {
		const cached = this.cacheService.get(this.cacheKey)
		if (cached) return cached

		if (!this.inFlight) {
			this.inFlight = this.computeAggregate()
				.then((result) => {
					this.cacheService.put(this.cacheKey, result, this.cacheTtlSeconds)
					return result
				})
				.finally(() => {
					this.inFlight = null
				})
		}
		return this.inFlight
	}

	clearCache(): void {
		this.cacheService.invalidate(this.cacheKey)
	}

	async refresh(): Promise<AggregateResult> {
		this.clearCache()
		return this.runPipeline()
	}
}
