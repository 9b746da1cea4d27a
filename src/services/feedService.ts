import RSSParser from 'rss-parser'
import axios from 'axios'
import { FeedSource, FetchOutcome, RawEntry, SourcedEntry, SourceWarning } from '../types/news.js'
import { SourceFetchError, errorMessage } from '../errors.js'

/**
 * Downloads a feed document and returns its raw XML.
 */
export type FeedLoader = (url: string, timeoutMs: number) => Promise<string>

export interface FeedServiceOptions {
	entryLimit?: number
	timeoutMs?: number
	loader?: FeedLoader
}

export const httpFeedLoader: FeedLoader = async (url, timeoutMs) => {
	const response = await axios.get<string>(url, {
		headers: {
			'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
			Accept: 'application/rss+xml, application/atom+xml, application/xml;q=0.9, */*;q=0.8'
		},
		responseType: 'text',
		timeout: timeoutMs
	})
	return response.data
}

/**
 * Collapses whitespace in a feed title. Text is otherwise kept as published, so `<` and `&` survive.
 */
export function normalizeTitle(raw: string): string {
	return raw.replace(/\s+/g, ' ').trim()
}

export class FeedService {
	private parser: RSSParser
	private sources: FeedSource[]
	private entryLimit: number
	private timeoutMs: number
	private loader: FeedLoader

	constructor(sources: FeedSource[], options: FeedServiceOptions = {}) {
		this.parser = new RSSParser()
		this.sources = [...sources]
		this.entryLimit = options.entryLimit ?? 10
		this.timeoutMs = options.timeoutMs ?? 10000
		this.loader = options.loader ?? httpFeedLoader
	}

	getSources(): FeedSource[] {
		return [...this.sources]
	}

	/**
	 * Reads one source and returns its first entries in feed order
	 */
	async fetchSource(source: FeedSource): Promise<RawEntry[]> {
		let xml: string
		try {
			xml = await this.loadWithTimeout(source)
		} catch (error) {
			if (error instanceof SourceFetchError) throw error
			throw new SourceFetchError(source.name, `Feed could not be downloaded: ${errorMessage(error)}`, { cause: error })
		}

		let items: RSSParser.Item[]
		try {
			const feed = await this.parser.parseString(xml)
			items = feed.items
		} catch (error) {
			throw new SourceFetchError(source.name, `Feed could not be parsed: ${errorMessage(error)}`, { cause: error })
		}

		const entries: RawEntry[] = []
		for (const item of items.slice(0, this.entryLimit)) {
			const title = normalizeTitle(item.title ?? '')
			const link = (item.link ?? '').trim()
			if (!title || !link) continue

			entries.push({
				title,
				link,
				publishedAt: item.pubDate ?? item.isoDate ?? null
			})
		}
		return entries
	}

	/**
	 * Fetches every source concurrently and reassembles the entries in configured source order.
	 * A failing source yields no entries and one warning.
	 */
	async fetchAll(): Promise<FetchOutcome> {
		const settled = await Promise.allSettled(this.sources.map((source) => this.fetchSource(source)))

		const entries: SourcedEntry[] = []
		const warnings: SourceWarning[] = []

		settled.forEach((outcome, index) => {
			const source = this.sources[index]
			if (outcome.status === 'fulfilled') {
				for (const entry of outcome.value) {
					entries.push({ ...entry, source: source.name })
				}
				return
			}

			const message = errorMessage(outcome.reason)
			console.error(`Feed read error (${source.name}): ${message}`)
			warnings.push({ source: source.name, message })
		})

		return { entries, warnings }
	}

	private loadWithTimeout(source: FeedSource): Promise<string> {
		return new Promise<string>((resolve, reject) => {
			const timer = setTimeout(() => {
				reject(new SourceFetchError(source.name, `Feed timed out after ${this.timeoutMs}ms`))
			}, this.timeoutMs)

			this.loader(source.url, this.timeoutMs).then(
				(xml) => {
					clearTimeout(timer)
					resolve(xml)
				},
				(error: unknown) => {
					clearTimeout(timer)
					reject(error)
				}
			)
		})
	}
}
