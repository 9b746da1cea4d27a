import { z } from 'zod'
import { FeedSource } from './types/news.js'

// Indian finance market feeds, in priority order
export const DEFAULT_SOURCES: readonly FeedSource[] = [
	{ name: 'Economic Times', url: 'https://economictimes.indiatimes.com/markets/rssfeeds/1977021501.cms' },
	{ name: 'Moneycontrol', url: 'https://www.moneycontrol.com/rss/latestnews.xml' },
	{ name: 'Business Standard', url: 'https://www.business-standard.com/rss/home_page_top_stories.rss' },
	{ name: 'LiveMint Markets', url: 'https://www.livemint.com/rss/markets' },
	{ name: 'Financial Express', url: 'https://www.financialexpress.com/market/rss' }
]

export type ClassifierKind = 'lexicon' | 'model'

export interface AppConfig {
	sources: FeedSource[]
	entryLimit: number
	articleLimit: number
	feedTimeoutMs: number
	cacheTtlSeconds: number
	classifier: ClassifierKind
	autoRefreshSeconds: number
	port: number
	serverName: string
	serverVersion: string
}

/**
 * Parses `Name|url` pairs separated by commas.
 */
export function parseSources(raw: string): FeedSource[] {
	const sources = raw
		.split(',')
		.map((pair) => pair.trim())
		.filter((pair) => pair.length > 0)
		.map((pair) => {
			const separator = pair.indexOf('|')
			if (separator <= 0 || separator === pair.length - 1) {
				throw new Error(`FEED_SOURCES entry must look like "Name|url": ${pair}`)
			}
			const name = pair.slice(0, separator).trim()
			const url = pair.slice(separator + 1).trim()
			if (!z.string().url().safeParse(url).success) {
				throw new Error(`FEED_SOURCES entry "${name}" has an invalid url: ${url}`)
			}
			return { name, url }
		})

	if (sources.length === 0) {
		throw new Error('FEED_SOURCES is set but lists no sources')
	}
	return sources
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback)

const envSchema = z.object({
	FEED_SOURCES: z.string().optional(),
	FEED_ENTRY_LIMIT: positiveInt(10),
	ARTICLE_LIMIT: positiveInt(30),
	FEED_TIMEOUT_MS: positiveInt(10000),
	CACHE_TTL: positiveInt(300),
	CLASSIFIER: z.enum(['lexicon', 'model']).default('lexicon'),
	AUTO_REFRESH_SECONDS: z.coerce.number().int().nonnegative().default(0),
	PORT: positiveInt(3000),
	MCP_SERVER_NAME: z.string().min(1).default('finance-headline-desk'),
	MCP_SERVER_VERSION: z.string().min(1).default('0.1.0')
})

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	// Empty strings count as unset, like a blank line in .env
	const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''))
	const parsed = envSchema.safeParse(present)
	if (!parsed.success) {
		const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
		throw new Error(`Invalid configuration: ${issues.join('; ')}`)
	}

	const vars = parsed.data
	return {
		sources: vars.FEED_SOURCES ? parseSources(vars.FEED_SOURCES) : [...DEFAULT_SOURCES],
		entryLimit: vars.FEED_ENTRY_LIMIT,
		articleLimit: vars.ARTICLE_LIMIT,
		feedTimeoutMs: vars.FEED_TIMEOUT_MS,
		cacheTtlSeconds: vars.CACHE_TTL,
		classifier: vars.CLASSIFIER,
		autoRefreshSeconds: vars.AUTO_REFRESH_SECONDS,
		port: vars.PORT,
		serverName: vars.MCP_SERVER_NAME,
		serverVersion: vars.MCP_SERVER_VERSION
	}
}
