import { DEFAULT_SOURCES, loadConfig, parseSources } from '../config'

describe('loadConfig', () => {
	it('falls back to defaults', () => {
		const config = loadConfig({})

		expect(config).toEqual({
			sources: [...DEFAULT_SOURCES],
			entryLimit: 10,
			articleLimit: 30,
			feedTimeoutMs: 10000,
			cacheTtlSeconds: 300,
			classifier: 'lexicon',
			autoRefreshSeconds: 0,
			port: 3000,
			serverName: 'finance-headline-desk',
			serverVersion: '0.1.0'
		})
		expect(config.sources.map((source) => source.name)).toEqual([
			'Economic Times',
			'Moneycontrol',
			'Business Standard',
			'LiveMint Markets',
			'Financial Express'
		])
	})

	it('reads numeric and enum settings', () => {
		const config = loadConfig({
			FEED_ENTRY_LIMIT: '5',
			ARTICLE_LIMIT: '40',
			CACHE_TTL: '60',
			CLASSIFIER: 'model',
			AUTO_REFRESH_SECONDS: '300'
		})

		expect(config.entryLimit).toBe(5)
		expect(config.articleLimit).toBe(40)
		expect(config.cacheTtlSeconds).toBe(60)
		expect(config.classifier).toBe('model')
		expect(config.autoRefreshSeconds).toBe(300)
	})

	it('treats empty values as unset', () => {
		expect(loadConfig({ CACHE_TTL: '', FEED_SOURCES: '' }).cacheTtlSeconds).toBe(300)
	})

	it('names the variable that failed', () => {
		expect(() => loadConfig({ CLASSIFIER: 'finbert' })).toThrow(/CLASSIFIER/)
		expect(() => loadConfig({ CACHE_TTL: 'soon' })).toThrow(/CACHE_TTL/)
		expect(() => loadConfig({ ARTICLE_LIMIT: '0' })).toThrow(/ARTICLE_LIMIT/)
	})
})

describe('parseSources', () => {
	it('reads Name|url pairs in order', () => {
		expect(parseSources('Desk A|https://a.example.com/rss, Desk B|https://b.example.com/rss?x=1')).toEqual([
			{ name: 'Desk A', url: 'https://a.example.com/rss' },
			{ name: 'Desk B', url: 'https://b.example.com/rss?x=1' }
		])
	})

	it('rejects malformed pairs', () => {
		expect(() => parseSources('https://a.example.com/rss')).toThrow('FEED_SOURCES entry must look like "Name|url": https://a.example.com/rss')
		expect(() => parseSources('Desk A|not a url')).toThrow('FEED_SOURCES entry "Desk A" has an invalid url: not a url')
		expect(() => parseSources(' , ')).toThrow('FEED_SOURCES is set but lists no sources')
	})
})
