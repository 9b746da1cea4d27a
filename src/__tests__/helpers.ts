import fs from 'fs'
import path from 'path'
import { FeedSource } from '../types/news'
import { FeedLoader, FeedService } from '../services/feedService'
import { DuplicateService } from '../services/duplicateService'
import { LexiconPolarityClassifier, loadLexicon, PolarityEstimator } from '../services/sentimentService'
import { CacheService } from '../services/cacheService'
import { PipelineService } from '../services/pipelineService'
import { ToolContext } from '../tools'

export const MARKETS: FeedSource = { name: 'Markets Desk', url: 'https://markets.example.com/rss' }
export const WIRE: FeedSource = { name: 'Business Wire', url: 'https://wire.example.com/rss' }
export const BROKEN: FeedSource = { name: 'Broken Feed', url: 'https://broken.example.com/rss' }

export function readFixture(name: string): string {
	return fs.readFileSync(path.join(__dirname, 'fixtures', name), 'utf-8')
}

/**
 * Serves fixture XML by url; unknown urls fail like a refused connection
 */
export function fixtureLoader(documents: Record<string, string> = {}): FeedLoader {
	const byUrl: Record<string, string> = {
		[MARKETS.url]: readFixture('markets.xml'),
		[WIRE.url]: readFixture('wire.xml'),
		...documents
	}
	return async (url) => {
		const xml = byUrl[url]
		if (xml === undefined) throw new Error('connect ECONNREFUSED')
		return xml
	}
}

export class FixedPolarity implements PolarityEstimator {
	private value: number

	constructor(value: number) {
		this.value = value
	}

	estimate(): number {
		return this.value
	}
}

/**
 * Services over fixture feeds, with a zero-polarity lexicon classifier
 */
export function buildToolContext(sources: FeedSource[] = [MARKETS, WIRE]): ToolContext {
	const feedService = new FeedService(sources, { loader: fixtureLoader() })
	const duplicateService = new DuplicateService()
	const classifier = new LexiconPolarityClassifier(loadLexicon(), new FixedPolarity(0))
	const cacheService = new CacheService(300)
	return {
		pipeline: new PipelineService(feedService, duplicateService, classifier, cacheService),
		classifier,
		lexiconClassifier: classifier,
		cacheService,
		duplicateService,
		sources
	}
}
