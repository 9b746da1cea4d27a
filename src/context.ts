import { AppConfig } from './config.js'
import { FeedLoader, FeedService } from './services/feedService.js'
import { DuplicateService } from './services/duplicateService.js'
import { createClassifier, LexiconPolarityClassifier } from './services/sentimentService.js'
import { CacheService } from './services/cacheService.js'
import { PipelineService } from './services/pipelineService.js'
import { ToolContext } from './tools.js'

/**
 * Wires the services from configuration; the loader is swappable for tests.
 */
export function createContext(config: AppConfig, loader?: FeedLoader): ToolContext {
	const feedService = new FeedService(config.sources, {
		entryLimit: config.entryLimit,
		timeoutMs: config.feedTimeoutMs,
		loader
	})
	const duplicateService = new DuplicateService()
	const lexiconClassifier = new LexiconPolarityClassifier()
	const classifier = config.classifier === 'lexicon' ? lexiconClassifier : createClassifier(config.classifier)
	const cacheService = new CacheService(config.cacheTtlSeconds)

	const pipeline = new PipelineService(feedService, duplicateService, classifier, cacheService, {
		articleLimit: config.articleLimit,
		cacheTtlSeconds: config.cacheTtlSeconds
	})

	return {
		pipeline,
		classifier,
		lexiconClassifier,
		cacheService,
		duplicateService,
		sources: feedService.getSources()
	}
}
