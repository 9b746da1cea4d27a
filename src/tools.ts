import { z } from 'zod'
import type { Resource, Tool } from '@modelcontextprotocol/sdk/types.js'
import { FeedSource } from './types/news.js'
import { PipelineService } from './services/pipelineService.js'
import { LexiconPolarityClassifier, SentimentClassifier } from './services/sentimentService.js'
import { CacheService } from './services/cacheService.js'
import { DuplicateService } from './services/duplicateService.js'
import { filterBySentiment, parseSentimentList } from './filters.js'
import { ValidationError, errorMessage } from './errors.js'

export interface ToolContext {
	pipeline: PipelineService
	classifier: SentimentClassifier
	lexiconClassifier: LexiconPolarityClassifier
	cacheService: CacheService
	duplicateService: DuplicateService
	sources: FeedSource[]
}

// Type aliases rather than interfaces so the MCP result types accept them
export type TextContent = { type: 'text'; text: string }
export type ToolResponse = { content: TextContent[]; isError?: boolean }
export type ResourceResponse = { contents: { uri: string; mimeType: string; text: string }[] }

export const TOOL_DEFINITIONS: Tool[] = [
	{
		name: 'finance_news',
		description: 'Latest finance headlines with a sentiment label per headline',
		inputSchema: {
			type: 'object',
			properties: {
				sentiment: {
					type: 'string',
					description: 'Comma-separated labels to keep: Positive, Negative, Neutral (default: all)'
				},
				limit: {
					type: 'number',
					description: 'Maximum number of headlines to return'
				}
			}
		}
	},
	{
		name: 'refresh_news',
		description: 'Drops cached headlines and fetches every feed again',
		inputSchema: { type: 'object', properties: {} }
	},
	{
		name: 'classify_headline',
		description: 'Labels a single headline and shows which lexicon words matched',
		inputSchema: {
			type: 'object',
			properties: {
				text: { type: 'string', description: 'Headline to classify' }
			},
			required: ['text']
		}
	},
	{
		name: 'duplicate_headlines',
		description: 'Headlines reported more than once across feeds in the last fetch',
		inputSchema: { type: 'object', properties: {} }
	}
]

export const RESOURCE_DEFINITIONS: Resource[] = [
	{
		uri: 'news://headlines',
		name: 'Headlines',
		description: 'Current scored headlines with summary counts',
		mimeType: 'application/json'
	},
	{
		uri: 'news://sources',
		name: 'Feed sources',
		description: 'Configured feeds in priority order',
		mimeType: 'application/json'
	},
	{
		uri: 'news://cache-stats',
		name: 'Cache stats',
		description: 'Headline cache usage',
		mimeType: 'application/json'
	}
]

const financeNewsArgs = z.object({
	sentiment: z.string().optional(),
	limit: z.number().int().positive().optional()
})

const classifyArgs = z.object({
	text: z.string().trim().min(1, 'text must not be empty')
})

function parseArgs<T>(schema: z.ZodType<T>, args: unknown): T {
	const parsed = schema.safeParse(args ?? {})
	if (!parsed.success) {
		throw new ValidationError(parsed.error.issues.map((issue) => `${issue.path.join('.') || 'args'}: ${issue.message}`).join('; '))
	}
	return parsed.data
}

function text(value: string): TextContent {
	return { type: 'text', text: value }
}

function json(value: unknown): TextContent {
	return text(JSON.stringify(value, null, 2))
}

export async function handleToolCall(context: ToolContext, name: string, args: unknown): Promise<ToolResponse> {
	try {
		switch (name) {
			case 'finance_news': {
				const { sentiment, limit } = parseArgs(financeNewsArgs, args)
				const labels = parseSentimentList(sentiment)

				const result = await context.pipeline.runPipeline()
				const filtered = filterBySentiment(result.rows, labels)
				const rows = limit ? filtered.slice(0, limit) : filtered

				if (result.rows.length === 0) {
					return {
						content: [text('No headlines available right now. Try refresh_news later.'), json({ warnings: result.warnings })]
					}
				}

				return {
					content: [
						text(`Returning ${rows.length} of ${result.counts.total} headlines.`),
						json({
							rows,
							counts: result.counts,
							warnings: result.warnings,
							generatedAt: result.generatedAt.toISOString(),
							classifier: result.classifier
						})
					]
				}
			}

			case 'refresh_news': {
				const result = await context.pipeline.refresh()
				return {
					content: [
						text(`Refreshed ${result.counts.total} headlines from ${context.sources.length} sources.`),
						json({ counts: result.counts, warnings: result.warnings })
					]
				}
			}

			case 'classify_headline': {
				const { text: headline } = parseArgs(classifyArgs, args)
				const explanation = context.lexiconClassifier.explain(headline)
				return {
					content: [
						json({
							text: headline,
							label: context.classifier.classify(headline),
							classifier: context.classifier.name,
							lexicon: explanation
						})
					]
				}
			}

			case 'duplicate_headlines': {
				await context.pipeline.runPipeline()
				const duplicates = context.duplicateService.findDuplicateTitles(context.pipeline.getLastEntries())
				if (duplicates.length === 0) {
					return { content: [text('No headline was reported by more than one feed entry.')] }
				}
				return {
					content: [text(`Headlines reported more than once: ${duplicates.length}`), json(duplicates)]
				}
			}

			default:
				throw new ValidationError(`Unknown tool: ${name}`)
		}
	} catch (error) {
		return {
			content: [text(`Error: ${errorMessage(error)}`)],
			isError: true
		}
	}
}

export async function readResource(context: ToolContext, uri: string): Promise<ResourceResponse> {
	let payload: unknown
	switch (uri) {
		case 'news://headlines': {
			const result = await context.pipeline.runPipeline()
			payload = { ...result, generatedAt: result.generatedAt.toISOString() }
			break
		}
		case 'news://sources':
			payload = { sources: context.sources }
			break
		case 'news://cache-stats':
			payload = context.cacheService.getStats()
			break
		default:
			throw new ValidationError(`Unknown resource: ${uri}`)
	}

	return {
		contents: [
			{
				uri,
				mimeType: 'application/json',
				text: JSON.stringify(payload, null, 2)
			}
		]
	}
}
