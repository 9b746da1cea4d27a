import express, { Response } from 'express'
import cors from 'cors'
import dotenv from 'dotenv'
import { z } from 'zod'
import { loadConfig } from './config.js'
import { createContext } from './context.js'
import { ToolContext } from './tools.js'
import { filterBySentiment, parseSentimentList } from './filters.js'
import { RefreshScheduler } from './services/refreshScheduler.js'
import { ValidationError, errorMessage } from './errors.js'

const newsQuery = z.object({
	sentiment: z.union([z.string(), z.array(z.string())]).optional(),
	limit: z.coerce.number().int().positive().optional()
})

const classifyBody = z.object({
	text: z.string().trim().min(1, 'text must not be empty')
})

function sendError(res: Response, error: unknown): void {
	const status = error instanceof ValidationError || error instanceof z.ZodError ? 400 : 500
	const message =
		error instanceof z.ZodError ? error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ') : errorMessage(error)
	res.status(status).json({
		success: false,
		error: message
	})
}

export function createApp(context: ToolContext): express.Express {
	const app = express()

	app.use(cors())
	app.use(express.json())

	// Headlines, optionally filtered by sentiment; counts always cover the full set
	app.get('/api/news', async (req, res) => {
		try {
			const { sentiment, limit } = newsQuery.parse(req.query)
			const labels = parseSentimentList(sentiment)

			const result = await context.pipeline.runPipeline()
			const filtered = filterBySentiment(result.rows, labels)

			res.json({
				success: true,
				count: filtered.length,
				counts: result.counts,
				warnings: result.warnings,
				generatedAt: result.generatedAt.toISOString(),
				classifier: result.classifier,
				data: limit ? filtered.slice(0, limit) : filtered
			})
		} catch (error) {
			sendError(res, error)
		}
	})

	app.post('/api/refresh', async (_req, res) => {
		try {
			const result = await context.pipeline.refresh()
			res.json({
				success: true,
				counts: result.counts,
				warnings: result.warnings,
				generatedAt: result.generatedAt.toISOString()
			})
		} catch (error) {
			sendError(res, error)
		}
	})

	app.post('/api/classify', (req, res) => {
		try {
			const { text } = classifyBody.parse(req.body ?? {})
			res.json({
				success: true,
				data: {
					text,
					label: context.classifier.classify(text),
					classifier: context.classifier.name,
					lexicon: context.lexiconClassifier.explain(text)
				}
			})
		} catch (error) {
			sendError(res, error)
		}
	})

	app.get('/api/sources', (_req, res) => {
		res.json({ success: true, data: context.sources })
	})

	app.get('/api/cache-stats', (_req, res) => {
		res.json({ success: true, data: context.cacheService.getStats() })
	})

	return app
}

if (require.main === module) {
	dotenv.config()

	const config = loadConfig()
	const context = createContext(config)
	const app = createApp(context)

	if (config.autoRefreshSeconds > 0) {
		new RefreshScheduler(context.pipeline, config.autoRefreshSeconds).start()
	}

	app.listen(config.port, () => {
		console.error(`Finance headline API listening on http://localhost:${config.port}`)
		console.error(`- Classifier: ${context.classifier.name}`)
		console.error(`- Auto-refresh: ${config.autoRefreshSeconds > 0 ? `${config.autoRefreshSeconds}s` : 'off'}`)
	})
}
