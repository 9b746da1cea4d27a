import { Server } from 'http'
import { createApp } from '../web-server'
import { FeedService } from '../services/feedService'
import { ToolContext } from '../tools'
import { BROKEN, buildToolContext, MARKETS, WIRE } from './helpers'

describe('createApp', () => {
	let consoleError: jest.SpyInstance
	let server: Server | null = null

	async function serve(context: ToolContext): Promise<string> {
		const listening = createApp(context).listen(0, '127.0.0.1')
		server = listening
		await new Promise<void>((resolve) => listening.once('listening', () => resolve()))
		const address = listening.address()
		if (address === null || typeof address === 'string') throw new Error('Server has no TCP address')
		return `http://127.0.0.1:${address.port}`
	}

	beforeEach(() => {
		consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined)
	})

	afterEach(async () => {
		jest.restoreAllMocks()
		const open = server
		server = null
		if (open) {
			await new Promise<void>((resolve, reject) => open.close((error) => (error ? reject(error) : resolve())))
		}
	})

	it('filters rows by sentiment but counts the full set', async () => {
		const base = await serve(buildToolContext())

		const response = await fetch(`${base}/api/news?sentiment=neutral`)

		expect(response.status).toBe(200)
		expect(await response.json()).toMatchObject({
			success: true,
			count: 2,
			counts: { total: 4, positive: 1, negative: 1, neutral: 2 },
			warnings: [],
			classifier: 'lexicon',
			data: [{ title: 'RBI keeps repo rate unchanged' }, { title: 'Rupee steady ahead of policy' }]
		})
	})

	it('applies the limit to the returned rows only', async () => {
		const base = await serve(buildToolContext())

		const body = await (await fetch(`${base}/api/news?limit=1`)).json()

		expect(body).toMatchObject({ success: true, count: 4, data: [{ title: 'Market gains as shares rise to record high' }] })
	})

	it('answers 400 for an unknown sentiment', async () => {
		const base = await serve(buildToolContext())

		const response = await fetch(`${base}/api/news?sentiment=bullish`)

		expect(response.status).toBe(400)
		expect(await response.json()).toEqual({
			success: false,
			error: 'Unknown sentiment "bullish", expected one of Positive, Negative, Neutral'
		})
	})

	it('answers 400 for a non-positive limit', async () => {
		const base = await serve(buildToolContext())

		const response = await fetch(`${base}/api/news?limit=-1`)

		expect(response.status).toBe(400)
		expect(await response.json()).toMatchObject({ success: false, error: expect.stringMatching(/^limit: /) })
	})

	it('reports source failures as warnings, not errors', async () => {
		const base = await serve(buildToolContext([MARKETS, BROKEN]))

		const response = await fetch(`${base}/api/news`)

		expect(response.status).toBe(200)
		expect(await response.json()).toMatchObject({
			success: true,
			count: 3,
			warnings: [{ source: 'Broken Feed', message: 'Feed could not be downloaded: connect ECONNREFUSED' }]
		})
		expect(consoleError).toHaveBeenCalledWith('Feed read error (Broken Feed): Feed could not be downloaded: connect ECONNREFUSED')
	})

	it('answers 500 when the pipeline fails', async () => {
		const context = buildToolContext()
		jest.spyOn(context.pipeline, 'runPipeline').mockRejectedValue(new Error('cache offline'))
		const base = await serve(context)

		const response = await fetch(`${base}/api/news`)

		expect(response.status).toBe(500)
		expect(await response.json()).toEqual({ success: false, error: 'cache offline' })
	})

	it('refresh fetches the feeds again', async () => {
		const fetchAll = jest.spyOn(FeedService.prototype, 'fetchAll')
		const base = await serve(buildToolContext())

		await fetch(`${base}/api/news`)
		const response = await fetch(`${base}/api/refresh`, { method: 'POST' })

		expect(response.status).toBe(200)
		expect(await response.json()).toMatchObject({
			success: true,
			counts: { total: 4, positive: 1, negative: 1, neutral: 2 },
			warnings: []
		})
		expect(fetchAll).toHaveBeenCalledTimes(2)
	})

	it('classifies posted text', async () => {
		const base = await serve(buildToolContext())

		const response = await fetch(`${base}/api/classify`, {
			method: 'POST',
			headers: { 'Content-Type': 'application/json' },
			body: JSON.stringify({ text: 'Shares tumble as losses mount amid downgrade' })
		})

		expect(response.status).toBe(200)
		expect(await response.json()).toMatchObject({
			success: true,
			data: {
				text: 'Shares tumble as losses mount amid downgrade',
				label: 'Negative',
				classifier: 'lexicon',
				lexicon: { label: 'Negative', polarity: 0 }
			}
		})
	})

	it('answers 400 for blank text', async () => {
		const base = await serve(buildToolContext())

		const response = await fetch(`${base}/api/classify`, {
			method: 'POST',
			headers: { 'Content-Type': 'application/json' },
			body: JSON.stringify({ text: '   ' })
		})

		expect(response.status).toBe(400)
		expect(await response.json()).toEqual({ success: false, error: 'text: text must not be empty' })
	})

	it('lists the configured sources', async () => {
		const base = await serve(buildToolContext())

		expect(await (await fetch(`${base}/api/sources`)).json()).toEqual({ success: true, data: [MARKETS, WIRE] })
	})

	it('reports cache statistics', async () => {
		const base = await serve(buildToolContext())

		await fetch(`${base}/api/news`)
		const body = await (await fetch(`${base}/api/cache-stats`)).json()

		expect(body).toMatchObject({ success: true, data: { keys: 1 } })
	})
})
