import { ScoredArticle, Sentiment, SENTIMENTS } from './types/news.js'
import { ValidationError } from './errors.js'

/**
 * Accepts labels like "positive,NEGATIVE" and returns them in canonical form.
 */
export function parseSentimentList(raw: string | string[] | undefined): Sentiment[] {
	if (raw === undefined) return []

	const parts = (Array.isArray(raw) ? raw : raw.split(','))
		.map((part) => part.trim())
		.filter((part) => part.length > 0)

	const labels: Sentiment[] = []
	for (const part of parts) {
		const label = SENTIMENTS.find((sentiment) => sentiment.toLowerCase() === part.toLowerCase())
		if (!label) {
			throw new ValidationError(`Unknown sentiment "${part}", expected one of ${SENTIMENTS.join(', ')}`)
		}
		if (!labels.includes(label)) labels.push(label)
	}
	return labels
}

/**
 * Keeps rows with one of the given labels; no labels keeps everything
 */
export function filterBySentiment(rows: readonly ScoredArticle[], labels: readonly Sentiment[]): ScoredArticle[] {
	if (labels.length === 0) return [...rows]
	return rows.filter((row) => labels.includes(row.sentiment))
}
