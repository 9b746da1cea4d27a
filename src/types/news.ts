export interface FeedSource {
	name: string
	url: string
}

export interface RawEntry {
	title: string
	link: string
	publishedAt: string | null
}

export interface SourcedEntry extends RawEntry {
	source: string
}

export type Sentiment = 'Positive' | 'Negative' | 'Neutral'

export const SENTIMENTS: readonly Sentiment[] = ['Positive', 'Negative', 'Neutral']

export interface ScoredArticle extends SourcedEntry {
	readonly sentiment: Sentiment
}

export interface SentimentCounts {
	total: number
	positive: number
	negative: number
	neutral: number
}

export interface SourceWarning {
	source: string
	message: string
}

export interface FetchOutcome {
	entries: SourcedEntry[]
	warnings: SourceWarning[]
}

export interface AggregateResult {
	readonly rows: readonly ScoredArticle[]
	readonly counts: Readonly<SentimentCounts>
	readonly warnings: readonly SourceWarning[]
	readonly generatedAt: Date
	readonly classifier: string
}

// Sentiment Analysis Types
export interface SentimentExplanation {
	label: Sentiment
	positiveWords: string[]
	negativeWords: string[]
	polarity: number
}

export interface Lexicon {
	positive: string[]
	negative: string[]
}

// Duplicate Detection Types
export interface DuplicateTitle {
	title: string
	sources: string[]
	occurrences: number
}
