import * as natural from 'natural'
import fs from 'fs'
import path from 'path'
import { z } from 'zod'
import { Lexicon, Sentiment, SentimentExplanation } from '../types/news.js'
import { ClassifierEstimatorError, errorMessage } from '../errors.js'
import { ClassifierKind } from '../config.js'

export const DEFAULT_LEXICON_PATH = path.join(__dirname, '..', '..', 'data', 'finance-lexicon.json')
export const DEFAULT_TRAINING_PATH = path.join(__dirname, '..', '..', 'data', 'headline-training.json')

// Polarity inside this band does not break a lexicon tie
export const POLARITY_DEAD_ZONE = 0.1

export interface SentimentClassifier {
	readonly name: string
	classify(text: string): Sentiment
}

/**
 * Scores overall valence of a sentence in [-1, 1].
 */
export interface PolarityEstimator {
	estimate(text: string): number
}

const lexiconSchema = z.object({
	positive: z.array(z.string().min(1)),
	negative: z.array(z.string().min(1))
})

const trainingSchema = z.array(
	z.object({
		text: z.string().min(1),
		label: z.enum(['Positive', 'Negative', 'Neutral'])
	})
)

function readJson(filePath: string): unknown {
	return JSON.parse(fs.readFileSync(filePath, 'utf-8'))
}

function distinctLowerCase(words: string[]): string[] {
	return [...new Set(words.map((word) => word.toLowerCase()))]
}

export function loadLexicon(filePath: string = DEFAULT_LEXICON_PATH): Lexicon {
	const lexicon = lexiconSchema.parse(readJson(filePath))
	return {
		positive: distinctLowerCase(lexicon.positive),
		negative: distinctLowerCase(lexicon.negative)
	}
}

export function isSentiment(value: string): value is Sentiment {
	return value === 'Positive' || value === 'Negative' || value === 'Neutral'
}

/**
 * AFINN word scores averaged over the sentence, scaled from [-5, 5] down to [-1, 1].
 */
export class AfinnPolarityEstimator implements PolarityEstimator {
	private tokenizer: natural.WordTokenizer
	private analyzer: natural.SentimentAnalyzer

	constructor() {
		this.tokenizer = new natural.WordTokenizer()
		this.analyzer = new natural.SentimentAnalyzer('English', natural.PorterStemmer, 'afinn')
	}

	estimate(text: string): number {
		const tokens = this.tokenizer.tokenize(text.toLowerCase()) ?? []
		if (tokens.length === 0) return 0

		const comparative = this.analyzer.getSentiment(tokens)
		return Math.max(-1, Math.min(1, comparative / 5))
	}
}

export class LexiconPolarityClassifier implements SentimentClassifier {
	readonly name = 'lexicon'
	private lexicon: Lexicon
	private estimator: PolarityEstimator

	constructor(lexicon: Lexicon = loadLexicon(), estimator: PolarityEstimator = new AfinnPolarityEstimator()) {
		this.lexicon = {
			positive: distinctLowerCase(lexicon.positive),
			negative: distinctLowerCase(lexicon.negative)
		}
		this.estimator = estimator
	}

	classify(text: string): Sentiment {
		return this.explain(text).label
	}

	/**
	 * Lexicon matches are substring hits on the lower-cased text, counted once per distinct entry.
	 * Polarity only decides ties.
	 */
	explain(text: string): SentimentExplanation {
		const lowered = text.toLowerCase()
		const positiveWords = this.lexicon.positive.filter((word) => lowered.includes(word))
		const negativeWords = this.lexicon.negative.filter((word) => lowered.includes(word))
		const polarity = this.polarityOf(text)

		let label: Sentiment
		if (positiveWords.length > negativeWords.length) {
			label = 'Positive'
		} else if (negativeWords.length > positiveWords.length) {
			label = 'Negative'
		} else if (polarity > POLARITY_DEAD_ZONE) {
			label = 'Positive'
		} else if (polarity < -POLARITY_DEAD_ZONE) {
			label = 'Negative'
		} else {
			label = 'Neutral'
		}

		return { label, positiveWords, negativeWords, polarity }
	}

	private polarityOf(text: string): number {
		try {
			const polarity = this.estimator.estimate(text)
			if (!Number.isFinite(polarity)) {
				throw new ClassifierEstimatorError(`Polarity estimator returned ${polarity}`)
			}
			return polarity
		} catch (error) {
			const failure =
				error instanceof ClassifierEstimatorError
					? error
					: new ClassifierEstimatorError(`Polarity estimator failed: ${errorMessage(error)}`, { cause: error })
			console.error(`${failure.message}, using neutral polarity`)
			return 0
		}
	}
}

/**
 * Naive Bayes over stemmed headline tokens, trained once from a labelled corpus.
 */
export class ModelBasedClassifier implements SentimentClassifier {
	readonly name = 'model'
	private model: natural.BayesClassifier

	constructor(trainingPath: string = DEFAULT_TRAINING_PATH) {
		const examples = trainingSchema.parse(readJson(trainingPath))
		if (examples.length === 0) {
			throw new Error(`Training corpus is empty: ${trainingPath}`)
		}

		this.model = new natural.BayesClassifier()
		for (const example of examples) {
			this.model.addDocument(example.text, example.label)
		}
		this.model.train()
	}

	classify(text: string): Sentiment {
		const ranked = this.model.getClassifications(text)
		if (ranked.length === 0) return 'Neutral'

		const [best, runnerUp] = ranked
		// No evidence either way
		if (runnerUp && runnerUp.value === best.value) return 'Neutral'

		return isSentiment(best.label) ? best.label : 'Neutral'
	}
}

export function createClassifier(kind: ClassifierKind): SentimentClassifier {
	switch (kind) {
		case 'lexicon':
			return new LexiconPolarityClassifier()
		case 'model':
			return new ModelBasedClassifier()
	}
}
