export class SourceFetchError extends Error {
	readonly source: string

	constructor(source: string, message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = 'SourceFetchError'
		this.source = source
	}
}

export class ClassifierEstimatorError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = 'ClassifierEstimatorError'
	}
}

export class ValidationError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'ValidationError'
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}
