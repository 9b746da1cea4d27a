import { DuplicateTitle, SourcedEntry } from '../types/news.js'

export class DuplicateService {
	/**
	 * Keeps the first entry for every exact title, in first-seen order
	 */
	deduplicate<T extends { title: string }>(entries: readonly T[]): T[] {
		const unique = new Map<string, T>()
		for (const entry of entries) {
			if (!unique.has(entry.title)) {
				unique.set(entry.title, entry)
			}
		}
		return [...unique.values()]
	}

	/**
	 * Lists titles reported more than once, with every source that reported them
	 */
	findDuplicateTitles(entries: readonly SourcedEntry[]): DuplicateTitle[] {
		const groups = new Map<string, DuplicateTitle>()
		for (const entry of entries) {
			const group = groups.get(entry.title)
			if (group) {
				group.occurrences++
				if (!group.sources.includes(entry.source)) group.sources.push(entry.source)
			} else {
				groups.set(entry.title, { title: entry.title, sources: [entry.source], occurrences: 1 })
			}
		}
		return [...groups.values()].filter((group) => group.occurrences > 1)
	}
}
