/**
 * Keyword classification of documents into a closed set of types.
 *
 * Rules are evaluated in order against the lowercased title and summary;
 * the first rule with a matching keyword wins, otherwise the fallback.
 */

export interface ClassificationRule<T extends string> {
  type: T
  keywords: readonly string[]
}

export type Classifier<T extends string> = (title: string, summary?: string) => T

export function createKeywordClassifier<T extends string>(
  rules: readonly ClassificationRule<T>[],
  fallback: T
): Classifier<T> {
  const normalized = rules.map(rule => ({
    type: rule.type,
    keywords: rule.keywords.map(keyword => keyword.toLowerCase()),
  }))

  return (title, summary = '') => {
    const text = `${title} ${summary}`.toLowerCase()
    for (const rule of normalized) {
      if (rule.keywords.some(keyword => text.includes(keyword))) {
        return rule.type
      }
    }
    return fallback
  }
}
