import { createKeywordClassifier, type ClassificationRule } from '../../process/classify.js'

export type FedDocumentType = 'fomc_statement' | 'speech' | 'testimony' | 'minutes' | 'press_release'

/** Export dataset per document type */
export const FED_DATASETS: Record<FedDocumentType, string> = {
  fomc_statement: 'statements',
  speech: 'speeches',
  testimony: 'testimony',
  minutes: 'minutes',
  press_release: 'press_releases',
}

// Order matters: the first matching rule wins
const RULES: readonly ClassificationRule<FedDocumentType>[] = [
  { type: 'fomc_statement', keywords: ['fomc', 'federal open market committee', 'policy statement'] },
  { type: 'speech', keywords: ['speech', 'remarks', 'statement by', 'governor', 'chair'] },
  { type: 'testimony', keywords: ['testimony', 'testifies', 'congress'] },
  { type: 'minutes', keywords: ['minutes', 'meeting minutes'] },
  {
    type: 'press_release',
    keywords: ['press release', 'announces', 'announcement', 'enforcement action', 'regulation'],
  },
]

export const classifyFedDocument = createKeywordClassifier(RULES, 'press_release')

// Vice Chair must be tried before Chair
const SPEAKER_PATTERNS: readonly RegExp[] = [
  /(Vice\s+Chair(?:man)?\s+\w+)/i,
  /(Chair(?:man)?\s+\w+)/i,
  /(Governor\s+\w+)/i,
]

/**
 * Speaker named in a speech title, e.g. "Chair Powell", or '' when none.
 */
export function extractSpeaker(title: string): string {
  for (const pattern of SPEAKER_PATTERNS) {
    const match = pattern.exec(title)
    if (match?.[1]) return match[1].trim()
  }
  return ''
}
