import { createKeywordClassifier, type ClassificationRule } from '../../process/classify.js'

export type BoeDocumentType = 'speech' | 'monetary_policy_summary' | 'mpc_statement' | 'press_release'

/** Export dataset per document type */
export const BOE_DATASETS: Record<BoeDocumentType, string> = {
  speech: 'speeches',
  monetary_policy_summary: 'summaries',
  mpc_statement: 'mpc',
  press_release: 'statements',
}

// Matched against the URL first, then the title
const RULES: readonly ClassificationRule<BoeDocumentType>[] = [
  { type: 'speech', keywords: ['/speech/', '/speeches/'] },
  { type: 'monetary_policy_summary', keywords: ['monetary-policy-summary'] },
  { type: 'mpc_statement', keywords: ['/monetary-policy-committee/', '/mpc/', 'monetary policy committee'] },
]

const classify = createKeywordClassifier(RULES, 'press_release')

export function classifyBoeDocument(url: string, title = ''): BoeDocumentType {
  return classify(url, title)
}
