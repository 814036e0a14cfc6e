/**
 * FRED series collected by default, keyed by the dataset name used in
 * export files and watermarks.
 */

export interface FredSeries {
  seriesId: string
  dataset: string
  description: string
}

export const FRED_SERIES: readonly FredSeries[] = [
  { seriesId: 'STLFSI4', dataset: 'financial_stress', description: 'St. Louis Fed Financial Stress Index' },
  { seriesId: 'DFF', dataset: 'federal_funds_rate', description: 'Federal Funds Effective Rate' },
  { seriesId: 'CPIAUCSL', dataset: 'cpi', description: 'Consumer Price Index for All Urban Consumers' },
  { seriesId: 'UNRATE', dataset: 'unemployment_rate', description: 'Unemployment Rate' },
]
