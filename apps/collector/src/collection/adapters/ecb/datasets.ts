/**
 * ECB SDMX datasets.
 *
 * The FM (financial markets) dataflow is event-based and has no reliable
 * incremental window, so policy rates are always fetched in full.
 */

export interface EcbDataset {
  dataset: string
  flow: string
  key: string
  description: string
  fullRefresh: boolean
}

export const ECB_DATASETS: readonly EcbDataset[] = [
  {
    dataset: 'policy_rates',
    flow: 'FM',
    key: 'B.U2.EUR.4F.KR.MRR_FR+DFR+MRR_MBR.LEV',
    description: 'ECB key interest rates',
    fullRefresh: true,
  },
  {
    dataset: 'exchange_rates',
    flow: 'EXR',
    key: 'D.USD+GBP+JPY+CHF.EUR.SP00.A',
    description: 'EUR reference exchange rates',
    fullRefresh: false,
  },
]
