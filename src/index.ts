export * from './lib/index.js'
export { analyzeCiphertext, type AnalysisProgress, type ProgressListener } from './analysis.js'
export { loadCorpus, loadFrequencyTable } from './corpus.js'
