import fs from 'fs'
import type { CharacterSet } from './lib/charset.js'
import { buildFrequencyTable, type FrequencyTable } from './lib/frequency.js'

const { readFile } = fs.promises

// Frequency tables by corpus path and character set, built once per process
const tables = new Map<string, Promise<FrequencyTable>>()

export async function loadCorpus(corpusPath: string): Promise<string> {
  return readFile(corpusPath, 'utf8')
}

export function loadFrequencyTable(corpusPath: string, characterSet: CharacterSet): Promise<FrequencyTable> {
  const cacheKey = `${corpusPath}\u0000${[...characterSet].join('')}`
  const cached = tables.get(cacheKey)
  if (cached) return cached

  const pending = loadCorpus(corpusPath)
    .then(text => buildFrequencyTable(characterSet, text))
    .catch((error: unknown) => {
      tables.delete(cacheKey)
      throw error
    })
  tables.set(cacheKey, pending)
  return pending
}
