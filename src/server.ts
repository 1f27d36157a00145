import { createApp } from './app.js'
import { loadConfig, loadEnvFile } from './config.js'
import { loadFrequencyTable } from './corpus.js'
import { charsetByName } from './lib/charset.js'
import { createSupabaseStore } from './supabase.js'

loadEnvFile()

const config = loadConfig()
const characterSet = charsetByName(config.charset)
const frequencyTable = await loadFrequencyTable(config.corpusPath, characterSet)

console.log('Configuration:', {
  corpus: config.corpusPath,
  charset: config.charset,
  keySize: config.keySize,
  persistence: config.supabase ? 'supabase' : 'disabled'
})

const app = createApp(
  {
    frequencyTable,
    characterSet,
    keySize: config.keySize,
    store: config.supabase ? createSupabaseStore(config.supabase) : undefined,
    logger: console
  },
  { maxUploadBytes: config.maxUploadBytes }
)

app.listen(config.port, () => {
  console.log(`Server running on port ${config.port}`)
})
