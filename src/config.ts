import dotenv from 'dotenv'
import path from 'path'
import { fileURLToPath } from 'url'
import { isCharsetName, type CharsetName } from './lib/charset.js'
import type { KeySizeOptions } from './lib/repeatingKey.js'

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

export const PROJECT_ROOT = path.join(__dirname, '..')
export const DEFAULT_CORPUS_PATH = path.join(PROJECT_ROOT, 'data/corpus/english.txt')

export class ConfigError extends Error {
  readonly variable: string

  constructor(variable: string, message: string) {
    super(`${variable}: ${message}`)
    this.name = 'ConfigError'
    this.variable = variable
  }
}

export interface SupabaseConfig {
  url: string
  serviceRoleKey: string
}

export interface AppConfig {
  port: number
  corpusPath: string
  charset: CharsetName
  keySize: KeySizeOptions
  maxUploadBytes: number
  supabase?: SupabaseConfig
}

export type Environment = Record<string, string | undefined>

let envLoaded = false

// Load .env from the project root into process.env (once)
export function loadEnvFile(): void {
  if (envLoaded) return
  dotenv.config({ path: path.join(PROJECT_ROOT, '.env') })
  envLoaded = true
}

function positiveInteger(env: Environment, variable: string, fallback: number): number {
  const raw = env[variable]
  if (raw === undefined || raw.trim() === '') return fallback

  const value = Number(raw)
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(variable, `expected a positive integer, got "${raw}"`)
  }
  return value
}

export function loadConfig(env: Environment = process.env): AppConfig {
  const charset = env.CHARSET?.trim() || 'alphanumeric'
  if (!isCharsetName(charset)) {
    throw new ConfigError('CHARSET', `expected "alphanumeric" or "printable", got "${charset}"`)
  }

  const supabaseUrl = env.SUPABASE_URL
  const supabaseServiceRoleKey = env.SUPABASE_SERVICE_ROLE_KEY

  return {
    port: positiveInteger(env, 'PORT', 8080),
    corpusPath: env.CORPUS_PATH ? path.resolve(PROJECT_ROOT, env.CORPUS_PATH) : DEFAULT_CORPUS_PATH,
    charset,
    keySize: {
      topN: positiveInteger(env, 'KEY_SIZE_TOP_N', 3),
      chunksToSample: positiveInteger(env, 'KEY_SIZE_CHUNKS', 4),
      maxKeySize: positiveInteger(env, 'MAX_KEY_SIZE', 40),
    },
    maxUploadBytes: positiveInteger(env, 'MAX_UPLOAD_BYTES', 10 * 1024 * 1024),
    ...(supabaseUrl && supabaseServiceRoleKey
      ? { supabase: { url: supabaseUrl, serviceRoleKey: supabaseServiceRoleKey } }
      : {}),
  }
}
