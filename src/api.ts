import { analyzeCiphertext } from './analysis.js'
import type { CharacterSet } from './lib/charset.js'
import { decodeBase64, decodeHex, encodeBase64, encodeHex } from './lib/encoding.js'
import { EncodingError, type Encoding } from './lib/errors.js'
import type { FrequencyTable } from './lib/frequency.js'
import type { KeySizeOptions } from './lib/repeatingKey.js'
import { breakSingleByteXor } from './lib/singleByteXor.js'
import { repeatingKeyXor } from './lib/xor.js'
import type { SolutionStore } from './supabase.js'

export interface ApiContext {
  frequencyTable: FrequencyTable
  characterSet: CharacterSet
  keySize: KeySizeOptions
  store?: SolutionStore
  logger?: Pick<typeof console, 'log' | 'warn' | 'error'>
}

export interface ApiResponse {
  status: number
  body: Record<string, unknown>
}

// Client mistakes; turned into 400 responses
export class RequestError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'RequestError'
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function requireString(body: Record<string, unknown>, field: string): string {
  const value = body[field]
  if (typeof value !== 'string' || value.length === 0) {
    throw new RequestError(`${field} is required`)
  }
  return value
}

function readEncoding(body: Record<string, unknown>, fallback: Encoding): Encoding {
  const value = body.encoding
  if (value === undefined || value === '') return fallback
  if (value === 'hex' || value === 'base64') return value
  throw new RequestError('encoding must be "hex" or "base64"')
}

// JSON numbers or multipart strings
function readPositiveInteger(body: Record<string, unknown>, field: string, fallback: number): number {
  const value = body[field]
  if (value === undefined || value === '') return fallback

  const parsed = typeof value === 'string' ? Number(value) : value
  if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed <= 0) {
    throw new RequestError(`${field} must be a positive integer`)
  }
  return parsed
}

function decodeCiphertext(ciphertext: string, encoding: Encoding): Buffer {
  return encoding === 'hex' ? decodeHex(ciphertext.trim()) : decodeBase64(ciphertext)
}

function badRequest(error: unknown): ApiResponse | undefined {
  if (error instanceof RequestError || error instanceof EncodingError) {
    return { status: 400, body: { error: error.message } }
  }
  return undefined
}

export function handleBreakSingleByte(body: unknown, context: ApiContext): ApiResponse {
  try {
    if (!isRecord(body)) throw new RequestError('JSON body is required')

    const bytes = decodeCiphertext(requireString(body, 'ciphertext'), readEncoding(body, 'hex'))
    const result = breakSingleByteXor(bytes, context.frequencyTable, context.characterSet)
    if (!result) {
      return { status: 422, body: { error: 'No single-byte key produced valid text' } }
    }

    return {
      status: 200,
      body: { key: result.key, score: result.score, plaintext: result.plaintext }
    }
  } catch (error) {
    const response = badRequest(error)
    if (response) return response
    throw error
  }
}

function parseRepeatingKeyRequest(
  body: unknown,
  defaults: KeySizeOptions,
  upload: string | undefined
): { bytes: Buffer; keySize: KeySizeOptions } {
  const fields: Record<string, unknown> = isRecord(body) ? body : {}
  const bytes = upload !== undefined
    ? decodeBase64(upload)
    : decodeCiphertext(requireString(fields, 'ciphertext'), readEncoding(fields, 'base64'))

  return {
    bytes,
    keySize: {
      topN: readPositiveInteger(fields, 'topN', defaults.topN),
      chunksToSample: readPositiveInteger(fields, 'chunksToSample', defaults.chunksToSample),
      maxKeySize: readPositiveInteger(fields, 'maxKeySize', defaults.maxKeySize),
    },
  }
}

/**
 * Recover a repeating XOR key. `body` is the JSON body or the multipart fields;
 * `upload` is the text of an uploaded Base64 file, which takes precedence.
 */
export async function handleBreakRepeatingKey(
  body: unknown,
  context: ApiContext,
  upload?: string
): Promise<ApiResponse> {
  let request: { bytes: Buffer; keySize: KeySizeOptions }
  try {
    request = parseRepeatingKeyRequest(body, context.keySize, upload)
  } catch (error) {
    const response = badRequest(error)
    if (response) return response
    throw error
  }
  const { bytes, keySize } = request

  const outcome = analyzeCiphertext(bytes, {
    ...keySize,
    frequencyTable: context.frequencyTable,
    characterSet: context.characterSet,
  })

  if (outcome.status === 'error') {
    throw new Error(outcome.error ?? 'Ciphertext analysis failed')
  }

  const solution = outcome.solution
  if (!solution) {
    return {
      status: 422,
      body: { error: outcome.message ?? 'No key could be recovered', keySizes: outcome.keySizes ?? [] }
    }
  }

  const plaintext = solution.plaintext.toString('utf8')
  const responseBody: Record<string, unknown> = {
    key: solution.key,
    keySize: solution.keySize,
    score: solution.score,
    plaintext,
    candidates: solution.candidates.map(({ keySize: size, score, key }) => ({ keySize: size, score, key })),
  }

  if (context.store) {
    try {
      await context.store.save({
        ciphertext: encodeBase64(bytes),
        key: solution.key,
        key_size: solution.keySize,
        score: solution.score,
        plaintext,
        key_sizes: outcome.keySizes ?? [],
      })
    } catch (dbError) {
      context.logger?.error('Solution persistence failed:', dbError)
      // The recovery itself still succeeded
      responseBody.warning = 'Database unavailable, results not persisted'
    }
  }

  return { status: 200, body: responseBody }
}

export function handleEncryptRepeatingKey(body: unknown): ApiResponse {
  try {
    if (!isRecord(body)) throw new RequestError('JSON body is required')

    const plaintext = requireString(body, 'plaintext')
    const key = requireString(body, 'key')

    return {
      status: 200,
      body: { ciphertext: encodeHex(repeatingKeyXor(Buffer.from(plaintext, 'utf8'), key)) }
    }
  } catch (error) {
    const response = badRequest(error)
    if (response) return response
    throw error
  }
}
