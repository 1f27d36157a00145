/**
 * CLI for the XOR breaker.
 *
 * Usage:
 *   xor-breaker break-repeating -i <file> [--encoding base64|hex] [--corpus <path>]
 *                               [--charset alphanumeric|printable] [--top N] [--chunks N] [--max-key-size N]
 *   xor-breaker break-single -i <file|hex> [--encoding hex|base64] [--corpus <path>] [--charset ...]
 *   xor-breaker detect -i <file> [--corpus <path>] [--charset ...]
 *   xor-breaker encrypt -i <file> --key <key>
 */
import fs from 'fs'
import { analyzeCiphertext } from './analysis.js'
import { loadConfig, type AppConfig } from './config.js'
import { loadFrequencyTable } from './corpus.js'
import { charsetByName, isCharsetName, type CharsetName } from './lib/charset.js'
import { decodeBase64, decodeHex, encodeHex, isValidHex } from './lib/encoding.js'
import type { Encoding } from './lib/errors.js'
import { breakSingleByteXor, detectSingleByteXor } from './lib/singleByteXor.js'
import { repeatingKeyXor } from './lib/xor.js'

const { readFile } = fs.promises

export const COMMANDS = ['break-repeating', 'break-single', 'detect', 'encrypt'] as const
export type Command = (typeof COMMANDS)[number]

export interface CliArgs {
  command: string
  input?: string
  encoding?: string
  corpus?: string
  charset?: string
  key?: string
  top?: string
  chunks?: string
  maxKeySize?: string
}

export type CliOutput = Pick<typeof console, 'log' | 'error'>

const USAGE = 'Usage: xor-breaker <break-repeating|break-single|detect|encrypt> -i <file> [options]'

export class CliError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CliError'
  }
}

// ── Arg Parsing ──────────────────────────────────────────

export function parseArgs(argv: readonly string[]): CliArgs {
  const args = argv.slice(2)
  const result: CliArgs = { command: args[0] ?? '' }

  for (let i = 1; i < args.length; i++) {
    const arg = args[i]
    switch (arg) {
      case '-i':
      case '--input':
        result.input = args[++i]
        break
      case '-e':
      case '--encoding':
        result.encoding = args[++i]
        break
      case '--corpus':
        result.corpus = args[++i]
        break
      case '--charset':
        result.charset = args[++i]
        break
      case '-k':
      case '--key':
        result.key = args[++i]
        break
      case '--top':
        result.top = args[++i]
        break
      case '--chunks':
        result.chunks = args[++i]
        break
      case '--max-key-size':
        result.maxKeySize = args[++i]
        break
      default:
        throw new CliError(`Unknown option "${arg}"`)
    }
  }

  return result
}

function isCommand(value: string): value is Command {
  return COMMANDS.some(command => command === value)
}

function positiveInteger(flag: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value <= 0) {
    throw new CliError(`${flag} must be a positive integer, got "${raw}"`)
  }
  return value
}

function resolveEncoding(raw: string | undefined, fallback: Encoding): Encoding {
  if (raw === undefined) return fallback
  if (raw === 'hex' || raw === 'base64') return raw
  throw new CliError(`--encoding must be "hex" or "base64", got "${raw}"`)
}

function resolveCharset(raw: string | undefined, fallback: CharsetName): CharsetName {
  if (raw === undefined) return fallback
  if (isCharsetName(raw)) return raw
  throw new CliError(`--charset must be "alphanumeric" or "printable", got "${raw}"`)
}

async function readInput(args: CliArgs): Promise<string> {
  if (!args.input) {
    throw new CliError('--input (-i) is required')
  }
  return readFile(args.input, 'utf8')
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

// A hex ciphertext may be given in place of a file path
async function readInputOrHex(args: CliArgs): Promise<string> {
  try {
    return await readInput(args)
  } catch (error) {
    if (args.input && isValidHex(args.input) && isMissingFile(error)) return args.input
    throw error
  }
}

// ── Commands ─────────────────────────────────────────────

async function runBreakRepeating(args: CliArgs, config: AppConfig, out: CliOutput): Promise<number> {
  const text = await readInput(args)
  const encoding = resolveEncoding(args.encoding, 'base64')
  const bytes = encoding === 'hex' ? decodeHex(text.trim()) : decodeBase64(text)
  const characterSet = charsetByName(resolveCharset(args.charset, config.charset))

  const outcome = analyzeCiphertext(bytes, {
    topN: positiveInteger('--top', args.top, config.keySize.topN),
    chunksToSample: positiveInteger('--chunks', args.chunks, config.keySize.chunksToSample),
    maxKeySize: positiveInteger('--max-key-size', args.maxKeySize, config.keySize.maxKeySize),
    frequencyTable: await loadFrequencyTable(args.corpus ?? config.corpusPath, characterSet),
    characterSet,
  })

  if (outcome.status === 'error') {
    throw new CliError(outcome.error ?? 'Ciphertext analysis failed')
  }
  if (!outcome.solution) {
    out.error(outcome.message ?? 'No key could be recovered')
    return 1
  }

  const { solution } = outcome
  out.log(`Key (${solution.keySize} bytes): ${solution.key}`)
  out.log(`Score: ${solution.score.toFixed(4)}`)
  out.log('')
  out.log(solution.plaintext.toString('utf8'))
  return 0
}

async function runBreakSingle(args: CliArgs, config: AppConfig, out: CliOutput): Promise<number> {
  const encoding = resolveEncoding(args.encoding, 'hex')
  const text = encoding === 'hex' ? await readInputOrHex(args) : await readInput(args)
  const bytes = encoding === 'hex' ? decodeHex(text.trim()) : decodeBase64(text)
  const characterSet = charsetByName(resolveCharset(args.charset, config.charset))
  const frequencyTable = await loadFrequencyTable(args.corpus ?? config.corpusPath, characterSet)

  const result = breakSingleByteXor(bytes, frequencyTable, characterSet)
  if (!result) {
    out.error('No single-byte key produced valid text')
    return 1
  }

  out.log(`Key: ${result.key}`)
  out.log(`Score: ${result.score.toFixed(4)}`)
  out.log(`Plaintext: ${result.plaintext}`)
  return 0
}

// One hex-encoded buffer per line
async function runDetect(args: CliArgs, config: AppConfig, out: CliOutput): Promise<number> {
  const text = await readInput(args)
  const buffers = text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .map(line => decodeHex(line))
  const characterSet = charsetByName(resolveCharset(args.charset, config.charset))
  const frequencyTable = await loadFrequencyTable(args.corpus ?? config.corpusPath, characterSet)

  const result = detectSingleByteXor(buffers, frequencyTable, characterSet)
  if (!result) {
    out.error('No line decrypted to valid text')
    return 1
  }

  out.log(`Line: ${result.index + 1}`)
  out.log(`Key: ${result.key}`)
  out.log(`Plaintext: ${result.plaintext.trimEnd()}`)
  return 0
}

async function runEncrypt(args: CliArgs, out: CliOutput): Promise<number> {
  if (!args.key) {
    throw new CliError('--key (-k) is required')
  }
  const text = await readInput(args)
  out.log(encodeHex(repeatingKeyXor(Buffer.from(text, 'utf8'), args.key)))
  return 0
}

/**
 * Run the CLI and return the process exit code. Errors are printed, not thrown.
 */
export async function runCli(
  argv: readonly string[],
  out: CliOutput = console,
  config?: AppConfig
): Promise<number> {
  try {
    const resolved = config ?? loadConfig()
    const args = parseArgs(argv)
    if (!isCommand(args.command)) {
      out.error(args.command ? `Unknown command "${args.command}"` : 'Missing command')
      out.error(USAGE)
      return 1
    }

    switch (args.command) {
      case 'break-repeating':
        return await runBreakRepeating(args, resolved, out)
      case 'break-single':
        return await runBreakSingle(args, resolved, out)
      case 'detect':
        return await runDetect(args, resolved, out)
      case 'encrypt':
        return await runEncrypt(args, out)
    }
  } catch (error) {
    out.error(`Error: ${error instanceof Error ? error.message : String(error)}`)
    return 1
  }
}
