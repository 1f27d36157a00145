import { createClient } from '@supabase/supabase-js'
import type { SupabaseConfig } from './config.js'

// Row shape of the `solutions` table
export interface SolutionRecord {
  ciphertext: string
  key: string
  key_size: number
  score: number
  plaintext: string
  key_sizes: number[]
}

export interface SolutionStore {
  save(record: SolutionRecord): Promise<void>
}

export function createSupabaseStore(config: SupabaseConfig): SolutionStore {
  const supabase = createClient(config.url, config.serviceRoleKey)

  return {
    async save(record) {
      const { error } = await supabase.from('solutions').insert([record])
      if (error) {
        throw new Error(`Supabase solution insert failed: ${error.message}`)
      }
    },
  }
}
