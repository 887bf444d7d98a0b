import { CATEGORIES, Category, ChangedSentence } from '@/types'
import type { LlmClient } from './llm'
import { buildClassifyPrompt, CLASSIFY_MAX_TOKENS } from './prompts'

/** Trim and lower-case a model answer; anything outside the five categories is `other`. */
export function normalizeCategory(raw: string): Category {
  const answer = raw.trim().toLowerCase()
  return CATEGORIES.find(c => c === answer) ?? 'other'
}

export async function classifySentence(client: LlmClient, sentence: string): Promise<Category> {
  const answer = await client.generate(buildClassifyPrompt(sentence), {
    maxOutputTokens: CLASSIFY_MAX_TOKENS,
  })
  return normalizeCategory(answer)
}

export interface Classification {
  // Keyed by polished sentence index
  categories: Map<number, Category>
  calls: number
}

/**
 * Classify changed sentences one call at a time. Sentences with the same
 * trimmed text share a single call, but every position gets its own entry.
 */
export async function classifyChanges(
  client: LlmClient,
  changes: ChangedSentence[]
): Promise<Classification> {
  const byText = new Map<string, Category>()
  const categories = new Map<number, Category>()

  for (const { index, text } of changes) {
    const key = text.trim()
    let category = byText.get(key)
    if (category === undefined) {
      category = await classifySentence(client, text)
      byText.set(key, category)
    }
    categories.set(index, category)
  }

  return { categories, calls: byText.size }
}
