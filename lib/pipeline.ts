import { ChangedSentence, PolishResult, PolishStyle, PolishedSentence } from '@/types'
import { detectChanges } from './change-detector'
import { classifyChanges } from './classifier'
import { buildHighlightSegments, renderHighlightedHtml } from './highlight'
import type { LlmClient } from './llm'
import { parseTaggedPolish, type TaggedSentence } from './polish-tags'
import { buildPolishPrompt, POLISH_MAX_TOKENS } from './prompts'
import { splitSentences } from './sentences'

export class EmptyDraftError extends Error {
  constructor() {
    super('Please enter some text first.')
    this.name = 'EmptyDraftError'
  }
}

export async function polishText(client: LlmClient, draft: string, style: PolishStyle): Promise<string> {
  return client.generate(buildPolishPrompt(draft, style), { maxOutputTokens: POLISH_MAX_TOKENS })
}

// A sentence the model tagged counts as changed even if its wording matches
function withTaggedSentences(changes: ChangedSentence[], tagged: TaggedSentence[]): ChangedSentence[] {
  const changedAt = new Set(changes.map(c => c.index))
  return tagged.flatMap((sentence, index) =>
    changedAt.has(index) || sentence.taggedCategory ? [{ index, text: sentence.text }] : []
  )
}

/**
 * Polish a draft, find the sentences that changed, classify each one and
 * build the highlighted view. Makes 1 + (distinct changed sentences) calls,
 * strictly one after another.
 */
export async function polishDraft(client: LlmClient, draft: string, style: PolishStyle): Promise<PolishResult> {
  if (!draft.trim()) throw new EmptyDraftError()

  const polishStart = Date.now()
  const rawPolished = await polishText(client, draft, style)
  console.log(
    `[Polish] event=polish_complete provider=${client.provider} style=${style} duration=${Date.now() - polishStart}ms`
  )

  const { text: polishedText, sentences: tagged } = parseTaggedPolish(rawPolished)

  const originalSentences = splitSentences(draft)
  const polishedSentences = tagged.map(s => s.text)
  const changes = withTaggedSentences(detectChanges(originalSentences, polishedSentences), tagged)

  const classifyStart = Date.now()
  const { categories, calls } = await classifyChanges(client, changes)
  console.log(
    `[Polish] event=classify_complete changed=${changes.length} calls=${calls} duration=${Date.now() - classifyStart}ms`
  )

  const sentences: PolishedSentence[] = polishedSentences.map((text, index) => {
    const sentence: PolishedSentence = { index, text, changed: categories.has(index) }
    const category = categories.get(index)
    const { taggedCategory } = tagged[index]
    if (category) sentence.category = category
    if (taggedCategory) sentence.taggedCategory = taggedCategory
    return sentence
  })

  const segments = buildHighlightSegments(polishedSentences, categories)

  return {
    style,
    polished_text: polishedText,
    sentences,
    segments,
    html: renderHighlightedHtml(segments),
    llm_calls: 1 + calls,
  }
}
