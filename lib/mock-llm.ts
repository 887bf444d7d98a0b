import type { GenerateOptions, LlmClient } from './llm'
import { CLASSIFY_PREAMBLE, DRAFT_MARKER } from './prompts'
import { splitSentences } from './sentences'

const COMMON_TYPOS: Array<[string, string]> = [
  ['definately', 'definitely'],
  ['seperately', 'separately'],
  ['occured', 'occurred'],
  ['recieve', 'receive'],
  ['teh', 'the'],
]

function fixTypos(sentence: string): string {
  let fixed = sentence
  for (const [typo, fix] of COMMON_TYPOS) {
    fixed = fixed.replace(new RegExp(`\\b${typo}\\b`, 'gi'), original =>
      original[0] === original[0].toUpperCase() ? fix.charAt(0).toUpperCase() + fix.slice(1) : fix
    )
  }
  return fixed
}

/**
 * Offline stand-in selected with USE_MOCK=1. Polishing only corrects a handful
 * of common misspellings and every classification answers `spelling`.
 */
export class MockLlmClient implements LlmClient {
  readonly provider = 'mock'
  readonly model = 'mock-v1'

  async generate(prompt: string, _options: GenerateOptions): Promise<string> {
    if (prompt.startsWith(CLASSIFY_PREAMBLE)) return 'spelling'

    const markerAt = prompt.indexOf(DRAFT_MARKER)
    if (markerAt === -1) return ''
    const draft = prompt.slice(markerAt + DRAFT_MARKER.length).trim()

    return splitSentences(draft)
      .map(sentence => {
        const fixed = fixTypos(sentence)
        return fixed === sentence ? sentence : `<spelling>${fixed}</spelling>`
      })
      .join(' ')
  }
}
