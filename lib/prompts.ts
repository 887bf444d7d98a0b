import { CATEGORIES, PolishStyle } from '@/types'

export const POLISH_MAX_TOKENS = 600
export const CLASSIFY_MAX_TOKENS = 5

export const DRAFT_MARKER = 'Draft:\n'
export const CLASSIFY_PREAMBLE = 'Classify the type of fix made to this sentence compared to the original draft.'

const TAG_LIST = CATEGORIES.map(c => `<${c}>...</${c}>`)
const TAG_CHOICES = `${TAG_LIST.slice(0, -1).join(', ')}, or ${TAG_LIST[TAG_LIST.length - 1]}`

export function buildPolishPrompt(draft: string, style: PolishStyle): string {
  return `Instructions:
1. Rewrite the draft in the style the user selected (${style}).
2. Only change or polish sentences from the original draft that have grammar, spelling, tone, formatting, or other issues.
3. Wrap the entire original sentence that was changed with:
   ${TAG_CHOICES} as appropriate.
4. Do NOT add new sentences, repeat sentences, extra commentary, or explanations.
${DRAFT_MARKER}${draft}
`
}

export function buildClassifyPrompt(sentence: string): string {
  return `${CLASSIFY_PREAMBLE}

Sentence: "${sentence}"

Categories: ${CATEGORIES.join(', ')}
Return only one category name.
`
}
