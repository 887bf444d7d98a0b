import { CATEGORIES, Category } from '@/types'
import { sentenceSpans } from './sentences'

const CATEGORY_TAG = new RegExp(`<(/?)(${CATEGORIES.join('|')})\\s*>`, 'gi')
const SENTENCE_END = /[.!?]$/
const LEADING_SPACE = /^\s/

export interface TaggedSentence {
  text: string
  taggedCategory?: Category
}

export interface TaggedPolish {
  text: string
  sentences: TaggedSentence[]
}

interface TaggedRun {
  start: number
  end: number
  category: Category
}

function asCategory(name: string): Category | undefined {
  const lower = name.toLowerCase()
  return CATEGORIES.find(c => c === lower)
}

// Any closing category tag ends the open run, whatever its name
function stripTags(raw: string): { text: string; runs: TaggedRun[] } {
  let text = ''
  const runs: TaggedRun[] = []
  let open: Category | undefined
  let pendingBreak = false
  let last = 0

  const append = (chunk: string) => {
    if (!chunk) return
    // A tag removed right after `.!?` must not glue two sentences together
    if (pendingBreak && !LEADING_SPACE.test(chunk)) text += ' '
    pendingBreak = false
    if (open) runs.push({ start: text.length, end: text.length + chunk.length, category: open })
    text += chunk
  }

  for (const match of raw.matchAll(CATEGORY_TAG)) {
    const index = match.index ?? 0
    append(raw.slice(last, index))
    last = index + match[0].length
    if (SENTENCE_END.test(text)) pendingBreak = true
    open = match[1] ? undefined : asCategory(match[2])
  }
  append(raw.slice(last))

  return { text, runs }
}

/**
 * Remove the category tags the polish prompt asks the model to add and split
 * the result into sentences, each carrying the tag it sat in (if any).
 * `"Hi. <tone>Thanks!</tone>"` → `Hi.` untagged, `Thanks!` tagged `tone`
 */
export function parseTaggedPolish(raw: string): TaggedPolish {
  const { text, runs } = stripTags(raw)

  const sentences = sentenceSpans(text).map(([start, end]) => {
    const sentence: TaggedSentence = { text: text.slice(start, end) }
    const run = runs.find(r => r.start < end && r.end > start)
    if (run) sentence.taggedCategory = run.category
    return sentence
  })

  return { text, sentences }
}
