const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/
const SENTENCE_BOUNDARIES = new RegExp(SENTENCE_BOUNDARY.source, 'g')

/**
 * Split text into sentences after `.`, `!` or `?` followed by whitespace.
 * The whitespace run is consumed by the boundary. Blank input gives `['']`.
 */
export function splitSentences(text: string): string[] {
  return text.trim().split(SENTENCE_BOUNDARY)
}

/** Same split as `splitSentences`, as `[start, end)` offsets into `text`. */
export function sentenceSpans(text: string): Array<[number, number]> {
  const offset = text.length - text.trimStart().length
  const body = text.trim()
  const spans: Array<[number, number]> = []

  let from = 0
  for (const match of body.matchAll(SENTENCE_BOUNDARIES)) {
    const at = match.index ?? 0
    spans.push([offset + from, offset + at])
    from = at + match[0].length
  }
  spans.push([offset + from, offset + body.length])

  return spans
}
