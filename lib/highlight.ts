import { Category, HighlightSegment } from '@/types'

export const CATEGORY_COLORS: Record<Category, string> = {
  grammar: '#ffcccc', // red
  spelling: '#cce5ff', // blue
  tone: '#fff3cd', // yellow
  formatting: '#d5f5e3', // green
  other: '#e8d4f8', // purple
}

export const CATEGORY_LABELS: Record<Category, { color: string; description: string }> = {
  grammar: { color: 'Red', description: 'Grammar fixes' },
  spelling: { color: 'Blue', description: 'Spelling fixes' },
  tone: { color: 'Yellow', description: 'Tone/style adjustments' },
  formatting: { color: 'Green', description: 'Formatting fixes' },
  other: { color: 'Purple', description: 'Other fixes' },
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
}

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch])
}

/** One segment per sentence; only sentences present in `categories` get a color. */
export function buildHighlightSegments(
  sentences: string[],
  categories: ReadonlyMap<number, Category>
): HighlightSegment[] {
  return sentences.map((text, index) => {
    const category = categories.get(index)
    return category ? { text, category, color: CATEGORY_COLORS[category] } : { text }
  })
}

/**
 * Serialize segments to HTML, sentences joined by a single space.
 * Original line breaks between sentences are not reproduced.
 */
export function renderHighlightedHtml(segments: HighlightSegment[]): string {
  return segments
    .map(({ text, color }) => {
      const safe = escapeHtml(text)
      return color ? `<span style="background-color:${color};">${safe}</span>` : safe
    })
    .join(' ')
}
