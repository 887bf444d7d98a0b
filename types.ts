export const POLISH_STYLES = [
  'Professional',
  'Friendly',
  'Light-hearted',
  'Concise',
  'Empathetic',
] as const

export type PolishStyle = (typeof POLISH_STYLES)[number]

export const CATEGORIES = ['grammar', 'spelling', 'tone', 'formatting', 'other'] as const

export type Category = (typeof CATEGORIES)[number]

export type OpcodeTag = 'equal' | 'replace' | 'insert' | 'delete'

// Half-open spans: original[i1, i2) maps onto polished[j1, j2)
export interface Opcode {
  tag: OpcodeTag
  i1: number
  i2: number
  j1: number
  j2: number
}

export interface ChangedSentence {
  index: number
  text: string
}

export interface PolishedSentence {
  index: number
  text: string
  changed: boolean
  category?: Category
  taggedCategory?: Category
}

export interface HighlightSegment {
  text: string
  category?: Category
  color?: string
}

export interface PolishResult {
  style: PolishStyle
  polished_text: string
  sentences: PolishedSentence[]
  segments: HighlightSegment[]
  html: string
  llm_calls: number
}

export interface ErrorBody {
  error: {
    type: string
    message: string
  }
}
