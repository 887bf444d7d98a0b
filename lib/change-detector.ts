import DiffMatchPatch from 'diff-match-patch'
import { ChangedSentence, Opcode } from '@/types'

const DIFF_DELETE = -1
const DIFF_INSERT = 1
const DIFF_EQUAL = 0

const SURROGATE_START = 0xd800
const SURROGATE_END = 0xdfff

const dmp = new DiffMatchPatch()
// No deadline: the diff must be the minimal one, not whatever fits in a second
dmp.Diff_Timeout = 0

// Map each distinct sentence onto a single UTF-16 unit so the character diff
// becomes a sentence diff (same trick as diff-match-patch's line mode).
function encodeSequences(a: string[], b: string[]): [string, string] {
  const symbols = new Map<string, string>()
  let next = 1

  const encode = (seq: string[]) =>
    seq
      .map(item => {
        let symbol = symbols.get(item)
        if (symbol === undefined) {
          if (next === SURROGATE_START) next = SURROGATE_END + 1
          symbol = String.fromCharCode(next++)
          symbols.set(item, symbol)
        }
        return symbol
      })
      .join('')

  return [encode(a), encode(b)]
}

function tagFor(op: Pick<Opcode, 'i1' | 'i2' | 'j1' | 'j2'>): Opcode['tag'] {
  const removes = op.i2 > op.i1
  const adds = op.j2 > op.j1
  if (removes && adds) return 'replace'
  return removes ? 'delete' : 'insert'
}

/**
 * Align two sentence sequences and describe how `original` turns into
 * `polished` as equal/replace/insert/delete spans. The `j` spans tile the
 * polished sequence exactly once.
 */
export function getSentenceOpcodes(original: string[], polished: string[]): Opcode[] {
  const [encodedOriginal, encodedPolished] = encodeSequences(original, polished)
  const diffs = dmp.diff_main(encodedOriginal, encodedPolished, false)

  const opcodes: Opcode[] = []
  let i = 0
  let j = 0

  diffs.forEach(([operation, text]: [number, string]) => {
    const length = text.length

    if (operation === DIFF_EQUAL) {
      opcodes.push({ tag: 'equal', i1: i, i2: i + length, j1: j, j2: j + length })
      i += length
      j += length
      return
    }

    const i2 = operation === DIFF_DELETE ? i + length : i
    const j2 = operation === DIFF_INSERT ? j + length : j
    const last = opcodes[opcodes.length - 1]

    // A delete next to an insert is one replaced span
    if (last && last.tag !== 'equal') {
      last.i2 = i2
      last.j2 = j2
      last.tag = tagFor(last)
    } else {
      const span = { i1: i, i2, j1: j, j2 }
      opcodes.push({ tag: tagFor(span), ...span })
    }

    i = i2
    j = j2
  })

  return opcodes
}

/**
 * Polished sentences not covered by an `equal` span, in polished order.
 * Repeated sentences stay as separate entries.
 */
export function detectChanges(original: string[], polished: string[]): ChangedSentence[] {
  const changed: ChangedSentence[] = []
  for (const { tag, j1, j2 } of getSentenceOpcodes(original, polished)) {
    if (tag === 'equal') continue
    for (let index = j1; index < j2; index++) {
      changed.push({ index, text: polished[index] })
    }
  }
  return changed
}
