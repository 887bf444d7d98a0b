import { describe, it, expect } from 'vitest'
import { classifyChanges, classifySentence, normalizeCategory } from '../classifier'
import { FakeLlmClient } from './fake-llm'

describe('normalizeCategory', () => {
  it('accepts each category exactly', () => {
    expect(normalizeCategory('grammar')).toBe('grammar')
    expect(normalizeCategory('spelling')).toBe('spelling')
    expect(normalizeCategory('tone')).toBe('tone')
    expect(normalizeCategory('formatting')).toBe('formatting')
    expect(normalizeCategory('other')).toBe('other')
  })

  it('trims and lower-cases the answer', () => {
    expect(normalizeCategory('  Tone\n')).toBe('tone')
    expect(normalizeCategory('SPELLING')).toBe('spelling')
  })

  it('falls back to other for anything outside the five categories', () => {
    expect(normalizeCategory('Grammar!!')).toBe('other')
    expect(normalizeCategory('')).toBe('other')
    expect(normalizeCategory('grammar fix')).toBe('other')
    expect(normalizeCategory('formatting.')).toBe('other')
    expect(normalizeCategory('style')).toBe('other')
  })
})

describe('classifySentence', () => {
  it('sends the sentence with a five token budget', async () => {
    const client = new FakeLlmClient(() => 'Grammar')

    await expect(classifySentence(client, 'It has errors.')).resolves.toBe('grammar')
    expect(client.calls).toHaveLength(1)
    expect(client.calls[0].maxOutputTokens).toBe(5)
    expect(client.calls[0].prompt).toContain('Sentence: "It has errors."')
    expect(client.calls[0].prompt).toContain('Categories: grammar, spelling, tone, formatting, other')
  })
})

describe('classifyChanges', () => {
  it('makes one call per distinct sentence and maps every position', async () => {
    const client = new FakeLlmClient(prompt => (prompt.includes('"Again."') ? 'tone' : 'spelling'))

    const { categories, calls } = await classifyChanges(client, [
      { index: 0, text: 'Again.' },
      { index: 2, text: 'Fixed it.' },
      { index: 4, text: 'Again.' },
    ])

    expect(calls).toBe(2)
    expect(client.calls).toHaveLength(2)
    expect([...categories.entries()]).toEqual([
      [0, 'tone'],
      [2, 'spelling'],
      [4, 'tone'],
    ])
  })

  it('makes no calls when nothing changed', async () => {
    const client = new FakeLlmClient(() => 'grammar')

    const { categories, calls } = await classifyChanges(client, [])

    expect(calls).toBe(0)
    expect(categories.size).toBe(0)
    expect(client.calls).toHaveLength(0)
  })
})
