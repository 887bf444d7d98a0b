import { describe, it, expect } from 'vitest'
import { parseTaggedPolish } from '../polish-tags'

describe('parseTaggedPolish', () => {
  it('removes category tags and keeps their content', () => {
    const { text, sentences } = parseTaggedPolish('This is a test. <grammar>It has errors.</grammar>')

    expect(text).toBe('This is a test. It has errors.')
    expect(sentences).toEqual([
      { text: 'This is a test.' },
      { text: 'It has errors.', taggedCategory: 'grammar' },
    ])
  })

  it('matches tag names case-insensitively', () => {
    expect(parseTaggedPolish('<Tone>Hi there.</TONE>')).toEqual({
      text: 'Hi there.',
      sentences: [{ text: 'Hi there.', taggedCategory: 'tone' }],
    })
  })

  it('leaves other markup alone', () => {
    expect(parseTaggedPolish('<b>bold</b> move.')).toEqual({
      text: '<b>bold</b> move.',
      sentences: [{ text: '<b>bold</b> move.' }],
    })
  })

  it('tags every sentence inside a tagged run', () => {
    const { text, sentences } = parseTaggedPolish(
      'Hi. <tone>Thanks so much! See you.</tone> <spelling>Receive it.</spelling>'
    )

    expect(text).toBe('Hi. Thanks so much! See you. Receive it.')
    expect(sentences).toEqual([
      { text: 'Hi.' },
      { text: 'Thanks so much!', taggedCategory: 'tone' },
      { text: 'See you.', taggedCategory: 'tone' },
      { text: 'Receive it.', taggedCategory: 'spelling' },
    ])
  })

  it('tags only the copy of a repeated sentence that was wrapped', () => {
    expect(parseTaggedPolish('Yes. <tone>Yes.</tone>').sentences).toEqual([
      { text: 'Yes.' },
      { text: 'Yes.', taggedCategory: 'tone' },
    ])
  })

  it('keeps a sentence break where adjacent tags meet', () => {
    const { text, sentences } = parseTaggedPolish('<grammar>It has errors.</grammar><tone>Thanks!</tone>')

    expect(text).toBe('It has errors. Thanks!')
    expect(sentences).toEqual([
      { text: 'It has errors.', taggedCategory: 'grammar' },
      { text: 'Thanks!', taggedCategory: 'tone' },
    ])
  })

  it('ends a tagged run at any closing category tag', () => {
    expect(parseTaggedPolish('Hello. <tone>Hi.</grammar> Bye.').sentences).toEqual([
      { text: 'Hello.' },
      { text: 'Hi.', taggedCategory: 'tone' },
      { text: 'Bye.' },
    ])
  })

  it('returns plain text as untagged sentences', () => {
    expect(parseTaggedPolish('Nothing changed here. Really.').sentences).toEqual([
      { text: 'Nothing changed here.' },
      { text: 'Really.' },
    ])
  })
})
