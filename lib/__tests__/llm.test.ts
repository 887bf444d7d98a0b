import { describe, it, expect } from 'vitest'
import { createLlmClient, GeminiClient, GroqClient } from '../llm'
import { MockLlmClient } from '../mock-llm'
import { buildClassifyPrompt, buildPolishPrompt, POLISH_MAX_TOKENS } from '../prompts'

describe('createLlmClient', () => {
  it('builds the client for each provider', () => {
    const gemini = createLlmClient({ provider: 'gemini', apiKey: 'test-key', model: 'gemini-1.5-flash', maxTextLength: 4000 })
    const groq = createLlmClient({ provider: 'groq', apiKey: 'test-key', model: 'test-model', maxTextLength: 4000 })
    const mock = createLlmClient({ provider: 'mock', apiKey: '', model: 'mock-v1', maxTextLength: 4000 })

    expect(gemini).toBeInstanceOf(GeminiClient)
    expect(gemini.model).toBe('gemini-1.5-flash')
    expect(groq).toBeInstanceOf(GroqClient)
    expect(groq.model).toBe('test-model')
    expect(mock).toBeInstanceOf(MockLlmClient)
  })
})

describe('MockLlmClient', () => {
  const client = new MockLlmClient()
  const options = { maxOutputTokens: POLISH_MAX_TOKENS }

  it('fixes common typos and tags the changed sentence', async () => {
    const polished = await client.generate(buildPolishPrompt('I will recieve it. All good.', 'Concise'), options)
    expect(polished).toBe('<spelling>I will receive it.</spelling> All good.')
  })

  it('keeps the capital letter of a corrected word', async () => {
    const polished = await client.generate(buildPolishPrompt('Teh cat sat.', 'Friendly'), options)
    expect(polished).toBe('<spelling>The cat sat.</spelling>')
  })

  it('answers spelling to classify prompts', async () => {
    await expect(client.generate(buildClassifyPrompt('The cat sat.'), { maxOutputTokens: 5 })).resolves.toBe('spelling')
  })
})
