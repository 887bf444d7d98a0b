import { GoogleGenerativeAI } from '@google/generative-ai'
import OpenAI from 'openai'
import { AppConfig } from './config'
import { MockLlmClient } from './mock-llm'

export interface GenerateOptions {
  maxOutputTokens: number
}

/** Anything that turns a prompt into trimmed generated text. */
export interface LlmClient {
  readonly provider: string
  readonly model: string
  generate(prompt: string, options: GenerateOptions): Promise<string>
}

export class GeminiClient implements LlmClient {
  readonly provider = 'gemini'
  private readonly genAI: GoogleGenerativeAI

  constructor(apiKey: string, readonly model: string) {
    this.genAI = new GoogleGenerativeAI(apiKey)
  }

  async generate(prompt: string, { maxOutputTokens }: GenerateOptions): Promise<string> {
    const model = this.genAI.getGenerativeModel({ model: this.model })
    const result = await model.generateContent({
      contents: [{ role: 'user', parts: [{ text: prompt }] }],
      generationConfig: { maxOutputTokens, temperature: 0.0 },
    })
    return result.response.text().trim()
  }
}

const GROQ_BASE_URL = 'https://api.groq.com/openai/v1'

export class GroqClient implements LlmClient {
  readonly provider = 'groq'
  private readonly client: OpenAI

  constructor(apiKey: string, readonly model: string) {
    this.client = new OpenAI({ apiKey, baseURL: GROQ_BASE_URL })
  }

  async generate(prompt: string, { maxOutputTokens }: GenerateOptions): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: 'user', content: prompt }],
      max_tokens: maxOutputTokens,
      temperature: 0.0,
    })
    return (response.choices[0]?.message.content ?? '').trim()
  }
}

export function createLlmClient(config: AppConfig): LlmClient {
  switch (config.provider) {
    case 'mock':
      return new MockLlmClient()
    case 'groq':
      return new GroqClient(config.apiKey, config.model)
    case 'gemini':
      return new GeminiClient(config.apiKey, config.model)
  }
}
