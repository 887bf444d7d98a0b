import type { GenerateOptions, LlmClient } from '../llm'

export interface RecordedCall {
  prompt: string
  maxOutputTokens: number
}

/** Records every prompt and answers through `respond`. */
export class FakeLlmClient implements LlmClient {
  readonly provider = 'fake'
  readonly model = 'fake-1'
  readonly calls: RecordedCall[] = []

  constructor(private readonly respond: (prompt: string) => string) {}

  async generate(prompt: string, { maxOutputTokens }: GenerateOptions): Promise<string> {
    this.calls.push({ prompt, maxOutputTokens })
    return this.respond(prompt)
  }
}
