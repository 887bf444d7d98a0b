export type LlmProvider = 'gemini' | 'groq' | 'mock'

export interface AppConfig {
  provider: LlmProvider
  apiKey: string
  model: string
  maxTextLength: number
}

type Env = Record<string, string | undefined>

export const DEFAULT_GEMINI_MODEL = 'gemini-1.5-flash'
export const DEFAULT_GROQ_MODEL = 'llama-3.3-70b-versatile'
const DEFAULT_MAX_TEXT_LENGTH = 4000

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

function parseMaxTextLength(raw: string | undefined): number {
  if (!raw) return DEFAULT_MAX_TEXT_LENGTH
  const value = parseInt(raw, 10)
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`MAX_TEXT_LENGTH must be a positive integer, got "${raw}".`)
  }
  return value
}

/**
 * Resolve provider, credential and limits from the environment.
 * Throws `ConfigError` when the selected provider has no API key.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const maxTextLength = parseMaxTextLength(env.MAX_TEXT_LENGTH)

  if (env.USE_MOCK === '1') {
    return { provider: 'mock', apiKey: '', model: 'mock-v1', maxTextLength }
  }

  const provider = env.LLM_PROVIDER || 'gemini'

  if (provider === 'groq') {
    if (!env.GROQ_API_KEY) {
      throw new ConfigError('Groq API key not found. Please set GROQ_API_KEY as an environment variable.')
    }
    return {
      provider,
      apiKey: env.GROQ_API_KEY,
      model: env.GROQ_MODEL || DEFAULT_GROQ_MODEL,
      maxTextLength,
    }
  }

  if (provider !== 'gemini') {
    throw new ConfigError(`Unknown LLM_PROVIDER "${provider}". Use "gemini" or "groq".`)
  }
  if (!env.GEMINI_API_KEY) {
    throw new ConfigError('Gemini API key not found. Please set GEMINI_API_KEY as an environment variable.')
  }
  return {
    provider,
    apiKey: env.GEMINI_API_KEY,
    model: env.GEMINI_MODEL || DEFAULT_GEMINI_MODEL,
    maxTextLength,
  }
}

/** The configuration problem to show instead of the app, or null when it can start. */
export function getConfigError(env: Env = process.env): string | null {
  try {
    loadConfig(env)
    return null
  } catch (error) {
    if (error instanceof ConfigError) return error.message
    throw error
  }
}
