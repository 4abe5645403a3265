import OpenAI from 'openai'
import { getEnv } from './env'

let openaiClient: OpenAI | null = null
let perplexityClient: OpenAI | null = null

export function getOpenAI() {
  if (openaiClient) return openaiClient
  const env = getEnv()
  openaiClient = new OpenAI({ apiKey: env.OPENAI_API_KEY })
  return openaiClient
}

// Perplexity speaks the chat completions protocol, so the same SDK serves web search
export function getPerplexity() {
  if (perplexityClient) return perplexityClient
  const env = getEnv()
  if (!env.PERPLEXITY_API_KEY) {
    throw new Error('PERPLEXITY_API_KEY is required for the search tool')
  }
  perplexityClient = new OpenAI({ apiKey: env.PERPLEXITY_API_KEY, baseURL: env.PERPLEXITY_BASE_URL })
  return perplexityClient
}
