import * as cheerio from 'cheerio'
import { z } from 'zod'
import { ToolFailure, type ToolGateway } from '../services/tool-gateway'
import { getPerplexity } from '../utils/llm'

export const PAGE_TEXT_LIMIT = 100_000

// Perplexity adds citations next to choices; the SDK types do not know the field
const CitationsSchema = z.object({ citations: z.array(z.string()).optional() }).passthrough()

export function htmlToText(html: string): string {
  const $ = cheerio.load(html)
  $('script, style, noscript, svg, iframe').remove()
  const title = $('title').first().text().trim()
  const body = $('body').text().replace(/\s+/g, ' ').trim()
  return title ? `${title}\n\n${body}` : body
}

export function registerWebTools(gateway: ToolGateway, opts: { searchModel: string }) {
  gateway.register({
    name: 'search',
    description: 'Search the web and return a sourced answer.',
    parameters: z.object({ query: z.string().min(1) }),
    handler: async ({ query }, ctx) => {
      const client = getPerplexity()
      const completion = await client.chat.completions.create(
        { model: opts.searchModel, messages: [{ role: 'user', content: query }] },
        { signal: ctx.signal }
      )
      const answer = completion.choices[0]?.message?.content?.trim() ?? ''
      if (!answer) throw new ToolFailure('EMPTY_RESULT', `Search returned no answer for: ${query}`)
      const extra = CitationsSchema.safeParse(completion)
      const citations = extra.success ? extra.data.citations ?? [] : []
      if (citations.length === 0) return answer
      return `${answer}\n\nSources:\n${citations.map((url, idx) => `[${idx + 1}] ${url}`).join('\n')}`
    }
  })

  gateway.register({
    name: 'fetch_page',
    description: `Fetch a web page and return its readable text (up to ${PAGE_TEXT_LIMIT} characters).`,
    parameters: z.object({ url: z.string().url() }),
    handler: async ({ url }, ctx) => {
      const res = await fetch(url, { signal: ctx.signal, redirect: 'follow' })
      if (!res.ok) throw new ToolFailure('HTTP_ERROR', `GET ${url} returned ${res.status}`)
      const contentType = res.headers.get('content-type') ?? ''
      const raw = await res.text()
      const text = contentType.includes('html') ? htmlToText(raw) : raw.trim()
      return text.length > PAGE_TEXT_LIMIT ? `${text.slice(0, PAGE_TEXT_LIMIT)}\n\n[truncated]` : text
    }
  })
}
