export type VerdictTokens = {
  approve: string
  revise: string
}

export type VerdictResult = {
  verdict: 'APPROVED' | 'REVISE'
  token: string | null
  rationale: string
}

export const NO_EXPLICIT_VERDICT = 'no explicit verdict'

/** First token of `tokens` (in list order) that occurs in `content`, or null. */
export function detectStopToken(content: string, tokens: readonly string[]): string | null {
  for (const token of tokens) {
    if (token && content.includes(token)) return token
  }
  return null
}

export function stripTokens(content: string, tokens: readonly (string | undefined)[]): string {
  let out = content
  for (const token of tokens) {
    if (token) out = out.split(token).join('')
  }
  return out.trim()
}

/**
 * Classifies a critic turn. Grammar is the ordered list [revise, approve],
 * first match wins, so a turn carrying both tokens is a REVISE. A turn with
 * neither token is a REVISE with a synthetic rationale.
 */
export function extractVerdict(content: string, tokens: VerdictTokens): VerdictResult {
  const token = detectStopToken(content, [tokens.revise, tokens.approve])
  if (!token) {
    return { verdict: 'REVISE', token: null, rationale: NO_EXPLICIT_VERDICT }
  }
  const rationale = stripTokens(content, [tokens.revise, tokens.approve])
  return {
    verdict: token === tokens.revise ? 'REVISE' : 'APPROVED',
    token,
    rationale: rationale || (token === tokens.revise ? 'revision requested' : 'approved')
  }
}
