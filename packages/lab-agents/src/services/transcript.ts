import type { ToolInvocation, Turn } from '@research-lab/shared'

export type RecordedTurn = Readonly<Omit<Turn, 'toolCalls'>> & { readonly toolCalls: readonly ToolInvocation[] }

export function formatToolFailure(call: ToolInvocation): string | null {
  if (call.status !== 'error') return null
  return `[tool error] ${call.tool} failed with ${call.error.code}: ${call.error.message}`
}

// Failed tool calls must be visible to the next speaker, not only in toolCalls
export function surfaceToolFailures(turn: Turn): Turn {
  let content = turn.content
  for (const call of turn.toolCalls) {
    const line = formatToolFailure(call)
    if (line && !content.includes(line)) {
      content = content ? `${content}\n\n${line}` : line
    }
  }
  return content === turn.content ? turn : { ...turn, content }
}

function freezeTurn(turn: Turn): RecordedTurn {
  const toolCalls = Object.freeze(turn.toolCalls.map((call) => Object.freeze({ ...call })))
  return Object.freeze({ ...turn, toolCalls })
}

/**
 * Ordered, append-only list of turns. `append` never touches the receiver;
 * it returns a new transcript sharing the already recorded turns.
 */
export class Transcript {
  private constructor(private readonly items: readonly RecordedTurn[]) {}

  static empty(): Transcript {
    return new Transcript(Object.freeze([]))
  }

  static from(turns: readonly Turn[]): Transcript {
    return new Transcript(Object.freeze(turns.map(freezeTurn)))
  }

  append(turn: Turn): Transcript {
    return new Transcript(Object.freeze([...this.items, freezeTurn(turn)]))
  }

  get turns(): readonly RecordedTurn[] {
    return this.items
  }

  get length(): number {
    return this.items.length
  }

  last(): RecordedTurn | undefined {
    return this.items[this.items.length - 1]
  }

  lastBy(author: string): RecordedTurn | undefined {
    for (let i = this.items.length - 1; i >= 0; i--) {
      const turn = this.items[i]
      if (turn && turn.author === author) return turn
    }
    return undefined
  }

  tail(count: number): readonly RecordedTurn[] {
    if (count <= 0) return []
    return this.items.slice(-count)
  }

  render(): string {
    return this.items.map((turn) => `[${turn.author}]\n${turn.content}`).join('\n\n')
  }
}
