import type { RoleConfig, RoleTokens, ToolInvocation, Turn } from '@research-lab/shared'
import type { Participant, TaskContext } from '../../src/services/participant'
import type { Transcript } from '../../src/services/transcript'

type Reply = string | { content: string; toolCalls?: ToolInvocation[] }

export type ScriptedParticipant = Participant & {
  calls: Array<{ seen: number; context: TaskContext }>
}

export function role(name: string, tokens: RoleTokens = {}): RoleConfig {
  return { name, role: name, prompt: '', capabilities: [], tokens }
}

export function turn(author: string, content: string, toolCalls: ToolInvocation[] = []): Turn {
  return { author, content, toolCalls, createdAt: '2026-01-01T00:00:00.000Z' }
}

/**
 * Participant that replies from a fixed script. Once the script runs out it
 * repeats the last reply.
 */
export function scripted(name: string, replies: Reply[], tokens: RoleTokens = {}): ScriptedParticipant {
  const calls: ScriptedParticipant['calls'] = []
  return {
    role: role(name, tokens),
    calls,
    async takeTurn(transcript: Transcript, context: TaskContext) {
      calls.push({ seen: transcript.length, context })
      const reply = replies[Math.min(calls.length - 1, replies.length - 1)] ?? ''
      return typeof reply === 'string'
        ? turn(name, reply)
        : turn(name, reply.content, reply.toolCalls ?? [])
    }
  }
}

export const context: TaskContext = { runId: 'run_test', iteration: 1, phase: 'planning', brief: 'Test brief' }
