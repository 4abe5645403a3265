import type { LabEvent, Turn } from '@research-lab/shared'
import type { Participant, TaskContext } from './participant'
import { Transcript, surfaceToolFailures } from './transcript'
import { detectStopToken } from './verdict'
import { getLogger } from './logger'

export type SubChatOptions = {
  participants: readonly Participant[]
  // Only this participant's stop tokens end the chat
  closer: string
  stopTokens: readonly string[]
  context: TaskContext
  // One turn per participant step; never exceeded
  maxTurns: number
  // Turns recorded before this chat starts; they are visible but not counted
  history?: Transcript
  onEvent?: (event: LabEvent) => void
}

export type SubChatResult =
  | { status: 'stopped'; token: string; transcript: Transcript; finalTurn: Turn; turns: number }
  | { status: 'budget_exhausted'; transcript: Transcript; turns: number }

function assertValidOptions(opts: SubChatOptions) {
  if (opts.participants.length === 0) {
    throw new Error('Sub-chat requires at least one participant')
  }
  const names = opts.participants.map((p) => p.role.name)
  const duplicate = names.find((name, idx) => names.indexOf(name) !== idx)
  if (duplicate) {
    throw new Error(`Sub-chat participant "${duplicate}" appears more than once`)
  }
  if (!names.includes(opts.closer)) {
    throw new Error(`Sub-chat closer "${opts.closer}" is not among participants: ${names.join(', ')}`)
  }
  if (!Number.isInteger(opts.maxTurns) || opts.maxTurns < 1) {
    throw new Error(`Sub-chat maxTurns must be a positive integer, got ${opts.maxTurns}`)
  }
  if (opts.stopTokens.filter(Boolean).length === 0) {
    throw new Error('Sub-chat requires at least one stop token')
  }
}

export async function runRoundRobinChat(opts: SubChatOptions): Promise<SubChatResult> {
  assertValidOptions(opts)
  const log = getLogger()
  const { participants, closer, stopTokens, context, maxTurns, onEvent } = opts
  const base = { runId: context.runId, iteration: context.iteration, phase: context.phase }

  let transcript = opts.history ?? Transcript.empty()
  let cursor = 0

  for (let turns = 1; turns <= maxTurns; turns++) {
    const participant = participants[cursor % participants.length]
    cursor++

    const name = participant.role.name
    const produced = await participant.takeTurn(transcript, context)
    const turn = surfaceToolFailures({ ...produced, author: name })
    transcript = transcript.append(turn)

    for (const call of turn.toolCalls) {
      onEvent?.({ type: 'tool_call', ...base, author: name, message: call.tool, data: call })
    }
    onEvent?.({ type: 'turn', ...base, author: name, message: turn.content })

    const token = detectStopToken(turn.content, stopTokens)
    if (!token) continue

    if (name !== closer) {
      log.debug('stop_token_ignored', { ...base, author: name, token })
      onEvent?.({ type: 'stop_token_ignored', ...base, author: name, message: token })
      continue
    }

    log.info('subchat_stopped', { ...base, closer, token, turns })
    return { status: 'stopped', token, transcript, finalTurn: turn, turns }
  }

  log.warn('subchat_budget_exhausted', { ...base, maxTurns })
  onEvent?.({ type: 'budget_exhausted', ...base, message: `no stop token from ${closer} within ${maxTurns} turns` })
  return { status: 'budget_exhausted', transcript, turns: transcript.length - (opts.history?.length ?? 0) }
}
