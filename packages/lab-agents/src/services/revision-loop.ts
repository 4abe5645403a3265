import type { LabEvent, RevisionState, Verdict } from '@research-lab/shared'
import type { Participant, TaskContext } from './participant'
import { runRoundRobinChat } from './round-robin-chat'
import { Transcript } from './transcript'
import { extractVerdict, stripTokens } from './verdict'
import { buildImplementationBrief, buildReviewBrief } from './prompt-context'
import { getLogger } from './logger'

export type RevisionTokens = {
  engineerDone: string
  approve: string
  revise: string
  // Optional extra token that lets the critic close its turn without a verdict
  criticDone?: string
}

export type RevisionCycleOptions = {
  engineer: Participant
  executor: Participant
  critic: Participant
  tokens: RevisionTokens
  maxRevisions: number
  engineerMaxTurns: number
  criticMaxTurns: number
  reportMaxTurns: number
  onEvent?: (event: LabEvent) => void
}

export type AbortReason = 'engineer_budget_exhausted' | 'revision_budget_exhausted'

export type RevisionTransition = {
  from: RevisionState
  to: RevisionState
  revision: number
  task: string
  verdict: Verdict
  rationale: string
}

export type RevisionOutcome = {
  state: 'APPROVED' | 'ABORTED'
  reason: AbortReason | null
  revisions: number
  implementingVisits: number
  lastVerdict: Verdict
  criticSummary: string
  transitions: RevisionTransition[]
  transcript: Transcript
  report: string
}

const ALLOWED: Record<RevisionState, readonly RevisionState[]> = {
  IMPLEMENTING: ['AWAITING_REVIEW', 'ABORTED'],
  AWAITING_REVIEW: ['APPROVED', 'REVISION_REQUESTED'],
  REVISION_REQUESTED: ['IMPLEMENTING', 'ABORTED'],
  APPROVED: [],
  ABORTED: []
}

/**
 * Implement -> review -> (approve | revise) cycle. One instance runs one task.
 *
 * The engineer phase is a sub-chat of [engineer, executor] closed by the
 * engineer's completion token; the review phase is a critic-only sub-chat.
 * Transitions are collected as summaries; persisting them is the caller's call.
 */
export class RevisionCycle {
  private current: RevisionState = 'IMPLEMENTING'
  private revisionCount = 0
  private verdict: Verdict = 'PENDING'
  private readonly transitions: RevisionTransition[] = []
  private started = false

  constructor(private readonly opts: RevisionCycleOptions) {
    if (!Number.isInteger(opts.maxRevisions) || opts.maxRevisions < 0) {
      throw new Error(`maxRevisions must be a non-negative integer, got ${opts.maxRevisions}`)
    }
    if (!opts.tokens.engineerDone || !opts.tokens.approve || !opts.tokens.revise) {
      throw new Error('Revision cycle requires engineer completion, approve and revise tokens')
    }
  }

  get state(): RevisionState {
    return this.current
  }

  get revisions(): number {
    return this.revisionCount
  }

  get lastVerdict(): Verdict {
    return this.verdict
  }

  private transition(to: RevisionState, task: string, rationale: string, context: TaskContext) {
    const from = this.current
    if (!ALLOWED[from].includes(to)) {
      throw new Error(`Illegal revision transition ${from} -> ${to}`)
    }
    this.current = to
    // Nothing leaving IMPLEMENTING has been judged yet
    const verdict: Verdict = from === 'IMPLEMENTING' ? 'PENDING' : this.verdict
    const record: RevisionTransition = { from, to, revision: this.revisionCount, task, verdict, rationale }
    this.transitions.push(record)
    getLogger().info('revision_transition', {
      runId: context.runId,
      iteration: context.iteration,
      from,
      to,
      revision: this.revisionCount
    })
    this.opts.onEvent?.({
      type: 'transition',
      runId: context.runId,
      iteration: context.iteration,
      phase: 'implementation',
      message: `${from} -> ${to}`,
      data: record
    })
  }

  async run(task: string, context: TaskContext): Promise<RevisionOutcome> {
    if (this.started) throw new Error('RevisionCycle instances run a single task')
    this.started = true

    const { engineer, executor, critic, tokens, onEvent } = this.opts
    let transcript = Transcript.empty()
    let implementingVisits = 1
    let reason: AbortReason | null = null
    let criticSummary = ''

    while (this.current === 'IMPLEMENTING') {
      const engineering = await runRoundRobinChat({
        participants: [engineer, executor],
        closer: engineer.role.name,
        stopTokens: [tokens.engineerDone],
        maxTurns: this.opts.engineerMaxTurns,
        history: transcript,
        onEvent,
        context: {
          ...context,
          phase: 'implementation',
          brief: buildImplementationBrief({
            task,
            revision: this.revisionCount,
            maxRevisions: this.opts.maxRevisions,
            feedback: criticSummary || null,
            completionToken: tokens.engineerDone
          })
        }
      })
      transcript = engineering.transcript

      if (engineering.status === 'budget_exhausted') {
        reason = 'engineer_budget_exhausted'
        this.transition('ABORTED', task, reason, context)
        break
      }
      this.transition('AWAITING_REVIEW', task, `${engineer.role.name} signalled completion`, context)

      const review = await runRoundRobinChat({
        participants: [critic],
        closer: critic.role.name,
        stopTokens: [tokens.revise, tokens.approve, ...(tokens.criticDone ? [tokens.criticDone] : [])],
        maxTurns: this.opts.criticMaxTurns,
        history: transcript,
        onEvent,
        context: {
          ...context,
          phase: 'review',
          brief: buildReviewBrief({ task, approveToken: tokens.approve, reviseToken: tokens.revise })
        }
      })
      transcript = review.transcript

      // An exhausted review still ends on a critic turn; it is classified like any other
      const criticTurn = review.status === 'stopped' ? review.finalTurn : transcript.lastBy(critic.role.name)
      const classified = extractVerdict(criticTurn?.content ?? '', { approve: tokens.approve, revise: tokens.revise })
      this.verdict = classified.verdict
      criticSummary = classified.rationale
      getLogger().info('revision_verdict', {
        runId: context.runId,
        iteration: context.iteration,
        verdict: classified.verdict,
        token: classified.token,
        revision: this.revisionCount
      })
      onEvent?.({
        type: 'verdict',
        runId: context.runId,
        iteration: context.iteration,
        phase: 'review',
        author: critic.role.name,
        message: classified.verdict,
        data: classified
      })

      if (classified.verdict === 'APPROVED') {
        this.transition('APPROVED', task, classified.rationale, context)
        break
      }

      this.transition('REVISION_REQUESTED', task, classified.rationale, context)
      if (this.revisionCount >= this.opts.maxRevisions) {
        reason = 'revision_budget_exhausted'
        this.transition('ABORTED', task, reason, context)
        break
      }
      this.revisionCount++
      implementingVisits++
      this.transition('IMPLEMENTING', task, classified.rationale, context)
    }

    const state = this.current === 'APPROVED' ? 'APPROVED' : 'ABORTED'
    return {
      state,
      reason,
      revisions: this.revisionCount,
      implementingVisits,
      lastVerdict: this.verdict,
      criticSummary,
      transitions: [...this.transitions],
      transcript,
      report: this.buildReport(transcript)
    }
  }

  private buildReport(transcript: Transcript): string {
    const { engineer, critic, tokens, reportMaxTurns } = this.opts
    const authors = [engineer.role.name, critic.role.name]
    const allTokens = [tokens.engineerDone, tokens.approve, tokens.revise, tokens.criticDone]
    const sections = transcript.turns
      .filter((turn) => authors.includes(turn.author))
      .map((turn) => ({ author: turn.author, text: stripTokens(turn.content, allTokens) }))
      .filter((item) => item.text.length > 0)
      .slice(-reportMaxTurns)
      .map((item, idx) => `## Message ${idx + 1} from ${item.author}\n\n${item.text}`)

    return ['# IMPLEMENTATION REPORT', ...sections].join('\n\n')
  }
}
