import type { LabEvent, NotebookEntry, NotebookEntryInput, RunConfig, RunStatus, Verdict } from '@research-lab/shared'
import type { Participant, TaskContext } from './participant'
import { runRoundRobinChat } from './round-robin-chat'
import { RevisionCycle, type AbortReason, type RevisionOutcome } from './revision-loop'
import { NotebookStoreError, condenseNotebook, type NotebookStore } from './notebook-store'
import { buildPlanningBrief } from './prompt-context'
import { stripTokens } from './verdict'
import { getLogger } from './logger'

export type PlanningTeam = {
  lead: Participant
  // Speaking order; must include the lead
  members: readonly Participant[]
}

export type ImplementationTeam = {
  engineer: Participant
  executor: Participant
  critic: Participant
}

export type OrchestratorLimits = Pick<
  RunConfig,
  | 'maxIterations'
  | 'maxRevisions'
  | 'planningMaxTurns'
  | 'engineerMaxTurns'
  | 'criticMaxTurns'
  | 'reportMaxTurns'
  | 'notebookCharLimit'
  | 'persistReviewHistory'
>

export type LabOrchestratorOptions = {
  runId: string
  task: string
  planning: PlanningTeam
  implementation: ImplementationTeam
  store: NotebookStore
  limits: OrchestratorLimits
  onEvent?: (event: LabEvent) => void
  // Runs after each iteration's output is persisted (temp file cleanup and similar)
  onIterationComplete?: (iteration: number) => Promise<void>
}

export type CycleSummary = {
  iteration: number
  state: RevisionOutcome['state']
  reason: AbortReason | null
  revisions: number
  lastVerdict: Verdict
}

export type LabRunResult = {
  runId: string
  status: RunStatus
  // Highest iteration reached, counting iterations from earlier resumed runs
  iterations: number
  lastPlan: string | null
  lastReport: string | null
  reason: string | null
  error: string | null
  cycles: CycleSummary[]
}

type Tokens = {
  handoff: string
  final: string
  engineerDone: string
  approve: string
  revise: string
  criticDone?: string
}

function requireToken(value: string | undefined, what: string): string {
  if (!value) throw new Error(`Lab orchestrator requires ${what}`)
  return value
}

function formatOutput(outcome: RevisionOutcome): string {
  const status =
    outcome.state === 'APPROVED'
      ? `VERDICT: APPROVED (revisions: ${outcome.revisions})`
      : `VERDICT: ABORTED (${outcome.reason ?? 'unknown'}, revisions: ${outcome.revisions})`
  const summary = outcome.criticSummary ? `\n\nCRITIC SUMMARY: ${outcome.criticSummary}` : ''
  return `${outcome.report}\n\n${status}${summary}`
}

/**
 * Alternates Planning and Implementation for a bounded number of outer
 * iterations. The notebook store is the only state carried between
 * iterations and between processes.
 */
export class LabOrchestrator {
  private readonly tokens: Tokens

  constructor(private readonly opts: LabOrchestratorOptions) {
    const { planning, implementation } = opts
    if (!planning.members.some((m) => m.role.name === planning.lead.role.name)) {
      throw new Error(`Planning lead "${planning.lead.role.name}" must be one of the planning members`)
    }
    const leadTokens = planning.lead.role.tokens
    const criticTokens = implementation.critic.role.tokens
    this.tokens = {
      handoff: requireToken(leadTokens.stop, `a stop token on ${planning.lead.role.name}`),
      final: requireToken(leadTokens.final, `a final token on ${planning.lead.role.name}`),
      engineerDone: requireToken(implementation.engineer.role.tokens.stop, `a stop token on ${implementation.engineer.role.name}`),
      approve: requireToken(criticTokens.approve, `an approve token on ${implementation.critic.role.name}`),
      revise: requireToken(criticTokens.revise, `a revise token on ${implementation.critic.role.name}`),
      criticDone: criticTokens.stop
    }
  }

  async run(): Promise<LabRunResult> {
    const { runId, limits, onEvent } = this.opts
    const log = getLogger()
    const result: LabRunResult = {
      runId,
      status: 'incomplete',
      iterations: 0,
      lastPlan: null,
      lastReport: null,
      reason: null,
      error: null,
      cycles: []
    }

    log.info('lab_run_start', { runId, maxIterations: limits.maxIterations })
    onEvent?.({ type: 'run_start', runId, data: { maxIterations: limits.maxIterations } })

    try {
      await this.execute(result)
    } catch (err) {
      if (!(err instanceof NotebookStoreError)) throw err
      log.error('lab_run_failed', { runId, iteration: result.iterations, error: err.message })
      result.status = 'failed'
      result.reason = 'notebook_store_failure'
      result.error = err.message
    }

    log.info('lab_run_complete', { runId, status: result.status, iterations: result.iterations, reason: result.reason })
    onEvent?.({ type: 'run_complete', runId, iteration: result.iterations, message: result.status, data: result })
    return result
  }

  private async record(entry: NotebookEntryInput): Promise<NotebookEntry> {
    const stored = await this.opts.store.append(entry)
    this.opts.onEvent?.({
      type: 'notebook_append',
      runId: this.opts.runId,
      iteration: stored.iteration ?? undefined,
      author: stored.source,
      message: stored.entryType,
      data: stored
    })
    return stored
  }

  private async execute(result: LabRunResult): Promise<void> {
    const { runId, task, planning, implementation, store, limits, onEvent } = this.opts
    const log = getLogger()
    const tokens = this.tokens

    const history = await store.read()
    const outputs = history.filter((e) => e.entryType === 'OUTPUT')
    const lastOutput = outputs[outputs.length - 1]
    result.lastReport = lastOutput ? lastOutput.body : null

    if (history.some((e) => e.entryType === 'COMPLETION')) {
      result.iterations = history.reduce((max, e) => Math.max(max, e.iteration ?? 0), 0)
      result.status = 'completed'
      result.reason = 'already_completed'
      log.info('lab_run_resume_completed', { runId, iterations: result.iterations })
      return
    }

    const resumeAfter = outputs.reduce((max, e) => Math.max(max, e.iteration ?? 0), 0)
    if (resumeAfter > 0) {
      log.info('lab_run_resume', { runId, resumeAfter })
    }
    result.iterations = resumeAfter

    for (let iteration = resumeAfter + 1; iteration <= limits.maxIterations; iteration++) {
      result.iterations = iteration
      onEvent?.({ type: 'iteration_start', runId, iteration })
      onEvent?.({ type: 'phase', runId, iteration, phase: 'planning' })

      const notebook = condenseNotebook(await store.read(), limits.notebookCharLimit)
      const context: TaskContext = {
        runId,
        iteration,
        phase: 'planning',
        brief: buildPlanningBrief({
          task,
          iteration,
          maxIterations: limits.maxIterations,
          notebook,
          lastReport: result.lastReport,
          handoffToken: tokens.handoff,
          finalToken: tokens.final
        })
      }

      const chat = await runRoundRobinChat({
        participants: planning.members,
        closer: planning.lead.role.name,
        // Final completion wins when both tokens appear in one turn
        stopTokens: [tokens.final, tokens.handoff],
        maxTurns: limits.planningMaxTurns,
        context,
        onEvent
      })

      if (chat.status === 'budget_exhausted') {
        await this.record({
          team: 'SYSTEM',
          source: 'orchestrator',
          entryType: 'NOTE',
          iteration,
          body: `Planning reached ${limits.planningMaxTurns} turns without a decision from ${planning.lead.role.name}; run aborted.`
        })
        result.status = 'aborted'
        result.reason = 'planning_budget_exhausted'
        return
      }

      const plan = stripTokens(chat.finalTurn.content, [tokens.final, tokens.handoff])
      result.lastPlan = plan
      await this.record({ team: 'PLANNING', source: planning.lead.role.name, entryType: 'PLAN', iteration, body: plan })

      if (chat.token === tokens.final) {
        await this.record({
          team: 'PLANNING',
          source: planning.lead.role.name,
          entryType: 'COMPLETION',
          iteration,
          body: `Research task declared complete at iteration ${iteration}.`
        })
        log.info('lab_task_completed', { runId, iteration })
        result.status = 'completed'
        result.reason = 'final_token'
        return
      }

      log.info('planning_handoff', { runId, iteration, turns: chat.turns })
      onEvent?.({ type: 'phase', runId, iteration, phase: 'implementation' })

      const cycle = new RevisionCycle({
        ...implementation,
        tokens: {
          engineerDone: tokens.engineerDone,
          approve: tokens.approve,
          revise: tokens.revise,
          criticDone: tokens.criticDone
        },
        maxRevisions: limits.maxRevisions,
        engineerMaxTurns: limits.engineerMaxTurns,
        criticMaxTurns: limits.criticMaxTurns,
        reportMaxTurns: limits.reportMaxTurns,
        onEvent
      })
      const outcome = await cycle.run(plan, { ...context, phase: 'implementation' })

      if (limits.persistReviewHistory) {
        for (const t of outcome.transitions) {
          await this.record({
            team: 'IMPLEMENTATION',
            source: implementation.critic.role.name,
            entryType: 'REVIEW',
            iteration,
            body: `${t.from} -> ${t.to} (revision ${t.revision}, verdict ${t.verdict}): ${t.rationale}`
          })
        }
      }

      const output = formatOutput(outcome)
      await this.record({
        team: 'IMPLEMENTATION',
        source: implementation.engineer.role.name,
        entryType: 'OUTPUT',
        iteration,
        body: output
      })
      result.lastReport = output
      result.cycles.push({
        iteration,
        state: outcome.state,
        reason: outcome.reason,
        revisions: outcome.revisions,
        lastVerdict: outcome.lastVerdict
      })

      await this.opts.onIterationComplete?.(iteration)
    }

    result.status = 'incomplete'
    result.reason = 'iteration_budget_exhausted'
    log.warn('lab_iteration_budget_exhausted', { runId, maxIterations: limits.maxIterations })
    onEvent?.({ type: 'budget_exhausted', runId, iteration: result.iterations, message: 'iteration budget exhausted' })
  }
}
