// @vitest-environment node
import { describe, expect, it } from 'vitest'
import type { LabEvent } from '@research-lab/shared'
import { LabOrchestrator, type OrchestratorLimits } from '../src/services/lab-orchestrator'
import { NotebookStoreError, createInMemoryNotebookStore, type NotebookStore } from '../src/services/notebook-store'
import { scripted } from './helpers/scripted'

const leadTokens = { stop: 'TERMINATE', final: 'ENTIRE_TASK_DONE' }
const criticTokens = { approve: 'APPROVE_ENGINEER', revise: 'REVISE_ENGINEER', stop: 'TERMINATE_CRITIC' }

type LabSetup = {
  lead: string[]
  engineer?: string[]
  critic?: string[]
  limits?: Partial<OrchestratorLimits>
  store?: NotebookStore
  events?: LabEvent[]
  completed?: number[]
}

function buildLab(setup: LabSetup) {
  const lead = scripted('lead', setup.lead, leadTokens)
  const expertA = scripted('expert_a', ['Idea from A'])
  const expertB = scripted('expert_b', ['Idea from B'])
  const engineer = scripted('engineer', setup.engineer ?? ['Done. ENGINEER_DONE'], { stop: 'ENGINEER_DONE' })
  const executor = scripted('executor', ['exitcode: 0 (execution succeeded)\nCode output: ok'])
  const critic = scripted('critic', setup.critic ?? ['Good. APPROVE_ENGINEER'], criticTokens)
  const store = setup.store ?? createInMemoryNotebookStore()
  const orchestrator = new LabOrchestrator({
    runId: 'run_test',
    task: 'Predict age from methylation.',
    planning: { lead, members: [lead, expertA, expertB] },
    implementation: { engineer, executor, critic },
    store,
    limits: {
      maxIterations: 3,
      maxRevisions: 1,
      planningMaxTurns: 10,
      engineerMaxTurns: 6,
      criticMaxTurns: 2,
      reportMaxTurns: 25,
      notebookCharLimit: 100_000,
      persistReviewHistory: false,
      ...setup.limits
    },
    onEvent: setup.events ? (e) => setup.events?.push(e) : undefined,
    onIterationComplete: setup.completed
      ? async (iteration) => {
          setup.completed?.push(iteration)
        }
      : undefined
  })
  return { orchestrator, store, lead, expertA, engineer, critic }
}

const APPROVED_OUTPUT =
  '# IMPLEMENTATION REPORT\n\n## Message 1 from engineer\n\nDone.\n\n## Message 2 from critic\n\nGood.' +
  '\n\nVERDICT: APPROVED (revisions: 0)\n\nCRITIC SUMMARY: Good.'

describe('LabOrchestrator', () => {
  it('ends incomplete after exactly maxIterations when the lead never finishes', async () => {
    const completed: number[] = []
    const { orchestrator, store, lead } = buildLab({ lead: ['Next step: fit a baseline. TERMINATE'], completed })

    const result = await orchestrator.run()

    expect(result.status).toBe('incomplete')
    expect(result.reason).toBe('iteration_budget_exhausted')
    expect(result.iterations).toBe(3)
    expect(result.cycles.map((c) => c.state)).toEqual(['APPROVED', 'APPROVED', 'APPROVED'])
    expect(result.lastPlan).toBe('Next step: fit a baseline.')
    expect(result.lastReport).toBe(APPROVED_OUTPUT)
    expect(lead.calls.map((c) => c.context.iteration)).toEqual([1, 2, 3])
    expect(completed).toEqual([1, 2, 3])

    const entries = await store.read()
    expect(entries.map((e) => `${e.iteration}:${e.entryType}`)).toEqual(['1:PLAN', '1:OUTPUT', '2:PLAN', '2:OUTPUT', '3:PLAN', '3:OUTPUT'])
    expect(entries[1]).toMatchObject({ team: 'IMPLEMENTATION', source: 'engineer', body: APPROVED_OUTPUT })
  })

  it('completes on iteration 1 when the lead emits the final token, whatever the budget', async () => {
    const { orchestrator, store, engineer } = buildLab({ lead: ['The question is answered. ENTIRE_TASK_DONE'], limits: { maxIterations: 25 } })

    const result = await orchestrator.run()

    expect(result.status).toBe('completed')
    expect(result.iterations).toBe(1)
    expect(result.reason).toBe('final_token')
    expect(engineer.calls).toHaveLength(0)
    expect((await store.read()).map((e) => e.entryType)).toEqual(['PLAN', 'COMPLETION'])
  })

  it('lets the final token win when it shares a turn with the handoff token', async () => {
    const { orchestrator, engineer } = buildLab({ lead: ['Plan. TERMINATE ENTIRE_TASK_DONE'] })
    const result = await orchestrator.run()
    expect(result.status).toBe('completed')
    expect(result.lastPlan).toBe('Plan.')
    expect(engineer.calls).toHaveLength(0)
  })

  it('runs the full planning rotation before the lead hands off', async () => {
    const { orchestrator, expertA, engineer } = buildLab({
      lead: ['Proposal', 'Agreed. TERMINATE', 'All done. ENTIRE_TASK_DONE'],
      limits: { maxIterations: 2 }
    })
    const result = await orchestrator.run()

    expect(result.status).toBe('completed')
    expect(result.iterations).toBe(2)
    expect(expertA.calls).toHaveLength(1)
    expect(engineer.calls[0]?.context.brief).toContain('## Plan to implement\n\nAgreed.')
  })

  it('feeds the notebook and the latest report into the next planning chat', async () => {
    const { orchestrator, lead } = buildLab({ lead: ['Fit it. TERMINATE'], limits: { maxIterations: 2 } })
    await orchestrator.run()

    const first = lead.calls[0]?.context.brief ?? ''
    const second = lead.calls[1]?.context.brief ?? ''
    expect(first).toContain('_The notebook is empty._')
    expect(first).toContain('_No implementation report yet._')
    expect(second).toContain(`## Latest implementation report\n\n${APPROVED_OUTPUT}`)
    expect(second).toContain('lead (PLANNING) - PLAN (iteration 1)\n\nFit it.')
    expect(second).toContain('This is planning iteration 2 of at most 2.')
  })

  it('aborts the run when planning exhausts its turn budget', async () => {
    const { orchestrator, store } = buildLab({ lead: ['Still debating'], limits: { planningMaxTurns: 5 } })
    const result = await orchestrator.run()

    expect(result.status).toBe('aborted')
    expect(result.reason).toBe('planning_budget_exhausted')
    expect(result.iterations).toBe(1)
    const entries = await store.read()
    expect(entries).toHaveLength(1)
    expect(entries[0]).toMatchObject({ team: 'SYSTEM', entryType: 'NOTE', iteration: 1 })
  })

  it('keeps going after an aborted revision cycle and records the abort', async () => {
    const { orchestrator, store } = buildLab({
      lead: ['Try again. TERMINATE'],
      critic: ['Wrong metric. REVISE_ENGINEER'],
      limits: { maxIterations: 2, maxRevisions: 0 }
    })
    const result = await orchestrator.run()

    expect(result.status).toBe('incomplete')
    expect(result.cycles).toEqual([
      { iteration: 1, state: 'ABORTED', reason: 'revision_budget_exhausted', revisions: 0, lastVerdict: 'REVISE' },
      { iteration: 2, state: 'ABORTED', reason: 'revision_budget_exhausted', revisions: 0, lastVerdict: 'REVISE' }
    ])
    const outputs = (await store.read()).filter((e) => e.entryType === 'OUTPUT')
    expect(outputs[0]?.body.endsWith('VERDICT: ABORTED (revision_budget_exhausted, revisions: 0)\n\nCRITIC SUMMARY: Wrong metric.')).toBe(true)
  })

  it('persists review transitions when asked to', async () => {
    const { orchestrator, store } = buildLab({ lead: ['Go. TERMINATE'], limits: { maxIterations: 1, persistReviewHistory: true } })
    await orchestrator.run()

    const reviews = (await store.read()).filter((e) => e.entryType === 'REVIEW')
    expect(reviews.map((e) => e.body)).toEqual([
      'IMPLEMENTING -> AWAITING_REVIEW (revision 0, verdict PENDING): engineer signalled completion',
      'AWAITING_REVIEW -> APPROVED (revision 0, verdict APPROVED): Good.'
    ])
  })

  it('ends failed when the notebook cannot be written', async () => {
    const failing: NotebookStore = {
      append: async () => {
        throw new NotebookStoreError('disk full')
      },
      read: async () => []
    }
    const { orchestrator } = buildLab({ lead: ['Plan. TERMINATE'], store: failing })
    const result = await orchestrator.run()

    expect(result.status).toBe('failed')
    expect(result.reason).toBe('notebook_store_failure')
    expect(result.error).toBe('disk full')
    expect(result.iterations).toBe(1)
  })

  it('rethrows errors that are not store failures', async () => {
    const { orchestrator, lead } = buildLab({ lead: ['x'] })
    lead.takeTurn = async () => {
      throw new Error('model unavailable')
    }
    await expect(orchestrator.run()).rejects.toThrow('model unavailable')
  })

  it('resumes after the last iteration that has an output entry', async () => {
    const store = createInMemoryNotebookStore()
    for (const iteration of [1, 2]) {
      await store.append({ team: 'PLANNING', source: 'lead', entryType: 'PLAN', iteration, body: `plan ${iteration}` })
      await store.append({ team: 'IMPLEMENTATION', source: 'engineer', entryType: 'OUTPUT', iteration, body: `report ${iteration}` })
    }
    const { orchestrator, lead } = buildLab({ lead: ['Continue. TERMINATE'], store })

    const result = await orchestrator.run()

    expect(result.status).toBe('incomplete')
    expect(result.iterations).toBe(3)
    expect(lead.calls.map((c) => c.context.iteration)).toEqual([3])
    expect(lead.calls[0]?.context.brief).toContain('## Latest implementation report\n\nreport 2')
    expect((await store.read({ since: 4 })).map((e) => `${e.iteration}:${e.entryType}`)).toEqual(['3:PLAN', '3:OUTPUT'])
  })

  it('returns completed straight away for a notebook that already holds a completion', async () => {
    const store = createInMemoryNotebookStore()
    await store.append({ team: 'PLANNING', source: 'lead', entryType: 'PLAN', iteration: 2, body: 'plan' })
    await store.append({ team: 'PLANNING', source: 'lead', entryType: 'COMPLETION', iteration: 2, body: 'done' })
    const { orchestrator, lead } = buildLab({ lead: ['x'], store })

    const result = await orchestrator.run()

    expect(result).toMatchObject({ status: 'completed', iterations: 2, reason: 'already_completed' })
    expect(lead.calls).toHaveLength(0)
  })

  it('emits run lifecycle events in order', async () => {
    const events: LabEvent[] = []
    const { orchestrator } = buildLab({ lead: ['Done. ENTIRE_TASK_DONE'], events })
    await orchestrator.run()

    const types = events.map((e) => e.type)
    expect(types[0]).toBe('run_start')
    expect(types[1]).toBe('iteration_start')
    expect(types.at(-1)).toBe('run_complete')
    expect(events.filter((e) => e.type === 'notebook_append').map((e) => e.message)).toEqual(['PLAN', 'COMPLETION'])
  })

  it('requires the lead tokens and the lead among the planning members', () => {
    const lead = scripted('lead', [], { stop: 'TERMINATE' })
    const other = scripted('other', [], leadTokens)
    const implementation = {
      engineer: scripted('engineer', [], { stop: 'ENGINEER_DONE' }),
      executor: scripted('executor', []),
      critic: scripted('critic', [], criticTokens)
    }
    const limits: OrchestratorLimits = {
      maxIterations: 1,
      maxRevisions: 0,
      planningMaxTurns: 1,
      engineerMaxTurns: 1,
      criticMaxTurns: 1,
      reportMaxTurns: 1,
      notebookCharLimit: 100,
      persistReviewHistory: false
    }
    const store = createInMemoryNotebookStore()

    expect(
      () => new LabOrchestrator({ runId: 'r', task: 't', planning: { lead, members: [lead] }, implementation, store, limits })
    ).toThrow('requires a final token on lead')
    expect(
      () => new LabOrchestrator({ runId: 'r', task: 't', planning: { lead: other, members: [lead] }, implementation, store, limits })
    ).toThrow('Planning lead "other" must be one of the planning members')
  })
})
