import type { RoleConfig } from '@research-lab/shared'

type PlanningBriefInput = {
  task: string
  iteration: number
  maxIterations: number
  notebook: string
  lastReport: string | null
  handoffToken: string
  finalToken: string
}

export function buildPlanningBrief(input: PlanningBriefInput): string {
  const notebook = input.notebook.trim() || '_The notebook is empty._'
  const report = input.lastReport?.trim() || '_No implementation report yet._'
  return [
    '## Research task',
    input.task.trim(),
    '## Lab notebook',
    notebook,
    '## Latest implementation report',
    report,
    '## Instructions',
    `This is planning iteration ${input.iteration} of at most ${input.maxIterations}.`,
    'Review the notebook and the latest report, then agree on the next concrete step for the implementation team.',
    `The lead ends the discussion with ${input.handoffToken} once the plan is ready to hand off.`,
    `If the entire task is complete, the lead ends with ${input.finalToken} instead.`
  ].join('\n\n')
}

type ImplementationBriefInput = {
  task: string
  revision: number
  maxRevisions: number
  feedback: string | null
  completionToken: string
}

export function buildImplementationBrief(input: ImplementationBriefInput): string {
  const parts = ['## Plan to implement', input.task.trim()]
  if (input.revision > 0) {
    parts.push(
      `## Revision ${input.revision} of ${input.maxRevisions}`,
      input.feedback?.trim() || 'The critic asked for a revision without further detail.'
    )
  }
  parts.push(
    '## Instructions',
    'Work in THOUGHT / ACTION / OBSERVATION steps. Put code in fenced ```python or ```sh blocks; the executor runs them and replies with the output.',
    `When the work is finished and documented, end your message with ${input.completionToken}.`
  )
  return parts.join('\n\n')
}

type ReviewBriefInput = {
  task: string
  approveToken: string
  reviseToken: string
}

export function buildReviewBrief(input: ReviewBriefInput): string {
  return [
    '## Plan under review',
    input.task.trim(),
    '## Instructions',
    'Review the implementation transcript against the plan.',
    `Reply with ${input.approveToken} if the work is acceptable, or ${input.reviseToken} followed by the changes required.`
  ].join('\n\n')
}

type InstructionInput = {
  roster: readonly string[]
  tools: readonly string[]
  today?: Date
}

export function buildInstructions(role: RoleConfig, input: InstructionInput): string {
  const today = (input.today ?? new Date()).toISOString().slice(0, 10)
  const lines = [role.prompt.trim() || `You are the ${role.role}.`, `Today's date is ${today}.`]
  if (input.roster.length) lines.push(`Team members: ${input.roster.join(', ')}.`)
  lines.push(input.tools.length ? `Tools available to you: ${input.tools.join(', ')}.` : 'You have no tools; reply in text only.')
  return lines.join('\n\n')
}
