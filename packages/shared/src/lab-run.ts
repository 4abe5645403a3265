import { z } from 'zod'

export const ToolErrorSchema = z.object({
  code: z.string(),
  message: z.string(),
  issues: z
    .array(z.object({ path: z.array(z.union([z.string(), z.number()])), message: z.string(), code: z.string() }))
    .optional()
})
export type ToolError = z.infer<typeof ToolErrorSchema>

const ToolInvocationBase = z.object({
  tool: z.string(),
  args: z.record(z.unknown()),
  durationMs: z.number().nonnegative()
})

// Result or error, never both
export const ToolInvocationSchema = z.discriminatedUnion('status', [
  ToolInvocationBase.extend({ status: z.literal('ok'), result: z.string() }),
  ToolInvocationBase.extend({ status: z.literal('error'), error: ToolErrorSchema })
])
export type ToolInvocation = z.infer<typeof ToolInvocationSchema>

export const TurnSchema = z.object({
  author: z.string().min(1),
  content: z.string(),
  toolCalls: z.array(ToolInvocationSchema),
  createdAt: z.string()
})
export type Turn = z.infer<typeof TurnSchema>

export const RunStatusEnum = z.enum(['completed', 'incomplete', 'aborted', 'failed'])
export type RunStatus = z.infer<typeof RunStatusEnum>

export const RevisionStateEnum = z.enum([
  'IMPLEMENTING',
  'AWAITING_REVIEW',
  'APPROVED',
  'REVISION_REQUESTED',
  'ABORTED'
])
export type RevisionState = z.infer<typeof RevisionStateEnum>

export const VerdictEnum = z.enum(['PENDING', 'APPROVED', 'REVISE'])
export type Verdict = z.infer<typeof VerdictEnum>

export const LabPhaseEnum = z.enum(['planning', 'implementation', 'review'])
export type LabPhase = z.infer<typeof LabPhaseEnum>

// Event envelope for observers of a run (CLI echo, log sinks)
export const LabEventSchema = z.object({
  type: z.enum([
    'run_start',
    'iteration_start',
    'phase',
    'turn',
    'tool_call',
    'stop_token_ignored',
    'transition',
    'verdict',
    'notebook_append',
    'budget_exhausted',
    'run_complete',
    'warning'
  ]),
  runId: z.string().optional(),
  iteration: z.number().int().optional(),
  phase: LabPhaseEnum.optional(),
  author: z.string().optional(),
  message: z.string().optional(),
  data: z.unknown().optional()
})
export type LabEvent = z.infer<typeof LabEventSchema>
