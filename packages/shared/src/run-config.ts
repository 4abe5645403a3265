import { z } from 'zod'

export const CodeExecutorKindEnum = z.enum(['docker', 'conda', 'local'])
export type CodeExecutorKind = z.infer<typeof CodeExecutorKindEnum>

export const NotebookBackendEnum = z.enum(['file', 'postgres'])
export type NotebookBackend = z.infer<typeof NotebookBackendEnum>

const positiveInt = () => z.coerce.number().int().positive()

export const RunConfigSchema = z.object({
  runId: z.string().min(1).optional(),
  // Outer Planning -> Implementation exchanges
  maxIterations: positiveInt().default(25),
  // Critic REVISE verdicts honoured before the cycle aborts
  maxRevisions: z.coerce.number().int().min(0).default(3),
  planningMaxTurns: positiveInt().default(15),
  engineerMaxTurns: positiveInt().default(75),
  criticMaxTurns: positiveInt().default(6),
  reportMaxTurns: positiveInt().default(25),
  notebookCharLimit: positiveInt().default(100_000),
  toolTimeoutMs: positiveInt().default(120_000),
  codeTimeoutMs: positiveInt().default(3_600_000),
  // Ceiling on one agent turn: model round-trips and wall-clock time
  agentMaxSteps: positiveInt().default(30),
  agentTimeoutMs: positiveInt().default(600_000),
  outputDir: z.string().min(1).default('workdir'),
  notebookPath: z.string().min(1).default('lab_notebook.jsonl'),
  notebookBackend: NotebookBackendEnum.default('file'),
  persistReviewHistory: z.boolean().default(false),
  executor: z
    .object({
      kind: CodeExecutorKindEnum.default('docker'),
      environment: z.string().min(1).default('agenv:latest')
    })
    .default({}),
  model: z.string().min(1).default('gpt-4.1'),
  plotModel: z.string().min(1).default('gpt-4.1-mini'),
  searchModel: z.string().min(1).default('sonar')
})
export type RunConfig = z.infer<typeof RunConfigSchema>
export type RunConfigInput = z.input<typeof RunConfigSchema>
