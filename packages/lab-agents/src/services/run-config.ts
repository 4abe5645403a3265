import { RunConfigSchema, type RunConfig, type RunConfigInput } from '@research-lab/shared'
import { getEnv, type Env } from '../utils/env'

function definedOnly(input: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined))
}

function envLayer(env: Env): Record<string, unknown> {
  return definedOnly({
    runId: env.LAB_RUN_ID,
    maxIterations: env.LAB_MAX_ITERATIONS,
    maxRevisions: env.LAB_MAX_REVISIONS,
    planningMaxTurns: env.LAB_PLANNING_MAX_TURNS,
    engineerMaxTurns: env.LAB_ENGINEER_MAX_TURNS,
    criticMaxTurns: env.LAB_CRITIC_MAX_TURNS,
    toolTimeoutMs: env.LAB_TOOL_TIMEOUT_MS,
    codeTimeoutMs: env.LAB_CODE_TIMEOUT_MS,
    agentMaxSteps: env.LAB_AGENT_MAX_STEPS,
    agentTimeoutMs: env.LAB_AGENT_TIMEOUT_MS,
    outputDir: env.LAB_OUTPUT_DIR,
    notebookPath: env.LAB_NOTEBOOK_PATH,
    notebookBackend: env.LAB_NOTEBOOK_BACKEND,
    persistReviewHistory: env.LAB_PERSIST_REVIEWS === undefined ? undefined : ['true', '1'].includes(env.LAB_PERSIST_REVIEWS),
    model: env.OPENAI_DEFAULT_MODEL,
    plotModel: env.LAB_PLOT_MODEL,
    searchModel: env.LAB_SEARCH_MODEL
  })
}

/**
 * Resolves the run configuration: schema defaults, then environment, then
 * explicit overrides (CLI flags). Throws on any invalid value.
 */
export function loadRunConfig(overrides: RunConfigInput = {}, env: Env = getEnv()): RunConfig {
  const fromEnv = envLayer(env)
  const explicit = definedOnly(overrides)
  const executor = {
    ...definedOnly({ kind: env.LAB_EXECUTOR, environment: env.LAB_EXECUTOR_ENV }),
    ...(overrides.executor ? definedOnly(overrides.executor) : {})
  }

  const parsed = RunConfigSchema.safeParse({ ...fromEnv, ...explicit, executor })
  if (!parsed.success) {
    throw new Error(`Invalid run configuration: ${parsed.error.message}`)
  }
  if (parsed.data.notebookBackend === 'postgres' && !env.DATABASE_URL) {
    throw new Error('DATABASE_URL is required when the notebook backend is postgres')
  }
  return parsed.data
}
