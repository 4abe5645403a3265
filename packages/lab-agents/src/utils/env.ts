import { z } from 'zod'

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_DEFAULT_MODEL: z.string().min(1).optional(),
  PERPLEXITY_API_KEY: z.string().min(1).optional(),
  PERPLEXITY_BASE_URL: z.string().url().default('https://api.perplexity.ai'),
  DATABASE_URL: z.string().url().optional(),
  LAB_RUN_ID: z.string().min(1).optional(),
  LAB_MAX_ITERATIONS: z.string().optional(),
  LAB_MAX_REVISIONS: z.string().optional(),
  LAB_PLANNING_MAX_TURNS: z.string().optional(),
  LAB_ENGINEER_MAX_TURNS: z.string().optional(),
  LAB_CRITIC_MAX_TURNS: z.string().optional(),
  LAB_TOOL_TIMEOUT_MS: z.string().optional(),
  LAB_CODE_TIMEOUT_MS: z.string().optional(),
  LAB_AGENT_MAX_STEPS: z.string().optional(),
  LAB_AGENT_TIMEOUT_MS: z.string().optional(),
  LAB_OUTPUT_DIR: z.string().min(1).optional(),
  LAB_NOTEBOOK_PATH: z.string().min(1).optional(),
  LAB_NOTEBOOK_BACKEND: z.string().optional(),
  LAB_PERSIST_REVIEWS: z.enum(['true', 'false', '1', '0']).optional(),
  LAB_EXECUTOR: z.string().optional(),
  LAB_EXECUTOR_ENV: z.string().min(1).optional(),
  LAB_PLOT_MODEL: z.string().min(1).optional(),
  LAB_SEARCH_MODEL: z.string().min(1).optional()
})

export type Env = z.infer<typeof EnvSchema>

export function getEnv(source: NodeJS.ProcessEnv = process.env): Env {
  // Empty strings from .env templates count as unset
  const cleaned: Record<string, string> = {}
  for (const [key, value] of Object.entries(source)) {
    if (typeof value === 'string' && value.trim() !== '') cleaned[key] = value.trim()
  }

  const parsed = EnvSchema.safeParse(cleaned)
  if (!parsed.success) {
    throw new Error(`Invalid environment configuration: ${parsed.error.message}`)
  }
  return parsed.data
}
