import { z } from 'zod'

export const RoleTokensSchema = z.object({
  stop: z.string().min(1).optional(),
  approve: z.string().min(1).optional(),
  revise: z.string().min(1).optional(),
  final: z.string().min(1).optional()
})
export type RoleTokens = z.infer<typeof RoleTokensSchema>

export const RoleConfigSchema = z.object({
  name: z.string().min(1),
  role: z.string().min(1),
  prompt: z.string().default(''),
  capabilities: z.array(z.string()).default([]),
  tokens: RoleTokensSchema.default({})
})
export type RoleConfig = z.infer<typeof RoleConfigSchema>

// On-disk persona format (snake_case keys as written in agents.yaml)
export const RoleFileEntrySchema = z
  .object({
    name: z.string().min(1).optional(),
    role: z.string().min(1),
    prompt: z.string().default(''),
    tools: z.array(z.string()).default([]),
    termination_token: z.string().min(1).optional(),
    approval_token: z.string().min(1).optional(),
    revision_token: z.string().min(1).optional(),
    completion_token: z.string().min(1).optional()
  })
  .passthrough()
export type RoleFileEntry = z.infer<typeof RoleFileEntrySchema>

export const TeamsSchema = z.object({
  planning: z.object({
    lead: z.string().min(1),
    participants: z.array(z.string().min(1)).min(1)
  }),
  implementation: z.object({
    engineer: z.string().min(1),
    critic: z.string().min(1)
  })
})
export type Teams = z.infer<typeof TeamsSchema>

export const AgentsFileSchema = z.object({
  agents: z.record(RoleFileEntrySchema),
  teams: TeamsSchema
})
export type AgentsFile = z.infer<typeof AgentsFileSchema>
