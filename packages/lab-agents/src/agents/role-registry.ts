import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { parse } from 'yaml'
import { AgentsFileSchema, type AgentsFile, type RoleConfig, type Teams } from '@research-lab/shared'

export const DEFAULT_AGENTS_PATH = fileURLToPath(new URL('../../config/agents.yaml', import.meta.url))

export type RoleRegistry = {
  readonly teams: Teams
  get(name: string): RoleConfig
  has(name: string): boolean
  list(): RoleConfig[]
  planningRoster(): RoleConfig[]
}

function requireTokens(role: RoleConfig, keys: readonly (keyof RoleConfig['tokens'])[], as: string) {
  const missing = keys.filter((k) => !role.tokens[k])
  if (missing.length) {
    throw new Error(`Role "${role.name}" is the ${as} but has no ${missing.join(', ')} token`)
  }
}

export function createRoleRegistry(file: AgentsFile): RoleRegistry {
  const roles = new Map<string, RoleConfig>()
  for (const [key, entry] of Object.entries(file.agents)) {
    roles.set(key, {
      name: entry.name ?? key,
      role: entry.role,
      prompt: entry.prompt,
      capabilities: entry.tools,
      tokens: {
        stop: entry.termination_token,
        approve: entry.approval_token,
        revise: entry.revision_token,
        final: entry.completion_token
      }
    })
  }

  const get = (name: string): RoleConfig => {
    const role = roles.get(name)
    if (!role) throw new Error(`Unknown role "${name}". Known roles: ${Array.from(roles.keys()).join(', ')}`)
    return role
  }

  const { planning, implementation } = file.teams
  for (const member of planning.participants) get(member)
  if (!planning.participants.includes(planning.lead)) {
    throw new Error(`Planning lead "${planning.lead}" must be listed in teams.planning.participants`)
  }
  requireTokens(get(planning.lead), ['stop', 'final'], 'planning lead')
  requireTokens(get(implementation.engineer), ['stop'], 'engineer')
  requireTokens(get(implementation.critic), ['approve', 'revise'], 'critic')

  return {
    teams: file.teams,
    get,
    has: (name) => roles.has(name),
    list: () => Array.from(roles.values()),
    planningRoster: () => planning.participants.map(get)
  }
}

export function parseAgentsFile(source: string, origin = 'agents.yaml'): AgentsFile {
  let raw: unknown
  try {
    raw = parse(source)
  } catch (err) {
    throw new Error(`Cannot parse ${origin}: ${err instanceof Error ? err.message : String(err)}`)
  }
  const parsed = AgentsFileSchema.safeParse(raw)
  if (!parsed.success) {
    throw new Error(`Invalid role configuration in ${origin}: ${parsed.error.message}`)
  }
  return parsed.data
}

export function loadRoleRegistry(path: string = DEFAULT_AGENTS_PATH): RoleRegistry {
  return createRoleRegistry(parseAgentsFile(readFileSync(path, 'utf8'), path))
}
