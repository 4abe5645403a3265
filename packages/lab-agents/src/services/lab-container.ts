import { isAbsolute, resolve } from 'node:path'
import type { LabEvent, RunConfig } from '@research-lab/shared'
import { AgentRuntime } from './agent-runtime'
import { ToolGateway } from './tool-gateway'
import { LabOrchestrator } from './lab-orchestrator'
import { createAgentParticipant } from './participant'
import { createFileNotebookStore, createPostgresNotebookStore, type NotebookStore } from './notebook-store'
import { genCorrelationId, getLogger } from './logger'
import { loadRoleRegistry, type RoleRegistry } from '../agents/role-registry'
import { createCodeExecutor } from '../agents/code-executor'
import { loadTask, type ResearchTask } from '../agents/task-registry'
import { registerFileTools } from '../tools/files'
import { registerWebTools } from '../tools/web'
import { registerPlotTools } from '../tools/plot'
import { registerCodeTools, removeTempCodeFiles } from '../tools/code'
import { registerNotebookTools } from '../tools/notebook'

export type Lab = {
  runId: string
  config: RunConfig
  task: ResearchTask
  registry: RoleRegistry
  gateway: ToolGateway
  store: NotebookStore
  orchestrator: LabOrchestrator
}

export type CreateLabOptions = {
  registry?: RoleRegistry
  task?: ResearchTask
  store?: NotebookStore
  onEvent?: (event: LabEvent) => void
}

export function resolveNotebookPath(config: Pick<RunConfig, 'outputDir' | 'notebookPath'>): string {
  return isAbsolute(config.notebookPath) ? config.notebookPath : resolve(config.outputDir, config.notebookPath)
}

export function createNotebookStore(config: RunConfig, runId: string): NotebookStore {
  return config.notebookBackend === 'postgres'
    ? createPostgresNotebookStore(runId)
    : createFileNotebookStore(resolveNotebookPath(config))
}

/** Wires the gateway, runtime, participants and store for one run. */
export function createLab(config: RunConfig, opts: CreateLabOptions = {}): Lab {
  const runId = config.runId ?? genCorrelationId()
  const registry = opts.registry ?? loadRoleRegistry()
  const task = opts.task ?? loadTask()
  const store = opts.store ?? createNotebookStore(config, runId)
  const workdir = resolve(config.outputDir)

  const gateway = new ToolGateway({ timeoutMs: config.toolTimeoutMs })
  registerFileTools(gateway, { workdir })
  registerWebTools(gateway, { searchModel: config.searchModel })
  registerPlotTools(gateway, { workdir, plotModel: config.plotModel })
  registerCodeTools(gateway, { ...config.executor, workdir, timeoutMs: config.codeTimeoutMs })
  registerNotebookTools(gateway, { store, charLimit: config.notebookCharLimit })

  const { teams } = registry
  const roster = registry.list().map((r) => r.name)
  const runtime = new AgentRuntime(gateway, {
    model: config.model,
    roster,
    maxSteps: config.agentMaxSteps,
    timeoutMs: config.agentTimeoutMs
  })
  const participant = (name: string) => createAgentParticipant(registry.get(name), runtime)

  const orchestrator = new LabOrchestrator({
    runId,
    task: task.text,
    planning: {
      lead: participant(teams.planning.lead),
      members: teams.planning.participants.map(participant)
    },
    implementation: {
      engineer: participant(teams.implementation.engineer),
      executor: createCodeExecutor(gateway, { environment: config.executor.environment }),
      critic: participant(teams.implementation.critic)
    },
    store,
    limits: config,
    onEvent: opts.onEvent,
    onIterationComplete: async (iteration) => {
      const removed = await removeTempCodeFiles(workdir)
      if (removed > 0) getLogger().debug('temp_code_removed', { runId, iteration, removed })
    }
  })

  return { runId, config, task, registry, gateway, store, orchestrator }
}
