import { Agent as OAAgent, MaxTurnsExceededError, Runner, tool as agentTool } from '@openai/agents'
import type { RoleConfig, ToolInvocation, Turn } from '@research-lab/shared'
import type { TaskContext, TurnGenerator } from './participant'
import type { Transcript } from './transcript'
import type { ToolGateway } from './tool-gateway'
import { NotebookStoreError } from './notebook-store'
import { buildInstructions } from './prompt-context'
import { getLogger } from './logger'

export type AgentRuntimeOptions = {
  model: string
  // Names of every participant, shown to each agent in its instructions
  roster?: readonly string[]
  // Model round-trips allowed in one turn (tool calls included)
  maxSteps: number
  timeoutMs: number
}

function renderPrompt(transcript: Transcript, context: TaskContext): string {
  const conversation = transcript.length ? transcript.render() : '_No messages yet; you speak first._'
  return `${context.brief}\n\n## Conversation so far\n\n${conversation}`
}

function toolResultText(invocation: ToolInvocation): string {
  if (invocation.status === 'ok') return invocation.result
  return `ERROR ${invocation.error.code}: ${invocation.error.message}`
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

// The SDK may wrap errors thrown from tools; look through the cause chain
function findStoreFailure(err: unknown): NotebookStoreError | null {
  let current: unknown = err
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if (current instanceof NotebookStoreError) return current
    current = current.cause
  }
  return null
}

/**
 * Produces turns with the Agents SDK. Each role only sees the gateway tools
 * named in its capabilities, and every call it makes is recorded on the turn.
 */
export class AgentRuntime implements TurnGenerator {
  constructor(
    private readonly gateway: ToolGateway,
    private readonly opts: AgentRuntimeOptions
  ) {
    if (!process.env.OPENAI_API_KEY) {
      getLogger().warn('openai_api_key_missing', { hint: 'OPENAI_API_KEY not set; SDK calls will fail' })
    }
  }

  getModel() {
    return this.opts.model
  }

  // Wrap allowlisted gateway tools for the SDK; invocations are pushed onto `sink`
  getAgentTools(role: RoleConfig, sink: ToolInvocation[]) {
    return this.gateway.list(role.capabilities).map((t) =>
      agentTool({
        name: t.name,
        description: t.description,
        parameters: t.parameters,
        execute: async (input: unknown) => {
          const invocation = await this.gateway.invoke(t.name, input)
          sink.push(invocation)
          return toolResultText(invocation)
        },
        // Store failures end the run; anything else goes back to the model as text
        errorFunction: (_ctx, err) => {
          const storeFailure = findStoreFailure(err)
          if (storeFailure) throw storeFailure
          return `ERROR TOOL_HANDLER_ERROR: ${errorMessage(err)}`
        }
      })
    )
  }

  async generate(role: RoleConfig, transcript: Transcript, context: TaskContext): Promise<Turn> {
    const toolCalls: ToolInvocation[] = []
    const tools = this.getAgentTools(role, toolCalls)
    const agent = new OAAgent({
      name: role.name,
      instructions: buildInstructions(role, {
        roster: this.opts.roster ?? [],
        tools: tools.map((t) => t.name)
      }),
      model: this.opts.model,
      tools
    })

    const { maxSteps, timeoutMs } = this.opts
    const runner = new Runner({ model: this.opts.model })
    const signal = AbortSignal.timeout(timeoutMs)
    const started = Date.now()
    let content: string
    try {
      const result = await runner.run(agent, renderPrompt(transcript, context), { maxTurns: maxSteps, signal })
      content = typeof result.finalOutput === 'string' ? result.finalOutput : ''
    } catch (err) {
      const storeFailure = findStoreFailure(err)
      if (storeFailure) throw storeFailure
      // Exhausted turns come back as text so the sub-chat's own caps decide the outcome
      if (err instanceof MaxTurnsExceededError) {
        content = `[agent error] ${role.name} used all ${maxSteps} steps without producing a reply`
      } else if (signal.aborted) {
        content = `[agent error] ${role.name} did not reply within ${timeoutMs}ms`
      } else {
        throw err
      }
      getLogger().warn('agent_turn_failed', {
        runId: context.runId,
        iteration: context.iteration,
        role: role.name,
        error: errorMessage(err)
      })
    }

    getLogger().debug('agent_turn', {
      runId: context.runId,
      iteration: context.iteration,
      role: role.name,
      durationMs: Date.now() - started,
      toolCalls: toolCalls.length
    })

    return { author: role.name, content, toolCalls, createdAt: new Date().toISOString() }
  }
}
