import { z } from 'zod'
import type { ToolError, ToolInvocation } from '@research-lab/shared'
import { NotebookStoreError } from './notebook-store'
import { getLogger } from './logger'

/** Thrown by tool handlers to report a failure with a specific code. */
export class ToolFailure extends Error {
  constructor(
    readonly code: string,
    message: string
  ) {
    super(message)
    this.name = 'ToolFailure'
  }
}

export type ToolContext = {
  // Aborted when the invocation exceeds its wall-clock timeout
  signal: AbortSignal
  timeoutMs: number
}

export type ToolDefinition<S extends z.AnyZodObject> = {
  name: string
  description: string
  parameters: S
  // Overrides the gateway default for this tool
  timeoutMs?: number
  handler: (args: z.infer<S>, ctx: ToolContext) => Promise<string> | string
}

export type RegisteredToolInfo = {
  name: string
  description: string
  parameters: z.AnyZodObject
}

type Outcome = { kind: 'ok'; result: string } | { kind: 'invalid'; issues: NonNullable<ToolError['issues']> }

type RegisteredTool = RegisteredToolInfo & {
  timeoutMs: number
  run: (raw: unknown, ctx: ToolContext) => Promise<Outcome>
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

class ToolTimeout extends Error {}

export class ToolGateway {
  private tools = new Map<string, RegisteredTool>()

  constructor(private readonly opts: { timeoutMs: number }) {}

  register<S extends z.AnyZodObject>(def: ToolDefinition<S>) {
    if (this.tools.has(def.name)) {
      throw new Error(`Tool "${def.name}" is already registered`)
    }
    this.tools.set(def.name, {
      name: def.name,
      description: def.description,
      parameters: def.parameters,
      timeoutMs: def.timeoutMs ?? this.opts.timeoutMs,
      run: async (raw, ctx) => {
        const parsed = def.parameters.safeParse(raw)
        if (!parsed.success) {
          const issues = parsed.error.issues.map((i) => ({ path: i.path, message: i.message, code: i.code }))
          return { kind: 'invalid', issues }
        }
        return { kind: 'ok', result: await def.handler(parsed.data, ctx) }
      }
    })
  }

  has(name: string) {
    return this.tools.has(name)
  }

  list(allowlist?: readonly string[]): RegisteredToolInfo[] {
    const all = Array.from(this.tools.values())
    const selected = allowlist ? all.filter((t) => allowlist.includes(t.name)) : all
    return selected.map(({ name, description, parameters }) => ({ name, description, parameters }))
  }

  /**
   * Runs a tool under its wall-clock timeout. Every failure comes back as an
   * `error` invocation; only notebook store failures are rethrown.
   */
  async invoke(name: string, args: unknown): Promise<ToolInvocation> {
    const started = Date.now()
    const recordedArgs = isRecord(args) ? args : {}
    const fail = (error: ToolError): ToolInvocation => ({
      tool: name,
      args: recordedArgs,
      durationMs: Date.now() - started,
      status: 'error',
      error
    })
    const log = getLogger()

    const tool = this.tools.get(name)
    if (!tool) {
      log.warn('tool_unknown', { tool: name })
      return fail({ code: 'UNKNOWN_TOOL', message: `Unknown tool: ${name}` })
    }

    const controller = new AbortController()
    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort()
        reject(new ToolTimeout(`Tool ${name} exceeded ${tool.timeoutMs}ms`))
      }, tool.timeoutMs)
    })

    const running = tool.run(args, { signal: controller.signal, timeoutMs: tool.timeoutMs })
    // A handler that settles after its timeout has nobody waiting on it
    running.catch((err: unknown) => {
      if (controller.signal.aborted) {
        log.debug('tool_late_failure', { tool: name, message: err instanceof Error ? err.message : String(err) })
      }
    })

    try {
      const outcome = await Promise.race([running, timeout])
      if (outcome.kind === 'invalid') {
        log.warn('tool_invalid_args', { tool: name, issues: outcome.issues })
        return fail({ code: 'INVALID_ARGUMENT', message: 'Invalid tool arguments', issues: outcome.issues })
      }
      return { tool: name, args: recordedArgs, durationMs: Date.now() - started, status: 'ok', result: outcome.result }
    } catch (err) {
      if (err instanceof NotebookStoreError) throw err
      if (err instanceof ToolTimeout) {
        log.warn('tool_timeout', { tool: name, timeoutMs: tool.timeoutMs })
        return fail({ code: 'TOOL_TIMEOUT', message: err.message })
      }
      if (err instanceof ToolFailure) {
        log.warn('tool_failed', { tool: name, code: err.code, message: err.message })
        return fail({ code: err.code, message: err.message })
      }
      const message = err instanceof Error && err.message ? err.message : 'Tool handler error'
      log.warn('tool_failed', { tool: name, code: 'TOOL_HANDLER_ERROR', message })
      return fail({ code: 'TOOL_HANDLER_ERROR', message })
    } finally {
      clearTimeout(timer)
    }
  }
}
