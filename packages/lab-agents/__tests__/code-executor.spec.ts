// @vitest-environment node
import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import { ToolFailure, ToolGateway } from '../src/services/tool-gateway'
import { Transcript } from '../src/services/transcript'
import { NO_CODE_REPLY, createCodeExecutor, extractCodeBlocks } from '../src/agents/code-executor'
import { context, turn } from './helpers/scripted'

function fakeExecuteCode(fail = false) {
  const scripts: Array<{ script: string; language: string | null; environment_name: string | null }> = []
  const gateway = new ToolGateway({ timeoutMs: 1_000 })
  gateway.register({
    name: 'execute_code',
    description: 'fake',
    parameters: z.object({
      script: z.string(),
      language: z.enum(['python', 'sh']).nullable(),
      environment_name: z.string().nullable()
    }),
    handler: (args) => {
      scripts.push(args)
      if (fail) throw new ToolFailure('EXECUTOR_UNAVAILABLE', 'Could not start docker')
      return `exitcode: 0 (execution succeeded)\nCode output: ran ${args.language}`
    }
  })
  return { gateway, scripts }
}

describe('extractCodeBlocks', () => {
  it('finds python and shell fences and defaults untagged fences to python', () => {
    const content = [
      'THOUGHT: load data',
      '```python\nimport pandas as pd\n```',
      '```bash\nls data\n```',
      '```\nprint(2)\n```',
      '```python\n\n```'
    ].join('\n')
    expect(extractCodeBlocks(content)).toEqual([
      { language: 'python', code: 'import pandas as pd' },
      { language: 'sh', code: 'ls data' },
      { language: 'python', code: 'print(2)' }
    ])
  })
})

describe('code executor participant', () => {
  it('runs every block of the previous turn and reports each result', async () => {
    const { gateway, scripts } = fakeExecuteCode()
    const executor = createCodeExecutor(gateway)
    const transcript = Transcript.empty().append(turn('engineer', '```python\nprint(1)\n```\n```sh\necho hi\n```'))

    const reply = await executor.takeTurn(transcript, context)

    expect(reply.author).toBe('code_executor')
    expect(scripts).toEqual([
      { script: 'print(1)', language: 'python', environment_name: null },
      { script: 'echo hi', language: 'sh', environment_name: null }
    ])
    expect(reply.content).toBe(
      'exitcode: 0 (execution succeeded)\nCode output: ran python\n\nexitcode: 0 (execution succeeded)\nCode output: ran sh'
    )
    expect(reply.toolCalls.map((c) => c.status)).toEqual(['ok', 'ok'])
  })

  it('asks for code when the previous turn has none', async () => {
    const { gateway, scripts } = fakeExecuteCode()
    const reply = await createCodeExecutor(gateway, { name: 'runner' }).takeTurn(
      Transcript.empty().append(turn('engineer', 'Thinking about it')),
      context
    )
    expect(reply.author).toBe('runner')
    expect(reply.content).toBe(NO_CODE_REPLY)
    expect(reply.toolCalls).toEqual([])
    expect(scripts).toHaveLength(0)
  })

  it('puts executor failures in the content', async () => {
    const { gateway } = fakeExecuteCode(true)
    const reply = await createCodeExecutor(gateway, { environment: 'agenv:test' }).takeTurn(
      Transcript.empty().append(turn('engineer', '```python\nprint(1)\n```')),
      context
    )
    expect(reply.content).toBe('[tool error] execute_code failed with EXECUTOR_UNAVAILABLE: Could not start docker')
    expect(reply.toolCalls[0]).toMatchObject({ status: 'error', args: { environment_name: 'agenv:test' } })
  })
})
