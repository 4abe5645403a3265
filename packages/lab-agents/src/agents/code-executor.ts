import type { RoleConfig, ToolInvocation } from '@research-lab/shared'
import type { Participant } from '../services/participant'
import type { ToolGateway } from '../services/tool-gateway'
import { formatToolFailure } from '../services/transcript'
import type { CodeLanguage } from '../tools/code'

export const NO_CODE_REPLY =
  'No code blocks found in the previous message. Send the code to run in a fenced ```python or ```sh block, or finish with your completion token if the work is done.'

const FENCE = /```(python|py|sh|bash)?[ \t]*\r?\n([\s\S]*?)```/g

export type CodeBlock = { language: CodeLanguage; code: string }

export function extractCodeBlocks(content: string): CodeBlock[] {
  const blocks: CodeBlock[] = []
  for (const match of content.matchAll(FENCE)) {
    const tag = match[1] ?? 'python'
    const code = (match[2] ?? '').trim()
    if (!code) continue
    blocks.push({ language: tag === 'sh' || tag === 'bash' ? 'sh' : 'python', code })
  }
  return blocks
}

/**
 * Non-LLM participant that runs the code blocks of the previous turn through
 * `execute_code` and replies with their output.
 */
export function createCodeExecutor(gateway: ToolGateway, opts: { name?: string; environment?: string } = {}): Participant {
  const role: RoleConfig = {
    name: opts.name ?? 'code_executor',
    role: 'Code executor',
    prompt: '',
    capabilities: ['execute_code'],
    tokens: {}
  }

  return {
    role,
    async takeTurn(transcript) {
      const previous = transcript.last()
      const blocks = previous ? extractCodeBlocks(previous.content) : []
      const createdAt = () => new Date().toISOString()
      if (blocks.length === 0) {
        return { author: role.name, content: NO_CODE_REPLY, toolCalls: [], createdAt: createdAt() }
      }

      const toolCalls: ToolInvocation[] = []
      const sections: string[] = []
      for (const block of blocks) {
        const invocation = await gateway.invoke('execute_code', {
          script: block.code,
          language: block.language,
          environment_name: opts.environment ?? null
        })
        toolCalls.push(invocation)
        sections.push(invocation.status === 'ok' ? invocation.result : formatToolFailure(invocation) ?? '')
      }
      return { author: role.name, content: sections.join('\n\n'), toolCalls, createdAt: createdAt() }
    }
  }
}
