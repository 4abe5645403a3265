import { spawn } from 'node:child_process'
import { createHash } from 'node:crypto'
import { promises as fs } from 'node:fs'
import { join, resolve } from 'node:path'
import { glob } from 'glob'
import { z } from 'zod'
import type { CodeExecutorKind } from '@research-lab/shared'
import { ToolFailure, type ToolGateway } from '../services/tool-gateway'
import { getLogger } from '../services/logger'

export const TEMP_CODE_PREFIX = 'tmp_code_'
export const CODE_OUTPUT_LIMIT = 100_000

export type CodeLanguage = 'python' | 'sh'

export type ExecutorSettings = {
  kind: CodeExecutorKind
  // Docker image or conda environment name
  environment: string
  workdir: string
  timeoutMs: number
}

type Command = { command: string; args: string[] }

export function buildExecutorCommand(
  settings: Pick<ExecutorSettings, 'kind' | 'environment' | 'workdir'>,
  language: CodeLanguage,
  file: string
): Command {
  switch (settings.kind) {
    case 'docker':
      return {
        command: 'docker',
        args: ['run', '--rm', '-v', `${resolve(settings.workdir)}:/workspace`, '-w', '/workspace', settings.environment, language === 'python' ? 'python' : 'sh', file]
      }
    case 'conda':
      return {
        command: 'conda',
        args: ['run', '--no-capture-output', '-n', settings.environment, language === 'python' ? 'python' : 'sh', file]
      }
    case 'local':
      return { command: language === 'python' ? 'python3' : 'sh', args: [file] }
  }
}

export function formatExecution(exitCode: number, output: string): string {
  const status = exitCode === 0 ? 'execution succeeded' : 'execution failed'
  return `exitcode: ${exitCode} (${status})\nCode output: ${output}`
}

function runProcess(cmd: Command, cwd: string, signal: AbortSignal): Promise<{ exitCode: number; output: string }> {
  return new Promise((resolveRun, reject) => {
    let output = ''
    const child = spawn(cmd.command, cmd.args, { cwd, signal, stdio: ['ignore', 'pipe', 'pipe'] })
    const collect = (chunk: Buffer) => {
      output += chunk.toString('utf8')
      // Keep the tail; errors tend to be printed last
      if (output.length > CODE_OUTPUT_LIMIT * 2) output = output.slice(-CODE_OUTPUT_LIMIT)
    }
    child.stdout.on('data', collect)
    child.stderr.on('data', collect)
    child.on('error', (err) => {
      if (err.name === 'AbortError') {
        reject(new ToolFailure('TOOL_TIMEOUT', `${cmd.command} was stopped after the timeout`))
        return
      }
      reject(new ToolFailure('EXECUTOR_UNAVAILABLE', `Could not start ${cmd.command}: ${err.message}`))
    })
    child.on('close', (code) => {
      resolveRun({ exitCode: code ?? 1, output: output.slice(-CODE_OUTPUT_LIMIT) })
    })
  })
}

export function registerCodeTools(gateway: ToolGateway, settings: ExecutorSettings) {
  gateway.register({
    name: 'execute_code',
    description:
      'Run a python or sh script in the lab execution environment and return its exit code and combined output.',
    parameters: z.object({
      script: z.string().min(1),
      language: z.enum(['python', 'sh']).nullable(),
      environment_name: z.string().min(1).nullable()
    }),
    timeoutMs: settings.timeoutMs,
    handler: async ({ script, language, environment_name }, ctx) => {
      const lang: CodeLanguage = language ?? 'python'
      const digest = createHash('sha1').update(script).digest('hex').slice(0, 16)
      const file = `${TEMP_CODE_PREFIX}${digest}.${lang === 'python' ? 'py' : 'sh'}`
      await fs.mkdir(settings.workdir, { recursive: true })
      await fs.writeFile(join(settings.workdir, file), script, 'utf8')

      const cmd = buildExecutorCommand(
        { ...settings, environment: environment_name ?? settings.environment },
        lang,
        file
      )
      getLogger().debug('execute_code', { command: cmd.command, file, kind: settings.kind })
      const { exitCode, output } = await runProcess(cmd, settings.workdir, ctx.signal)
      return formatExecution(exitCode, output)
    }
  })
}

/** Removes scripts written by `execute_code`; returns how many were deleted. */
export async function removeTempCodeFiles(workdir: string): Promise<number> {
  const files = await glob(`${TEMP_CODE_PREFIX}*`, { cwd: workdir, nodir: true })
  await Promise.all(files.map((file) => fs.rm(join(workdir, file), { force: true })))
  return files.length
}
