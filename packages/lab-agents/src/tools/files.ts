import { promises as fs } from 'node:fs'
import { dirname, resolve } from 'node:path'
import { glob } from 'glob'
import { z } from 'zod'
import { ToolFailure, type ToolGateway } from '../services/tool-gateway'

export const READ_TEXT_LIMIT = 10_000
export const DIRECTORY_LISTING_LIMIT = 500

function fsFailure(err: unknown, path: string): ToolFailure {
  if (err instanceof Error && 'code' in err) {
    if (err.code === 'ENOENT') return new ToolFailure('NOT_FOUND', `No such file or directory: ${path}`)
    if (err.code === 'EISDIR') return new ToolFailure('IS_DIRECTORY', `${path} is a directory`)
    if (err.code === 'EACCES') return new ToolFailure('PERMISSION_DENIED', `Permission denied: ${path}`)
  }
  return new ToolFailure('IO_ERROR', err instanceof Error ? err.message : String(err))
}

// Relative paths resolve against the run's working directory
export function registerFileTools(gateway: ToolGateway, opts: { workdir: string }) {
  gateway.register({
    name: 'read_text_file',
    description: `Read a UTF-8 text file. Output is truncated after ${READ_TEXT_LIMIT} characters.`,
    parameters: z.object({ path: z.string().min(1) }),
    handler: async ({ path }) => {
      const full = resolve(opts.workdir, path)
      let text: string
      try {
        text = await fs.readFile(full, 'utf8')
      } catch (err) {
        throw fsFailure(err, path)
      }
      if (text.length <= READ_TEXT_LIMIT) return text
      return `${text.slice(0, READ_TEXT_LIMIT)}\n\n[truncated: showing ${READ_TEXT_LIMIT} of ${text.length} characters]`
    }
  })

  gateway.register({
    name: 'write_text_file',
    description: 'Write text to a file, creating parent directories and replacing any existing content.',
    parameters: z.object({ path: z.string().min(1), content: z.string() }),
    handler: async ({ path, content }) => {
      const full = resolve(opts.workdir, path)
      try {
        await fs.mkdir(dirname(full), { recursive: true })
        await fs.writeFile(full, content, 'utf8')
      } catch (err) {
        throw fsFailure(err, path)
      }
      return `Wrote ${content.length} characters to ${path}`
    }
  })

  gateway.register({
    name: 'search_directory',
    description: 'List files under a directory matching a glob pattern (default: every file, recursively).',
    parameters: z.object({ path: z.string().min(1), pattern: z.string().min(1).nullable() }),
    handler: async ({ path, pattern }, ctx) => {
      const cwd = resolve(opts.workdir, path)
      try {
        const stat = await fs.stat(cwd)
        if (!stat.isDirectory()) throw new ToolFailure('NOT_A_DIRECTORY', `${path} is not a directory`)
      } catch (err) {
        if (err instanceof ToolFailure) throw err
        throw fsFailure(err, path)
      }
      const matches = (await glob(pattern ?? '**/*', { cwd, nodir: true, signal: ctx.signal })).sort()
      if (matches.length === 0) return `No files matching ${pattern ?? '**/*'} in ${path}`
      const shown = matches.slice(0, DIRECTORY_LISTING_LIMIT)
      const more = matches.length - shown.length
      return more > 0 ? `${shown.join('\n')}\n[${more} more not shown]` : shown.join('\n')
    }
  })
}
