import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { parse, stringify } from 'yaml'
import { z } from 'zod'

export const DEFAULT_TASKS_PATH = fileURLToPath(new URL('../../config/tasks.yaml', import.meta.url))

const TaskEntrySchema = z
  .object({
    title: z.string().min(1),
    description: z.string().min(1)
  })
  .passthrough()

const TasksFileSchema = z.object({
  tasks: z.record(TaskEntrySchema).refine((tasks) => Object.keys(tasks).length > 0, 'at least one task is required')
})

export type ResearchTask = {
  name: string
  title: string
  // Full task entry rendered as YAML for the planning brief
  text: string
}

export function loadTask(name?: string, path: string = DEFAULT_TASKS_PATH): ResearchTask {
  const parsed = TasksFileSchema.safeParse(parse(readFileSync(path, 'utf8')))
  if (!parsed.success) {
    throw new Error(`Invalid task configuration in ${path}: ${parsed.error.message}`)
  }
  const entries = Object.entries(parsed.data.tasks)
  const found = name ? entries.find(([key]) => key === name) : entries[0]
  if (!found) {
    throw new Error(`Unknown task "${name}". Known tasks: ${entries.map(([key]) => key).join(', ')}`)
  }
  const [key, entry] = found
  return { name: key, title: entry.title, text: stringify({ [key]: entry }).trim() }
}
