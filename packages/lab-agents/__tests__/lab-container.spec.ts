// @vitest-environment node
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { promises as fs } from 'node:fs'
import { tmpdir } from 'node:os'
import { join, resolve } from 'node:path'
import { RunConfigSchema, type RunConfig } from '@research-lab/shared'
import { createLab, createNotebookStore, resolveNotebookPath } from '../src/services/lab-container'
import { LabOrchestrator } from '../src/services/lab-orchestrator'
import { createInMemoryNotebookStore } from '../src/services/notebook-store'

describe('lab container', () => {
  let outputDir: string
  let config: RunConfig

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(join(tmpdir(), 'lab-container-'))
    config = RunConfigSchema.parse({ outputDir, runId: 'run_fixed', executor: { kind: 'local' } })
  })

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true })
  })

  it('resolves relative notebook paths against the output directory', () => {
    expect(resolveNotebookPath({ outputDir: 'out', notebookPath: 'nb.jsonl' })).toBe(resolve('out', 'nb.jsonl'))
    expect(resolveNotebookPath({ outputDir: 'out', notebookPath: '/var/lab/nb.jsonl' })).toBe('/var/lab/nb.jsonl')
  })

  it('creates a file-backed notebook inside the output directory by default', async () => {
    const store = createNotebookStore(config, 'run_fixed')
    expect(await store.read()).toEqual([])

    await store.append({ team: 'SYSTEM', source: 'orchestrator', entryType: 'NOTE', body: 'hello' })
    const raw = await fs.readFile(join(outputDir, 'lab_notebook.jsonl'), 'utf8')
    expect(raw.trim().split('\n')).toHaveLength(1)
  })

  it('wires every tool, the bundled roles and the default task', () => {
    const lab = createLab(config, { store: createInMemoryNotebookStore() })

    expect(lab.runId).toBe('run_fixed')
    expect(lab.orchestrator).toBeInstanceOf(LabOrchestrator)
    expect(lab.task.name).toBe('methylation_age_model')
    expect(lab.registry.teams.planning.lead).toBe('principal_scientist')
    expect(lab.gateway.list().map((t) => t.name).sort()).toEqual([
      'analyze_plot',
      'execute_code',
      'fetch_page',
      'read_notebook',
      'read_text_file',
      'search',
      'search_directory',
      'write_notebook',
      'write_text_file'
    ])
  })

  it('generates a run id when none is configured', () => {
    const lab = createLab({ ...config, runId: undefined }, { store: createInMemoryNotebookStore() })
    expect(lab.runId).toMatch(/^run_[0-9a-f-]{36}$/)
  })
})
