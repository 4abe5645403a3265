#!/usr/bin/env tsx
import { existsSync } from 'node:fs'
import { config as loadEnv } from 'dotenv'
import { Command } from 'commander'
import chalk from 'chalk'
import { z } from 'zod'
import type { LabEvent, RunConfigInput, RunStatus } from '@research-lab/shared'
import { loadRunConfig } from './services/run-config'
import { createLab, createNotebookStore, resolveNotebookPath } from './services/lab-container'
import { createFileNotebookStore, renderNotebook } from './services/notebook-store'
import { loadTask } from './agents/task-registry'
import { loadRoleRegistry } from './agents/role-registry'
import { getLogger } from './services/logger'

loadEnv({ path: '.env' })
loadEnv({ path: '.env.local', override: true })

const EXIT_CODES: Record<RunStatus, number> = { completed: 0, failed: 1, incomplete: 2, aborted: 3 }

const RunOptionsSchema = z.object({
  task: z.string().optional(),
  agents: z.string().optional(),
  tasks: z.string().optional(),
  resume: z.string().optional(),
  runId: z.string().optional(),
  maxIterations: z.coerce.number().optional(),
  maxRevisions: z.coerce.number().optional(),
  planningMaxTurns: z.coerce.number().optional(),
  engineerMaxTurns: z.coerce.number().optional(),
  criticMaxTurns: z.coerce.number().optional(),
  agentMaxSteps: z.coerce.number().optional(),
  agentTimeoutMs: z.coerce.number().optional(),
  outputDir: z.string().optional(),
  notebook: z.string().optional(),
  backend: z.enum(['file', 'postgres']).optional(),
  executor: z.enum(['docker', 'conda', 'local']).optional(),
  executorEnv: z.string().optional(),
  model: z.string().optional(),
  persistReviews: z.boolean().optional(),
  quiet: z.boolean().optional()
})

const NotebookOptionsSchema = z.object({
  since: z.coerce.number().int().nonnegative().optional(),
  runId: z.string().optional(),
  backend: z.enum(['file', 'postgres']).optional()
})

function echo(event: LabEvent) {
  switch (event.type) {
    case 'iteration_start':
      console.log(chalk.bold(`\n=== Iteration ${event.iteration} ===`))
      break
    case 'phase':
      console.log(chalk.blue(`--- ${event.phase} ---`))
      break
    case 'turn':
      console.log(`${chalk.cyan.bold(`[${event.author}]`)}\n${event.message ?? ''}\n`)
      break
    case 'tool_call':
      console.log(chalk.gray(`  -> ${event.author} called ${event.message}`))
      break
    case 'stop_token_ignored':
      console.log(chalk.gray(`  (${event.author} emitted ${event.message}; only the closer can stop this chat)`))
      break
    case 'transition':
      console.log(chalk.yellow(`  revision: ${event.message}`))
      break
    case 'verdict':
      console.log(event.message === 'APPROVED' ? chalk.green('  verdict: APPROVED') : chalk.red('  verdict: REVISE'))
      break
    case 'notebook_append':
      console.log(chalk.magenta(`  notebook += ${event.message} (${event.author})`))
      break
    case 'budget_exhausted':
      console.log(chalk.red(`  budget exhausted: ${event.message}`))
      break
    default:
      break
  }
}

const program = new Command()
program.name('research-lab').description('Two-team research lab: planning and implementation agents sharing a notebook')

program
  .command('run')
  .description('Run the planning / implementation loop on a research task')
  .option('--task <name>', 'task key in tasks.yaml (default: first task)')
  .option('--agents <path>', 'path to agents.yaml')
  .option('--tasks <path>', 'path to tasks.yaml')
  .option('--resume <dir>', 'continue the run whose notebook lives in this output directory')
  .option('--run-id <id>', 'run identifier (scopes the postgres notebook)')
  .option('--max-iterations <n>', 'outer planning / implementation iterations')
  .option('--max-revisions <n>', 'critic revisions before a cycle aborts')
  .option('--planning-max-turns <n>', 'turn cap for the planning chat')
  .option('--engineer-max-turns <n>', 'turn cap for the engineer / executor chat')
  .option('--critic-max-turns <n>', 'turn cap for the critic')
  .option('--agent-max-steps <n>', 'model round-trips allowed within one agent turn')
  .option('--agent-timeout-ms <ms>', 'wall-clock limit for one agent turn')
  .option('--output-dir <dir>', 'working directory for code, data and the notebook')
  .option('--notebook <path>', 'notebook file, relative to the output directory')
  .option('--backend <kind>', 'notebook backend: file or postgres')
  .option('--executor <kind>', 'code executor: docker, conda or local')
  .option('--executor-env <name>', 'docker image or conda environment')
  .option('--model <name>', 'chat model for every agent')
  .option('--persist-reviews', 'record every revision transition in the notebook')
  .option('--quiet', 'do not echo the conversation')
  .action(async (_opts: unknown, command: Command) => {
    const opts = RunOptionsSchema.parse(command.opts())
    const overrides: RunConfigInput = {
      runId: opts.runId,
      maxIterations: opts.maxIterations,
      maxRevisions: opts.maxRevisions,
      planningMaxTurns: opts.planningMaxTurns,
      engineerMaxTurns: opts.engineerMaxTurns,
      criticMaxTurns: opts.criticMaxTurns,
      agentMaxSteps: opts.agentMaxSteps,
      agentTimeoutMs: opts.agentTimeoutMs,
      outputDir: opts.resume ?? opts.outputDir,
      notebookPath: opts.notebook,
      notebookBackend: opts.backend,
      persistReviewHistory: opts.persistReviews,
      model: opts.model,
      executor: { kind: opts.executor, environment: opts.executorEnv }
    }
    const config = loadRunConfig(overrides)
    if (opts.resume && config.notebookBackend === 'file' && !existsSync(resolveNotebookPath(config))) {
      throw new Error(`Nothing to resume: no notebook at ${resolveNotebookPath(config)}`)
    }

    const lab = createLab(config, {
      registry: loadRoleRegistry(opts.agents),
      task: loadTask(opts.task, opts.tasks),
      onEvent: opts.quiet ? undefined : echo
    })
    console.log(chalk.bold(`Run ${lab.runId}: ${lab.task.title}`))

    try {
      const result = await lab.orchestrator.run()
      const colour = result.status === 'completed' ? chalk.green : chalk.red
      console.log(colour.bold(`\nRun ${result.status} after ${result.iterations} iteration(s)${result.reason ? ` (${result.reason})` : ''}`))
      if (result.error) console.log(chalk.red(result.error))
      process.exitCode = EXIT_CODES[result.status]
    } finally {
      if (config.notebookBackend === 'postgres') {
        const { closeDb } = await import('@research-lab/db')
        await closeDb()
      }
    }
  })

program
  .command('notebook')
  .description('Print a lab notebook as markdown')
  .argument('[path]', 'notebook file (file backend)')
  .option('--since <seq>', 'only entries after this sequence number')
  .option('--run-id <id>', 'run identifier (postgres backend)')
  .option('--backend <kind>', 'notebook backend: file or postgres')
  .action(async (path: string | undefined, _opts: unknown, command: Command) => {
    const opts = NotebookOptionsSchema.parse(command.opts())
    const store = (() => {
      if (opts.backend === 'postgres') {
        if (!opts.runId) throw new Error('--run-id is required with the postgres backend')
        return createNotebookStore(loadRunConfig({ notebookBackend: 'postgres' }), opts.runId)
      }
      if (!path) throw new Error('A notebook path is required with the file backend')
      return createFileNotebookStore(path)
    })()
    try {
      const entries = await store.read({ since: opts.since })
      console.log(entries.length ? renderNotebook(entries) : chalk.gray('(empty notebook)'))
    } finally {
      if (opts.backend === 'postgres') {
        const { closeDb } = await import('@research-lab/db')
        await closeDb()
      }
    }
  })

program.parseAsync(process.argv).catch((err: unknown) => {
  getLogger().error('cli_failed', { error: err instanceof Error ? err.message : String(err) })
  process.exitCode = 1
})
