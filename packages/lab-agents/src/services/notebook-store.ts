import { promises as fs } from 'node:fs'
import { dirname } from 'node:path'
import {
  NotebookEntryInputSchema,
  NotebookEntrySchema,
  type NotebookEntry,
  type NotebookEntryInput
} from '@research-lab/shared'
import { getLogger } from './logger'

/** Raised when the notebook cannot be durably written or read back. Fatal for a run. */
export class NotebookStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'NotebookStoreError'
  }
}

export type NotebookReadOptions = {
  // Sequence number; only entries with a greater seq are returned
  since?: number
}

export type NotebookStore = {
  append(entry: NotebookEntryInput): Promise<NotebookEntry>
  read(opts?: NotebookReadOptions): Promise<NotebookEntry[]>
}

type StoreOptions = {
  now?: () => Date
}

function parseInput(entry: NotebookEntryInput) {
  const parsed = NotebookEntryInputSchema.safeParse(entry)
  if (!parsed.success) {
    throw new NotebookStoreError(`Invalid notebook entry: ${parsed.error.message}`)
  }
  return parsed.data
}

function errorMessage(err: unknown) {
  return err instanceof Error ? err.message : String(err)
}

export function createInMemoryNotebookStore(opts: StoreOptions = {}): NotebookStore {
  const now = opts.now ?? (() => new Date())
  const entries: NotebookEntry[] = []

  return {
    async append(entry) {
      const input = parseInput(entry)
      const last = entries[entries.length - 1]
      const stored: NotebookEntry = Object.freeze({
        ...input,
        seq: last ? last.seq + 1 : 1,
        timestamp: now().toISOString()
      })
      entries.push(stored)
      return stored
    },
    async read(readOpts = {}) {
      const since = readOpts.since ?? 0
      return entries.filter((entry) => entry.seq > since)
    }
  }
}

/**
 * JSON-lines notebook. Each append is written and fsynced before it resolves,
 * so a restarted process reads back every acknowledged entry.
 */
export function createFileNotebookStore(path: string, opts: StoreOptions = {}): NotebookStore {
  const now = opts.now ?? (() => new Date())
  let lastSeq: number | null = null
  // Appends are chained so seq assignment and writes keep call order
  let queue: Promise<unknown> = Promise.resolve()

  async function loadAll(): Promise<NotebookEntry[]> {
    let raw: string
    try {
      raw = await fs.readFile(path, 'utf8')
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return []
      throw new NotebookStoreError(`Failed to read notebook at ${path}: ${errorMessage(err)}`, { cause: err })
    }

    const entries: NotebookEntry[] = []
    const lines = raw.split('\n')
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i]?.trim()
      if (!line) continue
      let json: unknown
      try {
        json = JSON.parse(line)
      } catch (err) {
        throw new NotebookStoreError(`Corrupt notebook line ${i + 1} in ${path}`, { cause: err })
      }
      const parsed = NotebookEntrySchema.safeParse(json)
      if (!parsed.success) {
        throw new NotebookStoreError(`Invalid notebook line ${i + 1} in ${path}: ${parsed.error.message}`)
      }
      entries.push(parsed.data)
    }
    return entries
  }

  async function writeEntry(entry: NotebookEntryInput): Promise<NotebookEntry> {
    const input = parseInput(entry)
    if (lastSeq === null) {
      const existing = await loadAll()
      lastSeq = existing.reduce((max, e) => Math.max(max, e.seq), 0)
    }
    const stored: NotebookEntry = { ...input, seq: lastSeq + 1, timestamp: now().toISOString() }

    try {
      await fs.mkdir(dirname(path), { recursive: true })
      const handle = await fs.open(path, 'a')
      try {
        await handle.appendFile(`${JSON.stringify(stored)}\n`, 'utf8')
        await handle.sync()
      } finally {
        await handle.close()
      }
    } catch (err) {
      getLogger().error('notebook_append_failed', { path, error: errorMessage(err) })
      throw new NotebookStoreError(`Failed to append to notebook at ${path}: ${errorMessage(err)}`, { cause: err })
    }

    lastSeq = stored.seq
    return Object.freeze(stored)
  }

  return {
    append(entry) {
      const next = queue.then(() => writeEntry(entry))
      queue = next.catch(() => undefined)
      return next
    },
    async read(readOpts = {}) {
      await queue
      const since = readOpts.since ?? 0
      const all = await loadAll()
      return all.filter((entry) => entry.seq > since)
    }
  }
}

export function createPostgresNotebookStore(runId: string): NotebookStore {
  // Loaded lazily so file and memory backends never open a pool
  let dbPromise: ReturnType<typeof connect> | null = null

  async function connect() {
    const dbModule = await import('@research-lab/db')
    return { dbModule, db: dbModule.getDb() }
  }

  function getConnection() {
    if (!dbPromise) dbPromise = connect()
    return dbPromise
  }

  function toEntry(row: {
    seq: number
    team: NotebookEntry['team']
    source: string
    entryType: NotebookEntry['entryType']
    iteration: number | null
    body: string
    createdAt: Date
  }): NotebookEntry {
    return {
      seq: row.seq,
      timestamp: row.createdAt.toISOString(),
      team: row.team,
      source: row.source,
      entryType: row.entryType,
      iteration: row.iteration,
      body: row.body
    }
  }

  return {
    async append(entry) {
      const input = parseInput(entry)
      try {
        const { dbModule, db } = await getConnection()
        const [row] = await db
          .insert(dbModule.labNotebookEntries)
          .values({ runId, ...input })
          .returning()
        if (!row) throw new Error('insert returned no row')
        return toEntry(row)
      } catch (err) {
        getLogger().error('notebook_append_failed', { runId, backend: 'postgres', error: errorMessage(err) })
        throw new NotebookStoreError(`Failed to append notebook entry for run ${runId}: ${errorMessage(err)}`, { cause: err })
      }
    },
    async read(readOpts = {}) {
      try {
        const { dbModule, db } = await getConnection()
        const { labNotebookEntries: table, and, eq, gt, asc } = dbModule
        const condition =
          readOpts.since === undefined
            ? eq(table.runId, runId)
            : and(eq(table.runId, runId), gt(table.seq, readOpts.since))
        const rows = await db.select().from(table).where(condition).orderBy(asc(table.seq))
        return rows.map(toEntry)
      } catch (err) {
        throw new NotebookStoreError(`Failed to read notebook for run ${runId}: ${errorMessage(err)}`, { cause: err })
      }
    }
  }
}

function renderEntry(entry: NotebookEntry): string {
  const iteration = entry.iteration === null ? '' : ` (iteration ${entry.iteration})`
  return `### [${entry.timestamp}] ${entry.source} (${entry.team}) - ${entry.entryType}${iteration}\n\n${entry.body.trim()}`
}

export function renderNotebook(entries: readonly NotebookEntry[]): string {
  return entries.map(renderEntry).join('\n\n')
}

/**
 * Renders the most recent entries that fit within `charLimit`, cutting only
 * on entry boundaries. When even the newest entry is too long, its tail is kept.
 */
export function condenseNotebook(entries: readonly NotebookEntry[], charLimit: number): string {
  const kept: string[] = []
  let size = 0
  for (let i = entries.length - 1; i >= 0; i--) {
    const entry = entries[i]
    if (!entry) continue
    const block = renderEntry(entry)
    const added = block.length + (kept.length ? 2 : 0)
    if (size + added > charLimit) {
      if (kept.length === 0) return block.slice(-charLimit)
      break
    }
    kept.unshift(block)
    size += added
  }
  return kept.join('\n\n')
}
