import { z } from 'zod'
import { NotebookEntryTypeEnum, NotebookTeamEnum } from '@research-lab/shared'
import type { ToolGateway } from '../services/tool-gateway'
import { condenseNotebook, type NotebookStore } from '../services/notebook-store'

// Store failures thrown here pass through the gateway and end the run
export function registerNotebookTools(gateway: ToolGateway, opts: { store: NotebookStore; charLimit: number }) {
  gateway.register({
    name: 'read_notebook',
    description: 'Read the lab notebook, newest entries last. Pass `since` to read only entries after that sequence number.',
    parameters: z.object({ since: z.number().int().nonnegative().nullable() }),
    handler: async ({ since }) => {
      const entries = await opts.store.read(since === null ? {} : { since })
      if (entries.length === 0) return 'The notebook has no entries yet.'
      return condenseNotebook(entries, opts.charLimit)
    }
  })

  gateway.register({
    name: 'write_notebook',
    description: 'Append an entry to the lab notebook. Entries are permanent; correct mistakes by writing a new entry.',
    parameters: z.object({
      author: z.string().min(1),
      team: NotebookTeamEnum,
      entry_type: NotebookEntryTypeEnum,
      body: z.string().min(1)
    }),
    handler: async ({ author, team, entry_type, body }) => {
      const stored = await opts.store.append({ team, source: author, entryType: entry_type, body })
      return `Notebook entry #${stored.seq} recorded.`
    }
  })
}
