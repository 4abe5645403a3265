import { pgTable, serial, text, integer, timestamp, index } from 'drizzle-orm/pg-core'

export const labNotebookEntries = pgTable(
  'lab_notebook_entries',
  {
    seq: serial('seq').primaryKey(),
    runId: text('run_id').notNull(),
    team: text('team').$type<'PLANNING' | 'IMPLEMENTATION' | 'SYSTEM'>().notNull(),
    source: text('source').notNull(),
    entryType: text('entry_type').$type<'PLAN' | 'NOTE' | 'OUTPUT' | 'REVIEW' | 'COMPLETION'>().notNull(),
    iteration: integer('iteration'),
    body: text('body').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull()
  },
  (table) => ({
    runSeqIdx: index('lab_notebook_entries_run_seq_idx').on(table.runId, table.seq)
  })
)

export type LabNotebookEntryRow = typeof labNotebookEntries.$inferSelect
export type NewLabNotebookEntryRow = typeof labNotebookEntries.$inferInsert
