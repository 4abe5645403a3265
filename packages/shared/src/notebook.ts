import { z } from 'zod'

export const NotebookTeamEnum = z.enum(['PLANNING', 'IMPLEMENTATION', 'SYSTEM'])
export type NotebookTeam = z.infer<typeof NotebookTeamEnum>

export const NotebookEntryTypeEnum = z.enum(['PLAN', 'NOTE', 'OUTPUT', 'REVIEW', 'COMPLETION'])
export type NotebookEntryType = z.infer<typeof NotebookEntryTypeEnum>

export const NotebookEntryInputSchema = z.object({
  team: NotebookTeamEnum,
  source: z.string().min(1),
  entryType: NotebookEntryTypeEnum,
  iteration: z.number().int().positive().nullable().default(null),
  body: z.string()
})
export type NotebookEntryInput = z.input<typeof NotebookEntryInputSchema>

// Persisted shape; seq is assigned by the store and strictly increasing
export const NotebookEntrySchema = NotebookEntryInputSchema.extend({
  seq: z.number().int().positive(),
  timestamp: z.string()
})
export type NotebookEntry = z.infer<typeof NotebookEntrySchema>
