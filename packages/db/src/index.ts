export { eq, and, gt, asc } from 'drizzle-orm'
export { getDb, getPool, closeDb, type Database } from './client'
export * from './schema'
