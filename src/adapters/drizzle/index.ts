export { DrizzleSink } from './drizzle-sink'
export type { DrizzleDatabase, DrizzleSinkTables } from './drizzle-sink'
