export type { RecordSource, ResolutionSink } from './types'
export { InMemorySource, InMemorySink } from './in-memory'
export type { NormalizedValueRow } from './in-memory'
export { DrizzleSink } from './drizzle'
export type { DrizzleDatabase, DrizzleSinkTables } from './drizzle'
export { persistResult } from './persist'
