import { presentFields } from '../types/record'
import type { ResolutionResult } from '../types/resolution'
import { GraphDedupeError, PersistenceError } from '../utils/errors'
import type { ResolutionSink } from './types'

/**
 * Writes a result through a sink: normalized values (when supported), edges,
 * cluster assignments, master entities, master assignments and, in link
 * mode, same-as links. Runs inside `sink.transaction` when the sink has one.
 *
 * @throws {PersistenceError} If any write fails
 */
export async function persistResult(result: ResolutionResult, sink: ResolutionSink): Promise<void> {
  if (sink.transaction) {
    await sink.transaction(async (tx) => writeAll(result, tx))
    return
  }
  await writeAll(result, sink)
}

async function writeAll(result: ResolutionResult, sink: ResolutionSink): Promise<void> {
  if (sink.writeNormalized) {
    for (const record of result.records) {
      for (const field of presentFields(record.raw)) {
        const value = record.fields[field]
        if (value === undefined) continue
        await step('writeNormalized', () => sink.writeNormalized?.(record.id, field, value))
      }
    }
  }

  await step('writeEdges', () => sink.writeEdges(result.edges))
  await step('writeClusters', () => sink.writeClusters(result.clusterAssignments))
  await step('writeMasterEntities', () => sink.writeMasterEntities(result.masterEntities))
  await step('writeAssignments', () => sink.writeAssignments(result.assignments))

  if (result.mode === 'link' && sink.writeSameAsLinks) {
    await step('writeSameAsLinks', () => sink.writeSameAsLinks?.(result.sameAsLinks))
  }
}

async function step(operation: string, write: () => Promise<void> | void | undefined): Promise<void> {
  try {
    await write()
  } catch (error) {
    if (error instanceof GraphDedupeError) throw error
    throw new PersistenceError(operation, error instanceof Error ? error.message : String(error))
  }
}
