import { describe, it, expect } from 'vitest'
import { Resolver } from '../../src/core/resolver'
import {
  allScenarioRecords,
  createFixtureConfig,
  scenarioARecords,
  scenarioBRecords,
  scenarioCRecords,
} from '../fixtures/records'

function memberLists(clusters: { members: string[] }[]): string[][] {
  return clusters.map((cluster) => cluster.members)
}

describe('Resolution scenarios', () => {
  describe('one person entered five ways', () => {
    const resolver = new Resolver(createFixtureConfig({ low: 0.5, cluster: 0.7 }))
    const result = resolver.run(scenarioARecords)

    it('normalizes every phone format to the same number', () => {
      expect(new Set(result.records.map((record) => record.fields.phone))).toEqual(
        new Set(['2025550143'])
      )
    })

    it('connects every pair with an edge found in both blocks', () => {
      expect(result.edges).toHaveLength(10)
      for (const edge of result.edges) {
        expect(edge.blockKeys).toEqual(['phone=2025550143', 'postal=20500'])
        expect(edge.score).toBeGreaterThanOrEqual(0.96)
      }
      expect(result.edges.find((edge) => edge.source === 'a2' && edge.target === 'a4')?.score).toBeCloseTo(
        0.961905,
        5
      )
      expect(result.edges.find((edge) => edge.source === 'a1' && edge.target === 'a3')?.score).toBe(1)
    })

    it('forms a single cluster with one master entity', () => {
      expect(memberLists(result.clusters)).toEqual([['a1', 'a2', 'a3', 'a4', 'a5']])
      expect(result.singletons).toEqual([])
      expect(result.masterEntities).toEqual([
        {
          id: 'master-597e8dbec73f689b',
          clusterId: 'cluster-1',
          attributes: { name: 'jonathan smith', phone: '2025550143', postalCode: '20500' },
          memberIds: ['a1', 'a2', 'a3', 'a4', 'a5'],
        },
      ])
    })

    it('replaces the five records with one merged record', () => {
      expect(result.resolvedRecords).toEqual([
        {
          id: 'master-597e8dbec73f689b',
          kind: 'merged',
          fields: { name: 'jonathan smith', phone: '2025550143', postalCode: '20500' },
          sourceRecordIds: ['a1', 'a2', 'a3', 'a4', 'a5'],
        },
      ])
    })

    it('reports run statistics', () => {
      expect(result.stats).toEqual({
        inputRecords: 5,
        acceptedRecords: 5,
        rejectedRecords: 0,
        blocking: {
          totalBlocks: 2,
          maxBlockSize: 5,
          catchAllRecords: 0,
          candidatePairs: 10,
          comparisonsWithoutBlocking: 10,
          reductionPercentage: 0,
        },
        comparisonsMade: 20,
        edges: 10,
        edgesAboveClusterThreshold: 10,
        clusters: 1,
        singletons: 0,
        masterEntities: 1,
        resolvedRecords: 1,
      })
    })
  })

  describe('two people sharing a name', () => {
    it('keeps them apart', () => {
      const result = new Resolver(createFixtureConfig({ low: 0.5, cluster: 0.7 })).run(
        scenarioBRecords
      )

      expect(result.edges).toEqual([])
      expect(result.clusters).toEqual([])
      expect(result.singletons).toEqual(['b1', 'b2'])
      expect(result.masterEntities).toEqual([])
      expect(result.resolvedRecords.map((record) => [record.id, record.kind])).toEqual([
        ['b1', 'original'],
        ['b2', 'original'],
      ])
    })

    it('gives each a master entity when singletons are promoted', () => {
      const result = new Resolver(
        createFixtureConfig({ low: 0.5, cluster: 0.7, promoteSingletons: true })
      ).run(scenarioBRecords)

      expect(result.masterEntities[0]).toEqual({
        id: 'master-7dc96f776c8423e5',
        clusterId: null,
        attributes: {
          name: 'maria garcia',
          email: 'maria.g@alpha.test',
          phone: '4155550111',
          postalCode: '10001',
        },
        memberIds: ['b1'],
      })
      expect(result.masterEntities).toHaveLength(2)
      expect(result.clusters).toEqual([])
    })
  })

  describe('a chain of shared identifiers', () => {
    it('scores each link of the chain without a direct edge between its ends', () => {
      const result = new Resolver(createFixtureConfig()).run(scenarioCRecords)

      expect(
        result.edges.map((edge) => [edge.source, edge.target, Number(edge.score.toFixed(6))])
      ).toEqual([
        ['f1', 'f2', 0.593333],
        ['f2', 'f3', 0.466382],
        ['f3', 'f4', 0.530256],
        ['f4', 'f5', 0.504],
      ])
      expect(result.edges.map((edge) => edge.blockKeys)).toEqual([
        ['phone=3125550101'],
        ['email=a.turner@post.test'],
        ['address=9 pine road'],
        ['phone=3125550177'],
      ])
    })

    it('leaves every record unclustered under a pairwise match threshold', () => {
      const result = new Resolver(createFixtureConfig({ cluster: 0.7 })).run(scenarioCRecords)

      expect(Math.max(...result.edges.map((edge) => edge.score))).toBeLessThan(0.7)
      expect(result.edges).toHaveLength(4)
      expect(result.clusters).toEqual([])
      expect(result.singletons).toEqual(['f1', 'f2', 'f3', 'f4', 'f5'])
    })

    it('is unified by Louvain when the chain stands alone', () => {
      const result = new Resolver(createFixtureConfig()).run(scenarioCRecords)

      expect(memberLists(result.clusters)).toEqual([['f1', 'f2', 'f3', 'f4', 'f5']])
      expect(result.masterEntities).toEqual([
        {
          id: 'master-a6e16490264939b9',
          clusterId: 'cluster-1',
          attributes: {
            name: 'alex turner',
            email: 'a.turner@post.test',
            phone: '3125550101',
            address: '9 pine road',
          },
          memberIds: ['f1', 'f2', 'f3', 'f4', 'f5'],
        },
      ])
    })

    it('is unified by connected components', () => {
      const result = new Resolver(createFixtureConfig({ algorithm: 'connected-components' })).run(
        scenarioCRecords
      )

      expect(memberLists(result.clusters)).toEqual([['f1', 'f2', 'f3', 'f4', 'f5']])
    })

    it('stays one cluster within a larger batch', () => {
      const result = new Resolver(createFixtureConfig()).run(allScenarioRecords)

      expect(memberLists(result.clusters)).toEqual([
        ['a1', 'a2', 'a3', 'a4', 'a5'],
        ['f1', 'f2', 'f3', 'f4', 'f5'],
      ])
      expect(result.singletons).toEqual(['b1', 'b2'])
      expect(result.masterEntities[1]).toEqual({
        id: 'master-a6e16490264939b9',
        clusterId: 'cluster-2',
        attributes: {
          name: 'alex turner',
          email: 'a.turner@post.test',
          phone: '3125550101',
          address: '9 pine road',
        },
        memberIds: ['f1', 'f2', 'f3', 'f4', 'f5'],
      })
    })
  })

  describe('merge and link modes over the same batch', () => {
    it('merge mode emits one record per cluster plus the unclustered records', () => {
      const result = new Resolver(createFixtureConfig({ mode: 'merge' })).run(allScenarioRecords)

      expect(result.resolvedRecords.map((record) => [record.id, record.kind])).toEqual([
        ['master-597e8dbec73f689b', 'merged'],
        ['b1', 'original'],
        ['b2', 'original'],
        ['master-a6e16490264939b9', 'merged'],
      ])
      expect(result.sameAsLinks).toEqual([])
    })

    it('link mode keeps every record and links every pair within a cluster', () => {
      const result = new Resolver(createFixtureConfig({ mode: 'link' })).run(allScenarioRecords)

      expect(result.resolvedRecords).toHaveLength(12)
      expect(result.resolvedRecords.every((record) => record.kind === 'original')).toBe(true)
      expect(result.sameAsLinks).toHaveLength(20)
      expect(result.sameAsLinks[0]).toEqual({ source: 'a1', target: 'a2', clusterId: 'cluster-1' })
      expect(result.masterEntities).toHaveLength(2)
    })

    it('both modes agree on clusters and master entities', () => {
      const merged = new Resolver(createFixtureConfig({ mode: 'merge' })).run(allScenarioRecords)
      const linked = new Resolver(createFixtureConfig({ mode: 'link' })).run(allScenarioRecords)

      expect(linked.clusters).toEqual(merged.clusters)
      expect(linked.masterEntities).toEqual(merged.masterEntities)
      expect(Object.fromEntries(linked.assignments)).toEqual(Object.fromEntries(merged.assignments))
    })
  })
})
