import { describe, it, expect, beforeEach, vi } from 'vitest'
import { ValidationError } from '../../../src/adapters/adapter-error.js'
import { MemoryDiseaseStore } from '../../../src/adapters/memory/memory-store.js'
import { DiseaseNorm } from '../../../src/builder/normalizer-builder.js'
import type { DiseaseNormalizer } from '../../../src/core/disease-normalizer.js'
import { SourceName, type SourceMeta } from '../../../src/types/source.js'
import { InvalidParameterError } from '../../../src/utils/errors.js'
import type { Logger } from '../../../src/utils/logger.js'
import {
  doDangling,
  doNsclc,
  mondoNsclc,
  ncitLungCarcinoma,
  ncitNsclc,
  omimLungCancer,
  sourceRecord,
  untypedRecord,
} from '../../fixtures/records.js'

function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }
}

const doMeta: SourceMeta = {
  dataLicense: 'CC0 1.0',
  dataLicenseUrl: 'https://creativecommons.org/publicdomain/zero/1.0/legalcode',
  version: '2024-01-31',
  dataUrl: 'https://github.com/DiseaseOntology/HumanDiseaseOntology/tree/main/src/ontology/releases',
  rdpUrl: null,
  dataLicenseAttributes: { nonCommercial: false, attribution: false, shareAlike: false },
}

describe('DiseaseNormalizer', () => {
  let store: MemoryDiseaseStore
  let logger: Logger
  let normalizer: DiseaseNormalizer

  beforeEach(() => {
    store = new MemoryDiseaseStore()
    logger = createMockLogger()
    normalizer = DiseaseNorm.create().storage(store).logger(logger).logLevel('debug').build()
  })

  async function ingestAll(): Promise<void> {
    await normalizer.ingest('NCIt', [ncitNsclc, ncitLungCarcinoma])
    await normalizer.ingest('Mondo', [mondoNsclc])
    await normalizer.ingest('OMIM', [omimLungCancer])
    await normalizer.ingest('DO', [doNsclc, doDangling], doMeta)
  }

  describe('ingest', () => {
    it('adds records and reports counts', async () => {
      const result = await normalizer.ingest('NCIt', [ncitNsclc, ncitLungCarcinoma])

      expect(result).toEqual({ sourceName: 'NCIt', removed: 0, added: 2 })
      expect(logger.info).toHaveBeenCalledWith('Ingested NCIt', { removed: 0, added: 2 })
    })

    it('replaces the previous records of the source', async () => {
      await normalizer.ingest('NCIt', [ncitNsclc, ncitLungCarcinoma])
      const result = await normalizer.ingest('ncit', [ncitNsclc])

      expect(result).toEqual({ sourceName: 'NCIt', removed: 2, added: 1 })
      expect(await store.getSourceRecord('ncit:C4878')).toBeNull()
      expect(await store.getSourceRecord('ncit:C2926')).not.toBeNull()
    })

    it('leaves other sources alone', async () => {
      await ingestAll()
      await normalizer.ingest('DO', [])

      expect(await store.getSourceRecord('DOID:3908')).toBeNull()
      expect(await store.getSourceRecord('mondo:0005233')).not.toBeNull()
    })

    it('stores metadata when given', async () => {
      await ingestAll()

      expect(await store.getSourceMetadata(SourceName.DO)).toEqual(doMeta)
      expect(await store.getSourceMetadata(SourceName.NCIT)).toBeNull()
    })

    it('rejects unknown and blank sources', async () => {
      await expect(normalizer.ingest('umls', [])).rejects.toThrow(
        "Invalid parameter 'source': unknown source"
      )
      await expect(normalizer.ingest('  ', [])).rejects.toThrow(InvalidParameterError)
    })

    it('rejects records of another source without touching storage', async () => {
      await normalizer.ingest('NCIt', [ncitNsclc])

      await expect(normalizer.ingest('NCIt', [ncitLungCarcinoma, mondoNsclc])).rejects.toThrow(
        "Invalid parameter 'records': record belongs to Mondo, not NCIt"
      )
      expect(await store.getSourceRecord('ncit:C2926')).not.toBeNull()
      expect(await store.getSourceRecord('ncit:C4878')).toBeNull()
    })

    it('keeps the stored source when the new batch is rejected', async () => {
      await normalizer.ingest('NCIt', [ncitNsclc])
      await normalizer.rebuildMerges()
      const malformed = untypedRecord(
        '{"conceptId":"ncit:C2926","sourceName":"NCIt","aliases":[42],"xrefs":[],"associatedWith":[]}'
      )

      await expect(normalizer.ingest('NCIt', [malformed])).rejects.toThrow(ValidationError)
      expect(await store.getSourceRecord('ncit:C2926')).toEqual({
        ...ncitNsclc,
        mergeRef: 'ncit:C2926',
      })
      expect((await normalizer.normalize('ncit:C2926')).matchType).toBe('CONCEPT_ID')
    })

    it('rejects a concept id carrying another source prefix', async () => {
      await normalizer.ingest('NCIt', [ncitNsclc])

      await expect(
        normalizer.ingest('Mondo', [sourceRecord('NCIT:C2926', SourceName.MONDO)])
      ).rejects.toThrow('Concept id NCIT:C2926 does not carry the Mondo prefix')
      expect(await store.getSourceRecord('ncit:C2926')).toEqual({ ...ncitNsclc, mergeRef: null })
    })
  })

  describe('rebuildMerges', () => {
    it('groups the ingested records', async () => {
      await ingestAll()
      const result = await normalizer.rebuildMerges()

      expect(result.groupCount).toBe(4)
      expect(result.multiMemberGroupCount).toBe(1)
      expect((await store.getSourceRecord('DOID:3908'))?.mergeRef).toBe('ncit:C2926')
    })
  })

  describe('queries', () => {
    it('matches freshly ingested records as singletons until the next rebuild', async () => {
      await ingestAll()

      const before = await normalizer.normalize('NSCLC')
      expect(before.matchType).toBe('ALIAS')
      expect(before.record?.conceptId).toBe('ncit:C2926')
      expect(before.record?.xrefs).toEqual([])
      expect(before.warnings).toEqual([
        {
          type: 'ambiguous_match',
          message: 'Query matched 3 distinct concepts at ALIAS; chose ncit:C2926',
          matchType: 'ALIAS',
          candidates: ['ncit:C2926', 'mondo:0005233', 'DOID:3908'],
        },
      ])

      await normalizer.rebuildMerges()

      const after = await normalizer.normalize('NSCLC')
      expect(after.record?.conceptId).toBe('ncit:C2926')
      expect(after.record?.xrefs).toEqual(['DOID:3908', 'mondo:0005233'])
      expect(after.warnings).toEqual([])
    })

    it('searches one source', async () => {
      await ingestAll()

      const matches = await normalizer.searchSource('ncit', 'lung carcinoma')

      expect(matches.map(({ record, matchType }) => [record.conceptId, matchType])).toEqual([
        ['ncit:C4878', 'LABEL'],
      ])
    })

    it('searches every source with metadata', async () => {
      await ingestAll()

      const result = await normalizer.search('nsclc', { include: 'do,omim' })

      expect(Object.keys(result.sourceMatches)).toEqual(['OMIM', 'DO'])
      expect(result.sourceMatches.DO?.matchType).toBe('ALIAS')
      expect(result.sourceMatches.DO?.records.map((record) => record.conceptId)).toEqual([
        'DOID:3908',
      ])
      expect(result.sourceMatches.DO?.sourceMeta).toEqual(doMeta)
      expect(result.sourceMatches.OMIM).toEqual({
        matchType: 'NO_MATCH',
        records: [],
        sourceMeta: null,
      })
    })
  })
})
