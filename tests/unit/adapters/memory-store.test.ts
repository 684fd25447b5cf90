import { describe, it, expect, beforeEach } from 'vitest'
import { ValidationError } from '../../../src/adapters/adapter-error.js'
import { MemoryDiseaseStore } from '../../../src/adapters/memory/memory-store.js'
import type { MergedRecord } from '../../../src/types/record.js'
import { SourceName } from '../../../src/types/source.js'
import { corpus, ncitNsclc, sourceRecord, untypedRecord } from '../../fixtures/records.js'

const merged: MergedRecord = {
  conceptId: 'ncit:C2926',
  label: 'Lung Non-Small Cell Carcinoma',
  aliases: ['NSCLC'],
  xrefs: ['mondo:0005233'],
  associatedWith: [],
  pediatricDisease: null,
  oncologicDisease: true,
}

describe('MemoryDiseaseStore', () => {
  let store: MemoryDiseaseStore

  beforeEach(async () => {
    store = new MemoryDiseaseStore()
    await store.addSourceRecords(corpus)
  })

  describe('lookupByField', () => {
    it('finds values case-insensitively in canonical order', async () => {
      expect(await store.lookupByField('alias', 'nsclc')).toEqual([
        'DOID:3908',
        'mondo:0005233',
        'ncit:C2926',
      ])
      expect(await store.lookupByField('concept_id', 'MONDO:0005233')).toEqual(['mondo:0005233'])
      expect(await store.lookupByField('label', 'lung carcinoma')).toEqual(['ncit:C4878'])
      expect(await store.lookupByField('xref', 'NCIT:C2926')).toEqual([
        'DOID:3908',
        'mondo:0005233',
      ])
      expect(await store.lookupByField('associated_with', 'umls:c0007131')).toEqual([
        'DOID:3908',
        'mondo:0005233',
        'ncit:C2926',
      ])
    })

    it('returns nothing for unknown values', async () => {
      expect(await store.lookupByField('alias', 'nsclc ')).toEqual([])
      expect(await store.lookupByField('label', '')).toEqual([])
    })
  })

  describe('addSourceRecords', () => {
    it('replaces a stored record and its index entries', async () => {
      await store.addSourceRecords([
        sourceRecord('NCIT:C4878', SourceName.NCIT, { label: 'Carcinoma of the Lung' }),
      ])

      expect(await store.lookupByField('label', 'lung carcinoma')).toEqual([])
      expect(await store.lookupByField('alias', 'lung cancer')).toEqual([])
      expect(await store.lookupByField('label', 'carcinoma of the lung')).toEqual(['NCIT:C4878'])
      expect((await store.loadAllSourceRecords()).length).toBe(corpus.length)
    })

    it('stores set fields without exact duplicates', async () => {
      await store.addSourceRecords([
        sourceRecord('ncit:C1', SourceName.NCIT, { aliases: ['A', 'A', 'a'] }),
      ])
      expect((await store.getSourceRecord('ncit:C1'))?.aliases).toEqual(['A', 'a'])
    })

    it('rejects records of unknown shape', async () => {
      await expect(
        store.addSourceRecords([sourceRecord('', SourceName.NCIT)])
      ).rejects.toThrow(ValidationError)
    })

    it('rejects a concept id without its source prefix', async () => {
      await expect(
        store.addSourceRecords([sourceRecord('NCIT:C2926', SourceName.MONDO)])
      ).rejects.toThrow('Concept id NCIT:C2926 does not carry the Mondo prefix')

      expect((await store.getSourceRecord('ncit:C2926'))?.sourceName).toBe('NCIt')
      expect(await store.lookupByField('alias', 'nsclc')).toContain('ncit:C2926')
    })

    it('rejects duplicate concept ids in one call', async () => {
      await expect(
        store.addSourceRecords([
          sourceRecord('ncit:C1', SourceName.NCIT),
          sourceRecord('NCIT:C1', SourceName.NCIT),
        ])
      ).rejects.toThrow('Concept id NCIT:C1 appears more than once in one batch')
    })
  })

  describe('replaceMergedRecords', () => {
    it('sets merge refs for members and clears everything else', async () => {
      await store.replaceMergedRecords([
        { record: merged, memberIds: ['ncit:C2926', 'MONDO:0005233'] },
      ])

      expect((await store.getSourceRecord('mondo:0005233'))?.mergeRef).toBe('ncit:C2926')
      expect((await store.getSourceRecord('DOID:3908'))?.mergeRef).toBeNull()
      expect(await store.getMergedRecord('NCIT:C2926')).toEqual(merged)

      await store.replaceMergedRecords([])

      expect((await store.getSourceRecord('mondo:0005233'))?.mergeRef).toBeNull()
      expect(await store.getMergedRecord('ncit:C2926')).toBeNull()
    })

    it('leaves the previous set in place when the replacement is invalid', async () => {
      await store.replaceMergedRecords([{ record: merged, memberIds: ['ncit:C2926'] }])

      await expect(
        store.replaceMergedRecords([
          { record: merged, memberIds: ['ncit:C2926'] },
          { record: { ...merged, conceptId: 'ncit:C4878' }, memberIds: ['NCIT:C2926'] },
        ])
      ).rejects.toThrow(ValidationError)

      expect(await store.getMergedRecord('ncit:C2926')).toEqual(merged)
      expect(await store.getMergedRecord('ncit:C4878')).toBeNull()
    })

    it('returns copies', async () => {
      await store.replaceMergedRecords([{ record: merged, memberIds: ['ncit:C2926'] }])
      const first = await store.getMergedRecord('ncit:C2926')
      first?.aliases.push('changed')

      expect((await store.getMergedRecord('ncit:C2926'))?.aliases).toEqual(['NSCLC'])
    })
  })

  describe('deleteSource', () => {
    it('removes only the given source', async () => {
      expect(await store.deleteSource(SourceName.NCIT)).toBe(2)
      expect(await store.getSourceRecord(ncitNsclc.conceptId)).toBeNull()
      expect(await store.lookupByField('alias', 'nsclc')).toEqual(['DOID:3908', 'mondo:0005233'])
      expect(await store.deleteSource(SourceName.ONCOTREE)).toBe(0)
    })
  })

  describe('replaceSource', () => {
    it('swaps the records of one source', async () => {
      await store.replaceMergedRecords([{ record: merged, memberIds: ['ncit:C2926'] }])

      expect(
        await store.replaceSource(SourceName.NCIT, [
          sourceRecord('ncit:C2926', SourceName.NCIT, { aliases: ['NSCLC'] }),
        ])
      ).toBe(2)
      expect(await store.getSourceRecord('ncit:C4878')).toBeNull()
      expect((await store.getSourceRecord('ncit:C2926'))?.mergeRef).toBe('ncit:C2926')
      expect(await store.lookupByField('label', 'lung non-small cell carcinoma')).toEqual([
        'DOID:3908',
      ])
    })

    it('leaves the source untouched when the batch is invalid', async () => {
      const invalid = untypedRecord(
        '{"conceptId":"ncit:C1","sourceName":"NCIt","aliases":[42],"xrefs":[],"associatedWith":[]}'
      )

      await expect(store.replaceSource(SourceName.NCIT, [invalid])).rejects.toThrow(
        'aliases must be an array of strings'
      )
      await expect(
        store.replaceSource(SourceName.NCIT, [sourceRecord('DOID:1', SourceName.DO)])
      ).rejects.toThrow('Record DOID:1 belongs to DO, not NCIt')
      expect(await store.getSourceRecord('ncit:C2926')).toEqual({ ...ncitNsclc, mergeRef: null })
      expect(await store.getSourceRecord('ncit:C4878')).not.toBeNull()
    })
  })

  describe('source metadata', () => {
    it('stores one entry per source', async () => {
      const meta = {
        dataLicense: 'CC0 1.0',
        dataLicenseUrl: 'https://creativecommons.org/publicdomain/zero/1.0/legalcode',
        version: '2024-01-31',
        dataUrl: 'http://www.obofoundry.org/ontology/doid.html',
        rdpUrl: null,
        dataLicenseAttributes: { nonCommercial: false, attribution: false, shareAlike: false },
      }

      expect(await store.getSourceMetadata(SourceName.DO)).toBeNull()
      await store.addSourceMetadata(SourceName.DO, meta)
      await store.addSourceMetadata(SourceName.DO, { ...meta, version: '2024-02-29' })

      expect(await store.getSourceMetadata(SourceName.DO)).toEqual({
        ...meta,
        version: '2024-02-29',
      })
    })
  })

  it('rejects a batch size that is not a positive integer', () => {
    expect(() => new MemoryDiseaseStore({ batchSize: 0 })).toThrow(
      'batchSize must be a positive integer'
    )
    expect(() => new MemoryDiseaseStore({ batchSize: 2.5 })).toThrow(ValidationError)
  })

  it('keeps stored records isolated from the caller', async () => {
    const record = sourceRecord('ncit:C7', SourceName.NCIT, { aliases: ['before'] })
    await store.addSourceRecords([record])
    record.aliases.push('after')

    expect((await store.getSourceRecord('ncit:C7'))?.aliases).toEqual(['before'])
  })
})
