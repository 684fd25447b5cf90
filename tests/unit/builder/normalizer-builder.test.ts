import { describe, it, expect, vi } from 'vitest'
import { MemoryDiseaseStore } from '../../../src/adapters/memory/memory-store.js'
import { DiseaseNorm, NormalizerBuilder } from '../../../src/builder/normalizer-builder.js'
import { DiseaseNormalizer } from '../../../src/core/disease-normalizer.js'
import { NotConfiguredError } from '../../../src/utils/errors.js'
import type { Logger } from '../../../src/utils/logger.js'
import { ncitNsclc } from '../../fixtures/records.js'

function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }
}

describe('NormalizerBuilder', () => {
  it('is created by DiseaseNorm.create()', () => {
    expect(DiseaseNorm.create()).toBeInstanceOf(NormalizerBuilder)
  })

  it('chains configuration calls', () => {
    const builder = DiseaseNorm.create()

    expect(builder.storage(new MemoryDiseaseStore())).toBe(builder)
    expect(builder.logger(createMockLogger())).toBe(builder)
    expect(builder.logLevel('warn')).toBe(builder)
  })

  it('builds a normalizer over the configured store', async () => {
    const store = new MemoryDiseaseStore()
    const normalizer = DiseaseNorm.create().storage(store).logLevel('silent').build()

    expect(normalizer).toBeInstanceOf(DiseaseNormalizer)
    await normalizer.ingest('NCIt', [ncitNsclc])
    expect(await store.getSourceRecord('ncit:C2926')).toMatchObject({
      conceptId: 'ncit:C2926',
    })
  })

  it('requires storage', () => {
    expect(() => DiseaseNorm.create().build()).toThrow(NotConfiguredError)
    expect(() => DiseaseNorm.create().build()).toThrow(
      "Feature 'storage' is not configured. Call .storage(store) with a MemoryDiseaseStore or DrizzleDiseaseStore before .build()."
    )
  })

  it('routes log output through the configured logger and level', async () => {
    const logger = createMockLogger()
    const normalizer = DiseaseNorm.create()
      .storage(new MemoryDiseaseStore())
      .logger(logger)
      .logLevel('info')
      .build()

    await normalizer.ingest('NCIt', [ncitNsclc])

    expect(logger.info).toHaveBeenCalledWith('Ingested NCIt', { removed: 0, added: 1 })
  })

  it('drops messages below the configured level', async () => {
    const logger = createMockLogger()
    const normalizer = DiseaseNorm.create()
      .storage(new MemoryDiseaseStore())
      .logger(logger)
      .logLevel('warn')
      .build()

    await normalizer.ingest('NCIt', [ncitNsclc])

    expect(logger.info).not.toHaveBeenCalled()
  })
})
