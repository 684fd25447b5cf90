/**
 * One transformer per ingested source
 * @module etl/transformers
 */

import { SourceName, type SourceMeta } from '../types/source.js'
import {
  SourceTransformer,
  type ReferenceRoute,
  type TransformerOptions,
} from './base-transformer.js'

const CC_BY_4 = {
  dataLicense: 'CC BY 4.0',
  dataLicenseUrl: 'https://creativecommons.org/licenses/by/4.0/legalcode',
}

export class NcitTransformer extends SourceTransformer {
  readonly sourceName = SourceName.NCIT

  meta(version: string): SourceMeta {
    return {
      ...CC_BY_4,
      version,
      dataUrl: 'https://evs.nci.nih.gov/ftp1/NCI_Thesaurus/',
      rdpUrl: 'http://reusabledata.org/ncit.html',
      dataLicenseAttributes: { nonCommercial: false, attribution: true, shareAlike: false },
    }
  }
}

export class MondoTransformer extends SourceTransformer {
  readonly sourceName = SourceName.MONDO

  meta(version: string): SourceMeta {
    return {
      ...CC_BY_4,
      version,
      dataUrl: 'https://mondo.monarchinitiative.org/pages/download/',
      rdpUrl: 'http://reusabledata.org/monarch.html',
      dataLicenseAttributes: { nonCommercial: false, attribution: true, shareAlike: false },
    }
  }
}

export class OmimTransformer extends SourceTransformer {
  readonly sourceName = SourceName.OMIM

  meta(version: string): SourceMeta {
    return {
      dataLicense: 'custom',
      dataLicenseUrl: 'https://omim.org/help/agreement',
      version,
      dataUrl: 'https://www.omim.org/downloads',
      rdpUrl: 'http://reusabledata.org/omim.html',
      dataLicenseAttributes: { nonCommercial: false, attribution: true, shareAlike: true },
    }
  }

  /** Drops the `, INCLUDED` marker OMIM appends to included titles */
  protected override cleanSynonym(synonym: string): string {
    const trimmed = synonym.trimStart()
    return trimmed.endsWith(', INCLUDED') ? trimmed.slice(0, -', INCLUDED'.length) : trimmed
  }
}

export class OncoTreeTransformer extends SourceTransformer {
  readonly sourceName = SourceName.ONCOTREE

  meta(version: string): SourceMeta {
    return {
      ...CC_BY_4,
      version,
      dataUrl: 'http://oncotree.mskcc.org/#/home?tab=api',
      rdpUrl: null,
      dataLicenseAttributes: { nonCommercial: false, attribution: true, shareAlike: false },
    }
  }

  /** Every OncoTree node is a cancer type */
  protected override defaultOncologicDisease(): boolean | null {
    return true
  }
}

export class DoTransformer extends SourceTransformer {
  readonly sourceName = SourceName.DO

  meta(version: string): SourceMeta {
    return {
      dataLicense: 'CC0 1.0',
      dataLicenseUrl: 'https://creativecommons.org/publicdomain/zero/1.0/legalcode',
      version,
      dataUrl: 'http://www.obofoundry.org/ontology/doid.html',
      rdpUrl: null,
      dataLicenseAttributes: { nonCommercial: false, attribution: false, shareAlike: false },
    }
  }

  /** OMIM phenotypic series (`MIM:PS...`) are not concepts of their own */
  protected override routeReference(curie: string): ReferenceRoute {
    if (curie.startsWith('MIM:PS')) return 'associatedWith'
    return super.routeReference(curie)
  }
}

/**
 * Creates the transformer for a source
 *
 * @example
 * ```typescript
 * const transformer = transformerFor(SourceName.DO, { logger })
 * const record = transformer.transform({ id: 'DOID:3908', label: 'lung non-small cell carcinoma', synonyms: [], references: ['NCI:C2926'] })
 * ```
 */
export function transformerFor(
  sourceName: SourceName,
  options: TransformerOptions = {}
): SourceTransformer {
  switch (sourceName) {
    case SourceName.NCIT:
      return new NcitTransformer(options)
    case SourceName.MONDO:
      return new MondoTransformer(options)
    case SourceName.OMIM:
      return new OmimTransformer(options)
    case SourceName.ONCOTREE:
      return new OncoTreeTransformer(options)
    case SourceName.DO:
      return new DoTransformer(options)
  }
}
