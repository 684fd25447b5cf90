export { EtlError, SourceFileError, TransformError } from './etl-error.js'
export {
  ExtractedTermSchema,
  SourceFileSchema,
  type ExtractedTerm,
  type SourceFile,
} from './source-file.js'
export {
  SourceTransformer,
  MAX_ALIASES,
  canonicalPrefix,
  type ReferenceRoute,
  type TransformerOptions,
} from './base-transformer.js'
export {
  NcitTransformer,
  MondoTransformer,
  OmimTransformer,
  OncoTreeTransformer,
  DoTransformer,
  transformerFor,
} from './transformers.js'
export {
  SourceLoader,
  type LoadedSource,
  type SourceLoaderOptions,
} from './source-loader.js'
