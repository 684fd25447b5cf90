export { SourceSnapshot } from './source-snapshot.js'
export { DisjointSet } from './union-find.js'
export {
  XrefGraphBuilder,
  selectMergeRef,
  type XrefGraphBuilderOptions,
} from './xref-graph.js'
