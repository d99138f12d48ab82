export { JsonAbiReader, parseLibraryAbi } from './json';
export { renderLibraryAbi, dumpArtifact } from './renderer';
export {
  DEFAULT_DUMP_FILTERS,
  createDumpFilters,
  toAbiQualifiedName,
  toReadingFilters,
  isExcluded,
  selectSignatureVersion,
  parseSignatureVersion,
} from './filters';
