export {
  buildPath,
  toCanonicalMetadata,
  assertKnownVendor,
  assertNoPeriodsInFolders,
  assertHierarchyDepth,
  assertSinglePeriod,
} from './builder';
export type { BuildPathInput, PathBuilderOptions, PathMetadata } from './builder';
