export { scan } from './scan'
export { scanStream, streamToArray } from './stream'
export type { ScanStreamOptions } from './stream'
export { walk, checkRoot } from './walker'
export type { WalkOptions } from './walker'
export {
  resolveMatches,
  createMatchStrategy,
  CanonicalPathStrategy,
  IdentityStrategy,
  FastPathStrategy,
} from './resolver'
export type { MatchStrategy, ResolveOptions } from './resolver'
export {
  buildFilterPolicy,
  FilterPolicy,
  DepthRule,
  HeavyDirectoryRule,
  HiddenRule,
  IgnorePatternRule,
  GitIgnoreRule,
  FilesystemBoundaryRule,
  HEAVY_DIRS,
} from './filters'
export { resolveTarget, readIdentity } from './identity'
export { EntryBuffer, MatchSet, comparePaths } from './collections'
export { resolveScanOptions, defaultConcurrency } from './config'
export { LinkscanError, TargetResolutionError, RootAccessError, InvalidOptionsError } from './errors'
export type * from './types'
