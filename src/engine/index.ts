export {BuildWorkspace} from './workspace.js'
export {LayerCache, type CacheEntryMeta, type CachedLayer, type LookupResult, type NewLayer, type LayerCacheOptions} from './layer-cache.js'
export {FingerprintEngine, computeFingerprint, baseDigest, buildIgnoreFilter, DEFAULT_IGNORES, IGNORE_FILE, type HashedFile, type FingerprintParts, type FingerprintOptions, type ResolveOptions} from './fingerprint.js'
export {snapshot, diffSnapshots, isEmptyDelta, packDelta, applyDelta, copyInputs, hashFile, type Snapshot, type SnapshotEntry} from './filesystem.js'
export {CommandRunner, ShellCommandRunner, OutputTail, type LogLine, type OnLogLine, type RunCommandRequest, type RunCommandResult, type ShellCommandRunnerOptions} from './command-runner.js'
export {KeyLock} from './key-lock.js'
export {normalizeRelativePath, patternBase, pathsOverlap, compareCodeUnits} from './paths.js'
