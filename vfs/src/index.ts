export { getConfig, reloadConfig, type Config, type InvalidRegexMode } from './config.js';
export * from './errors.js';
export type { ByteRange, DebridService, OpenOptions } from './debrid/base.js';
export { RealDebridClient, type RealDebridOptions } from './debrid/realdebrid.js';
export { InventoryFetcher, type FetcherOptions, type InventorySnapshot } from './inventory/fetcher.js';
export { JobRecovery, needsRecovery, type RecoveryOptions } from './links/recovery.js';
export { LinkResolver } from './links/resolver.js';
export { MoveEngine, type MoveContext } from './moves/move-engine.js';
export { FolderTable } from './namespace/folders.js';
export { TRASH_MARKER, buildNamespace, isTrashed, type BuildInput, type Namespace } from './namespace/builder.js';
export { NamespaceEngine, type EngineOptions } from './namespace/engine.js';
export { defaultLocation, parseRules, type ParsedRules, type RuleWarning } from './rules/parser.js';
export { RuleFile } from './rules/rule-file.js';
export { DirCache, type DirLookup } from './fs/dircache.js';
export { RemoteFs, RemoteObject, type RemoteDir, type RemoteEntry } from './fs/remote-fs.js';
export { createServer, registerRoutes } from './routes/index.js';
export { startRuleFileWatcher, stopRuleFileWatcher } from './watcher.js';
export type * from './types/namespace.js';
export { normalizeDir, type DirPath } from './utils/path.js';
