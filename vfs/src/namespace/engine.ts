import type { Readable } from 'stream';
import type { Config, InvalidRegexMode } from '../config.js';
import type { DebridService, OpenOptions } from '../debrid/base.js';
import { BrokenLinkError } from '../errors.js';
import { InventoryFetcher } from '../inventory/fetcher.js';
import { JobRecovery, needsRecovery, type RecoveryOptions } from '../links/recovery.js';
import { LinkResolver } from '../links/resolver.js';
import { MoveEngine } from '../moves/move-engine.js';
import { parseRules, type RuleWarning } from '../rules/parser.js';
import { RuleFile } from '../rules/rule-file.js';
import type { FileNode, RemoteDownload, TreeNode } from '../types/namespace.js';
import { ReadWriteLock } from '../utils/lock.js';
import { isRoot, normalizeDir, type DirPath } from '../utils/path.js';
import { FolderTable } from './folders.js';
import { buildNamespace, type Namespace } from './builder.js';

export interface EngineOptions {
  service: DebridService;
  sortFile: string;
  refreshInterval: number; // ms
  sortFileDebounce: number; // ms
  pageSize: number;
  recovery: RecoveryOptions;
  invalidRegex?: InvalidRegexMode;
  debug?: boolean;
  now?: () => number;
}

/**
 * Owns the virtual tree: inventory, sort file, tables and the locks
 * around them.
 */
export class NamespaceEngine {
  readonly fetcher: InventoryFetcher;
  readonly ruleFile: RuleFile;
  readonly resolver: LinkResolver;
  readonly recovery: JobRecovery;
  readonly moves: MoveEngine;

  private readonly rulesLock = new ReadWriteLock();
  private readonly broken = new Set<string>();
  private readonly lifecycle = new AbortController();
  private readonly now: () => number;

  private state: Namespace = { folders: new FolderTable(), mapping: new Map() };
  private warnings: RuleWarning[] = [];
  private built = false;
  private rebuilding: Promise<void> | null = null;
  private lastRuleMtime: number | null = null;
  private lastRuleCheck: number | null = null;
  private rulesDirty = false;

  constructor(private readonly options: EngineOptions) {
    this.now = options.now ?? Date.now;
    this.fetcher = new InventoryFetcher(options.service, {
      interval: options.refreshInterval,
      pageSize: options.pageSize,
      now: this.now,
    });
    this.ruleFile = new RuleFile(options.sortFile);
    this.resolver = new LinkResolver(options.service, this.fetcher, this.broken);
    this.recovery = new JobRecovery(options.service, this.fetcher, this.broken, options.recovery);
    this.moves = new MoveEngine({
      ruleFile: this.ruleFile,
      rulesLock: this.rulesLock,
      fetcher: this.fetcher,
      service: options.service,
      namespace: () => this.state,
      reindex: content => this.reindex(content),
    });
  }

  static fromConfig(config: Config, service: DebridService): NamespaceEngine {
    return new NamespaceEngine({
      service,
      sortFile: config.sortFile,
      refreshInterval: config.refreshInterval * 1000,
      sortFileDebounce: config.sortFileDebounce * 1000,
      pageSize: config.pageSize,
      recovery: config.recovery,
      invalidRegex: config.invalidRegex,
      debug: config.debug,
    });
  }

  get namespace(): Namespace {
    return this.state;
  }

  get brokenJobs(): ReadonlySet<string> {
    return this.broken;
  }

  /**
   * Warnings of the last sort file parse
   */
  get ruleWarnings(): readonly RuleWarning[] {
    return this.warnings;
  }

  /**
   * Mark the inventory stale so the next access refetches it
   */
  invalidate(): void {
    this.fetcher.invalidate();
  }

  /**
   * The sort file changed on disk; skip the mtime debounce on the next check
   */
  invalidateRules(): void {
    this.rulesDirty = true;
  }

  async ensureFresh(dir: DirPath, signal?: AbortSignal): Promise<void> {
    if (this.moves.moving) {
      return;
    }
    if (await this.needsRebuild(dir)) {
      await this.rebuild(signal);
    }
  }

  /**
   * Refetch and rebuild. Concurrent callers share the same run.
   */
  rebuild(signal?: AbortSignal): Promise<void> {
    if (!this.rebuilding) {
      this.rebuilding = this.runRebuild(this.signalFor(signal)).finally(() => {
        this.rebuilding = null;
      });
    }
    return this.rebuilding;
  }

  /**
   * Children of a folder, with direct links resolved. Unknown folders are
   * empty.
   */
  async list(path: string, signal?: AbortSignal): Promise<TreeNode[]> {
    const dir = normalizeDir(path);
    await this.ensureFresh(dir, signal);

    const nodes: TreeNode[] = [];
    for (const node of this.state.folders.list(dir)) {
      if (node.type === 'file' && node.url === null) {
        nodes.push(await this.resolveNode(dir, node, signal));
      } else {
        nodes.push(node);
      }
    }
    return nodes;
  }

  async hasDir(path: string, signal?: AbortSignal): Promise<boolean> {
    const dir = normalizeDir(path);
    await this.ensureFresh(dir, signal);
    return this.state.folders.has(dir);
  }

  /**
   * Child `name` of `path`, with its direct link resolved when it is a file
   */
  async find(path: string, name: string, signal?: AbortSignal): Promise<TreeNode | null> {
    const dir = normalizeDir(path);
    await this.ensureFresh(dir, signal);

    const node = this.state.folders.list(dir).find(child => child.name === name);
    if (!node) {
      return null;
    }
    if (node.type === 'file' && node.url === null) {
      return this.resolveNode(dir, node, signal);
    }
    return node;
  }

  open(file: FileNode, options: OpenOptions = {}): Promise<Readable> {
    return this.resolver.open(file, { ...options, signal: this.signalFor(options.signal) });
  }

  /**
   * Abort every in-flight remote call
   */
  shutdown(): void {
    this.lifecycle.abort();
  }

  private async needsRebuild(dir: DirPath): Promise<boolean> {
    if (!this.built || isRoot(dir) || !this.state.folders.has(dir) || this.fetcher.isStale()) {
      return true;
    }
    return this.rulesChanged();
  }

  private async rulesChanged(): Promise<boolean> {
    const now = this.now();
    if (!this.rulesDirty && this.lastRuleCheck !== null && now - this.lastRuleCheck < this.options.sortFileDebounce) {
      return false;
    }
    this.lastRuleCheck = now;
    this.rulesDirty = false;
    return (await this.ruleFile.mtime()) !== this.lastRuleMtime;
  }

  private async runRebuild(signal: AbortSignal): Promise<void> {
    await this.rulesLock.read(async () => {
      const { torrents } = await this.fetcher.refresh(false, signal);

      for (const torrent of torrents) {
        if (!needsRecovery(torrent, this.broken)) {
          continue;
        }
        const recovered = await this.recovery.recoverOrKeep(torrent, signal);
        if (recovered !== torrent) {
          this.fetcher.replaceTorrent(torrent.id, recovered);
        }
      }

      const content = await this.ruleFile.read();
      this.apply(content);
      this.lastRuleMtime = await this.ruleFile.mtime();
      this.lastRuleCheck = this.now();
      this.built = true;
    });
  }

  private async reindex(content: string): Promise<void> {
    this.apply(content);
    this.lastRuleMtime = await this.ruleFile.mtime();
  }

  private apply(content: string): void {
    const rules = parseRules(content, {
      invalidRegex: this.options.invalidRegex,
      filePath: this.ruleFile.filePath,
    });
    for (const warning of rules.warnings) {
      console.warn(`[RuleFile] Skipping invalid regex on line ${warning.line}: ${warning.reason}`);
    }

    this.warnings = rules.warnings;
    this.state = buildNamespace({
      torrents: this.fetcher.cachedTorrents,
      downloads: this.fetcher.downloadIndex,
      rules,
    });

    if (this.options.debug) {
      console.log(`[Namespace] Indexed ${this.state.folders.dirs().length} folders, ${this.state.mapping.size} mappings`);
    }
  }

  /**
   * A file of a torrent that is still broken stays listed without a direct
   * link; reading it fails instead.
   */
  private async resolveNode(dir: DirPath, node: FileNode, signal?: AbortSignal): Promise<FileNode> {
    let download: RemoteDownload | null;
    try {
      download = await this.resolver.resolve(node, this.signalFor(signal));
    } catch (error) {
      if (!(error instanceof BrokenLinkError)) {
        throw error;
      }
      console.warn(`[Namespace] ${node.name} listed without a link: ${error.message}`);
      return node;
    }
    if (!download) {
      return node;
    }

    const resolved: FileNode = {
      ...node,
      name: node.renamed ? node.name : download.filename || node.name,
      url: download.download,
      size: download.size,
      mimeType: download.mimeType,
      modTime: download.generated ?? node.modTime,
    };
    this.state.folders.updateFile(dir, resolved);
    return resolved;
  }

  private signalFor(signal?: AbortSignal): AbortSignal {
    return signal ? AbortSignal.any([signal, this.lifecycle.signal]) : this.lifecycle.signal;
  }
}
