import type { DebridService } from '../debrid/base.js';
import {
  DirExistsError,
  DirNotFoundError,
  DirectoryNotEmptyError,
  FileExistsError,
  InvalidPathError,
  RootReservedError,
} from '../errors.js';
import type { InventoryFetcher } from '../inventory/fetcher.js';
import { TRASH_MARKER, isTrashed, type Namespace } from '../namespace/builder.js';
import type { RuleFile } from '../rules/rule-file.js';
import type { FileNode } from '../types/namespace.js';
import { Mutex, type ReadWriteLock } from '../utils/lock.js';
import {
  isRoot,
  joinDir,
  lastSegment,
  mappingKey,
  normalizeDir,
  torrentKey,
  type DirPath,
} from '../utils/path.js';
import { rewriteDirMove, rewriteKey, stripFolderLines, stripTorrentLines } from './rewrite.js';

export interface MoveContext {
  ruleFile: RuleFile;
  rulesLock: ReadWriteLock;
  fetcher: InventoryFetcher;
  service: DebridService;
  /**
   * Current tables
   */
  namespace(): Namespace;
  /**
   * Rebuild the tables from the cached inventory and the given sort file
   * content. Runs inside the rule write lock.
   */
  reindex(content: string): Promise<void>;
}

/**
 * Structural edits. Each one is written to the sort file, then the tables
 * are rebuilt from the cached inventory without any remote call.
 */
export class MoveEngine {
  private readonly mutex = new Mutex();
  private active = false;

  constructor(private readonly ctx: MoveContext) {}

  /**
   * True while a structural edit runs; rebuilds are skipped meanwhile
   */
  get moving(): boolean {
    return this.active;
  }

  moveFile(file: FileNode, newDir: string, newLeaf: string): Promise<void> {
    const dir = normalizeDir(newDir);
    return this.exclusive(async () => {
      const clash = this.ctx.namespace().folders.list(dir).find(child => child.name === newLeaf);
      if (clash && !(clash.type === 'file' && clash.mappingKey === file.mappingKey)) {
        throw new FileExistsError(`${dir}${newLeaf}`);
      }

      console.log(`[Namespace] Moving ${file.mappingKey} to ${dir}${newLeaf}`);
      await this.commit(lines => rewriteKey(lines, file.mappingKey, `${dir}${newLeaf}`));
    });
  }

  moveDir(oldPath: string, newPath: string): Promise<void> {
    const from = normalizeDir(oldPath);
    const to = normalizeDir(newPath);
    return this.exclusive(async () => {
      const { folders, mapping } = this.ctx.namespace();
      if (isRoot(from)) {
        throw new InvalidPathError("can't move the root directory", from);
      }
      if (!folders.has(from)) {
        throw new DirNotFoundError(from);
      }
      if (folders.has(to)) {
        throw new DirExistsError(to);
      }
      if (to.startsWith(from)) {
        throw new InvalidPathError("can't move a directory into itself", to);
      }

      const affected = new Map<string, string>();
      for (const [key, value] of mapping) {
        if (value.startsWith(from)) {
          affected.set(key, value);
        }
      }

      console.log(`[Namespace] Moving directory ${from} to ${to} (${affected.size} entries)`);
      await this.commit(lines => rewriteDirMove(lines, from, to, affected));
    });
  }

  createDir(parent: string, leaf: string): Promise<void> {
    const base = normalizeDir(parent);
    return this.exclusive(async () => {
      if (isRoot(base)) {
        throw new RootReservedError();
      }
      const dir = joinDir(base, leaf);
      if (this.ctx.namespace().folders.has(dir)) {
        return;
      }

      console.log(`[Namespace] Creating directory ${dir}`);
      await this.ctx.rulesLock.write(async () => {
        await this.ctx.ruleFile.append(dir);
        await this.ctx.reindex(await this.ctx.ruleFile.read());
      });
    });
  }

  removeDir(path: string): Promise<void> {
    const dir = normalizeDir(path);
    return this.exclusive(async () => {
      const { folders } = this.ctx.namespace();
      if (isRoot(dir)) {
        throw new InvalidPathError("can't remove the root directory", dir);
      }
      if (!folders.has(dir)) {
        throw new DirNotFoundError(dir);
      }
      if (folders.list(dir).length > 0) {
        throw new DirectoryNotEmptyError(dir);
      }
      await this.commit(lines => stripFolderLines(lines, dir));
    });
  }

  /**
   * Logical delete. The torrent itself is deleted once all its files are
   * trashed.
   */
  remove(file: FileNode, signal?: AbortSignal): Promise<void> {
    return this.exclusive(() => this.trash(file, signal));
  }

  /**
   * Remove every file below `path`, then the folders declared there
   */
  purge(path: string, signal?: AbortSignal): Promise<void> {
    const dir = normalizeDir(path);
    return this.exclusive(async () => {
      if (isRoot(dir)) {
        throw new InvalidPathError("can't purge the root directory", dir);
      }
      if (!this.ctx.namespace().folders.has(dir)) {
        throw new DirNotFoundError(dir);
      }

      for (const file of this.ctx.namespace().folders.filesBelow(dir)) {
        await this.trash(file, signal);
      }

      const declared = this.ctx.namespace().folders.dirs().filter(folder => folder.startsWith(dir));
      await this.commit(lines => declared.reduce((kept, folder) => stripFolderLines(kept, folder), lines));
    });
  }

  private async trash(file: FileNode, signal?: AbortSignal): Promise<void> {
    const { fetcher } = this.ctx;
    const { mapping } = this.ctx.namespace();
    const torrent = fetcher.cachedTorrents.find(item => item.id === file.torrentId);
    const dir: DirPath = normalizeDir(mapping.get(file.mappingKey) ?? '/');

    const keys = torrent
      ? torrent.links.filter(link => link.length > 0).map(link => mappingKey(torrent.name, lastSegment(link)))
      : [];
    const complete = keys.every(key => key === file.mappingKey || isTrashed(mapping.get(key) ?? ''));

    if (!torrent || !complete) {
      console.log(`[Namespace] Trashing ${file.mappingKey}`);
      await this.commit(lines => rewriteKey(lines, file.mappingKey, `${dir}${file.name}${TRASH_MARKER}`));
      return;
    }

    console.log(`[Namespace] All files of ${torrent.name} trashed, deleting torrent ${torrent.id}`);
    await this.ctx.service.deleteTorrent(torrent.id, signal);
    fetcher.replaceTorrent(torrent.id, null);
    fetcher.invalidate();
    await this.commit(lines => stripTorrentLines(lines, torrentKey(torrent.name)));
  }

  private async commit(transform: (lines: string[]) => string[]): Promise<void> {
    await this.ctx.rulesLock.write(async () => {
      const content = await this.ctx.ruleFile.rewrite(transform);
      await this.ctx.reindex(content);
    });
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(async () => {
      this.active = true;
      try {
        return await fn();
      } finally {
        this.active = false;
      }
    });
  }
}
