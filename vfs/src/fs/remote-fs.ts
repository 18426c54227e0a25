import type { Readable } from 'stream';
import type { OpenOptions } from '../debrid/base.js';
import {
  BrokenLinkError,
  CantShareDirectoriesError,
  DirNotFoundError,
  NotFoundError,
} from '../errors.js';
import type { NamespaceEngine } from '../namespace/engine.js';
import type { FileNode } from '../types/namespace.js';
import { ROOT, joinDir, normalizeDir } from '../utils/path.js';
import { DirCache, type DirLookup } from './dircache.js';

export interface RemoteDir {
  type: 'dir';
  remote: string;
  id: string;
}

export type RemoteEntry = RemoteObject | RemoteDir;

/**
 * "/a/b/" and "a/b" both become "a/b"
 */
export function cleanRemote(remote: string): string {
  return remote.split('/').filter(Boolean).join('/');
}

function joinRemote(dir: string, leaf: string): string {
  return dir === '' ? leaf : `${dir}/${leaf}`;
}

/**
 * A file of the virtual tree
 */
export class RemoteObject {
  readonly type = 'file';

  constructor(
    private readonly fs: RemoteFs,
    readonly remote: string,
    readonly node: FileNode,
  ) {}

  get size(): number {
    return this.node.size;
  }

  get modTime(): Date {
    return new Date(this.node.modTime);
  }

  get url(): string | null {
    return this.node.url;
  }

  mimeType(): string {
    return this.node.mimeType;
  }

  id(): string {
    return this.node.id;
  }

  open(options: OpenOptions = {}): Promise<Readable> {
    return this.fs.engine.open(this.node, options);
  }

  async remove(signal?: AbortSignal): Promise<void> {
    await this.fs.engine.moves.remove(this.node, signal);
  }
}

/**
 * Path-based filesystem over the namespace engine
 */
export class RemoteFs implements DirLookup {
  readonly dirCache: DirCache;

  constructor(
    readonly engine: NamespaceEngine,
    root = '',
  ) {
    this.dirCache = new DirCache(cleanRemote(root), ROOT, this);
  }

  async findLeaf(pathId: string, leaf: string, signal?: AbortSignal): Promise<string | null> {
    const node = await this.engine.find(pathId, leaf, signal);
    return node?.type === 'folder' ? node.id : null;
  }

  async createDir(pathId: string, leaf: string): Promise<string> {
    await this.engine.moves.createDir(pathId, leaf);
    return joinDir(normalizeDir(pathId), leaf);
  }

  async list(dir: string, signal?: AbortSignal): Promise<RemoteEntry[]> {
    const remoteDir = cleanRemote(dir);
    const dirId = await this.dirCache.findDir(remoteDir, false, signal);

    const entries: RemoteEntry[] = [];
    for (const node of await this.engine.list(dirId, signal)) {
      const remote = joinRemote(remoteDir, node.name);
      if (node.type === 'folder') {
        this.dirCache.put(remote, node.id);
        entries.push({ type: 'dir', remote, id: node.id });
      } else {
        entries.push(new RemoteObject(this, remote, node));
      }
    }
    return entries;
  }

  async newObject(remote: string, signal?: AbortSignal): Promise<RemoteObject> {
    const path = cleanRemote(remote);
    let location: { leaf: string; directoryId: string };
    try {
      location = await this.dirCache.findPath(path, false, signal);
    } catch (error) {
      if (error instanceof DirNotFoundError) {
        throw new NotFoundError(path);
      }
      throw error;
    }

    const node = await this.engine.find(location.directoryId, location.leaf, signal);
    if (!node || node.type !== 'file') {
      throw new NotFoundError(path);
    }
    return new RemoteObject(this, path, node);
  }

  async mkdir(dir: string, signal?: AbortSignal): Promise<void> {
    await this.dirCache.findDir(cleanRemote(dir), true, signal);
  }

  async rmdir(dir: string, signal?: AbortSignal): Promise<void> {
    const path = cleanRemote(dir);
    const dirId = await this.dirCache.findDir(path, false, signal);
    await this.engine.moves.removeDir(dirId);
    this.dirCache.flushDir(path);
  }

  async purge(dir: string, signal?: AbortSignal): Promise<void> {
    const path = cleanRemote(dir);
    const dirId = await this.dirCache.findDir(path, false, signal);
    await this.engine.moves.purge(dirId, signal);
    this.dirCache.flushDir(path);
  }

  /**
   * Move or rename a file, returns the object at its new place
   */
  async move(object: RemoteObject, remote: string, signal?: AbortSignal): Promise<RemoteObject> {
    const path = cleanRemote(remote);
    const { leaf, directoryId } = await this.dirCache.findPath(path, true, signal);
    await this.engine.moves.moveFile(object.node, directoryId, leaf);

    const node = await this.engine.find(directoryId, leaf, signal);
    if (node?.type === 'file') {
      return new RemoteObject(this, path, node);
    }
    return new RemoteObject(this, path, { ...object.node, name: leaf, renamed: true });
  }

  async dirMove(srcRemote: string, dstRemote: string, signal?: AbortSignal): Promise<void> {
    const src = cleanRemote(srcRemote);
    const dst = cleanRemote(dstRemote);
    const srcId = await this.dirCache.findDir(src, false, signal);
    const { leaf, directoryId } = await this.dirCache.findPath(dst, true, signal);

    await this.engine.moves.moveDir(srcId, joinDir(normalizeDir(directoryId), leaf));
    this.dirCache.flushDir(src);
  }

  /**
   * Direct link of a file; folders can't be shared
   */
  async publicLink(remote: string, signal?: AbortSignal): Promise<string> {
    const path = cleanRemote(remote);
    let isDir = true;
    try {
      await this.dirCache.findDir(path, false, signal);
    } catch (error) {
      if (!(error instanceof DirNotFoundError)) {
        throw error;
      }
      isDir = false;
    }
    if (isDir) {
      throw new CantShareDirectoriesError(path);
    }

    const object = await this.newObject(path, signal);
    if (!object.url) {
      throw new BrokenLinkError('link seems broken - job will be re-downloaded', object.node.torrentId);
    }
    return object.url;
  }

  dirCacheFlush(): void {
    this.dirCache.resetRoot();
  }
}
