import { DirNotFoundError } from '../errors.js';

/**
 * Resolves and creates single folder levels
 */
export interface DirLookup {
  findLeaf(pathId: string, leaf: string, signal?: AbortSignal): Promise<string | null>;
  createDir(pathId: string, leaf: string, signal?: AbortSignal): Promise<string>;
}

/**
 * Caches folder path -> folder id below a root. Paths are relative to the
 * root, without leading or trailing slash; the root itself is "".
 */
export class DirCache {
  private readonly byPath = new Map<string, string>();
  private readonly byId = new Map<string, string>();
  private foundRoot = false;

  constructor(
    readonly root: string,
    private readonly rootId: string,
    private readonly lookup: DirLookup,
  ) {}

  /**
   * Split a path into its parent and its last segment
   */
  static splitPath(path: string): [string, string] {
    const index = path.lastIndexOf('/');
    if (index === -1) {
      return ['', path];
    }
    return [path.slice(0, index), path.slice(index + 1)];
  }

  get(path: string): string | undefined {
    return this.byPath.get(path);
  }

  /**
   * Path of a cached folder id
   */
  getInv(id: string): string | undefined {
    return this.byId.get(id);
  }

  put(path: string, id: string): void {
    this.byPath.set(path, id);
    this.byId.set(id, path);
  }

  /**
   * Forget `dir` and everything below it
   */
  flushDir(dir: string): void {
    for (const [path, id] of [...this.byPath]) {
      if (path === dir || dir === '' || path.startsWith(`${dir}/`)) {
        this.byPath.delete(path);
        this.byId.delete(id);
      }
    }
    if (dir === '') {
      this.foundRoot = false;
    }
  }

  resetRoot(): void {
    this.byPath.clear();
    this.byId.clear();
    this.foundRoot = false;
  }

  /**
   * Resolve the root folder, creating the missing levels when `create` is set
   */
  async findRoot(create: boolean, signal?: AbortSignal): Promise<string> {
    const cached = this.get('');
    if (this.foundRoot && cached !== undefined) {
      return cached;
    }

    let id = this.rootId;
    for (const segment of this.root.split('/').filter(Boolean)) {
      const found = await this.lookup.findLeaf(id, segment, signal);
      if (found !== null) {
        id = found;
      } else if (create) {
        id = await this.lookup.createDir(id, segment, signal);
      } else {
        throw new DirNotFoundError(this.root);
      }
    }

    this.put('', id);
    this.foundRoot = true;
    return id;
  }

  async findDir(path: string, create: boolean, signal?: AbortSignal): Promise<string> {
    if (path === '') {
      return this.findRoot(create, signal);
    }
    const cached = this.get(path);
    if (cached !== undefined) {
      return cached;
    }

    const [parent, leaf] = DirCache.splitPath(path);
    const parentId = await this.findDir(parent, create, signal);

    const found = await this.lookup.findLeaf(parentId, leaf, signal);
    if (found !== null) {
      this.put(path, found);
      return found;
    }
    if (!create) {
      throw new DirNotFoundError(path);
    }

    const created = await this.lookup.createDir(parentId, leaf, signal);
    this.put(path, created);
    return created;
  }

  /**
   * Leaf name and parent folder id of a file path
   */
  async findPath(path: string, create: boolean, signal?: AbortSignal): Promise<{ leaf: string; directoryId: string }> {
    const [dir, leaf] = DirCache.splitPath(path);
    const directoryId = await this.findDir(dir, create, signal);
    return { leaf, directoryId };
  }
}
