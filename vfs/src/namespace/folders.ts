import type { FileNode, TreeNode } from '../types/namespace.js';
import { ROOT, joinDir, normalizeDir, splitTarget, type DirPath } from '../utils/path.js';

/**
 * Folder path -> ordered children. Names are unique per folder, the first
 * insert wins.
 */
export class FolderTable {
  private readonly entries = new Map<DirPath, TreeNode[]>([[ROOT, []]]);

  has(dir: DirPath): boolean {
    return this.entries.has(dir);
  }

  /**
   * Children of `dir`, empty for unknown folders
   */
  list(dir: DirPath): TreeNode[] {
    return [...(this.entries.get(dir) ?? [])];
  }

  dirs(): DirPath[] {
    return [...this.entries.keys()];
  }

  /**
   * Returns false when a child with the same name already exists
   */
  add(dir: DirPath, node: TreeNode): boolean {
    const children = this.ensure(dir);
    if (children.some(child => child.name === node.name)) {
      return false;
    }
    children.push(node);
    return true;
  }

  /**
   * Swap the file node with the same mapping key, keeping its position
   */
  updateFile(dir: DirPath, node: FileNode): void {
    const children = this.entries.get(dir);
    if (!children) {
      return;
    }
    const index = children.findIndex(child => child.type === 'file' && child.mappingKey === node.mappingKey);
    if (index !== -1) {
      children[index] = node;
    }
  }

  /**
   * Create every folder on the way to `value` that is missing. `value` is a
   * mapping value: a folder path, or a folder path plus a leaf name.
   */
  synthesize(value: string): void {
    const target = value.endsWith('/') ? normalizeDir(value) : splitTarget(value).dir;
    let location = ROOT;

    for (const segment of target.split('/').filter(Boolean)) {
      const next = joinDir(location, segment);
      this.add(location, { type: 'folder', name: segment, id: next });
      location = next;
    }
    this.ensure(location);
  }

  /**
   * Every file in `dir` and the folders below it
   */
  filesBelow(dir: DirPath): FileNode[] {
    const files: FileNode[] = [];
    for (const [path, children] of this.entries) {
      if (!path.startsWith(dir)) {
        continue;
      }
      for (const child of children) {
        if (child.type === 'file') {
          files.push(child);
        }
      }
    }
    return files;
  }

  /**
   * Folder path -> child names, for logging and comparisons
   */
  snapshot(): Record<string, string[]> {
    const result: Record<string, string[]> = {};
    for (const [path, children] of this.entries) {
      result[path] = children.map(child => child.name);
    }
    return result;
  }

  private ensure(dir: DirPath): TreeNode[] {
    let children = this.entries.get(dir);
    if (!children) {
      children = [];
      this.entries.set(dir, children);
    }
    return children;
  }
}
