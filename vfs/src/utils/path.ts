/**
 * Canonical folder path: leading and trailing slash, no empty segments.
 * The root is "/".
 */
export type DirPath = string & { readonly __brand: 'DirPath' };

export const ROOT: DirPath = normalizeDir('/');

export function normalizeDir(input: string): DirPath {
  const segments = input.split('/').filter(segment => segment.length > 0);
  const normalized = segments.length === 0 ? '/' : `/${segments.join('/')}/`;
  return normalized as DirPath;
}

export function isRoot(dir: DirPath): boolean {
  return dir === ROOT;
}

/**
 * Child folder of a canonical folder
 */
export function joinDir(parent: DirPath, leaf: string): DirPath {
  return normalizeDir(`${parent}${leaf}`);
}

/**
 * Last segment of a folder path ("" for the root)
 */
export function dirName(dir: DirPath): string {
  const segments = dir.split('/').filter(Boolean);
  return segments[segments.length - 1] ?? '';
}

export function parentDir(dir: DirPath): DirPath {
  const segments = dir.split('/').filter(Boolean);
  return normalizeDir(segments.slice(0, -1).join('/'));
}

/**
 * Last "/"-separated segment of a string, e.g. the id of a download link
 */
export function lastSegment(value: string): string {
  const parts = value.split('/');
  return parts[parts.length - 1] ?? '';
}

/**
 * Splits a mapping value into its folder and an optional explicit leaf name.
 * Values ending with "/" are plain folders.
 */
export function splitTarget(value: string): { dir: DirPath; leaf: string | null } {
  const index = value.lastIndexOf('/');
  const leaf = value.slice(index + 1);
  return {
    dir: normalizeDir(value.slice(0, index + 1)),
    leaf: leaf.length > 0 ? leaf : null,
  };
}

export function mappingKey(torrentName: string, leafId: string): string {
  return `/${torrentName}/${leafId}`;
}

export function torrentKey(torrentName: string): string {
  return `/${torrentName}/`;
}

/**
 * Moves `value` from under `from` to under `to` when it lies below `from`
 */
export function replacePrefix(value: string, from: DirPath, to: DirPath): string {
  if (!value.startsWith(from)) {
    return value;
  }
  return `${to}${value.slice(from.length)}`;
}
