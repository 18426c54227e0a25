import { defaultLocation, type ParsedRules } from '../rules/parser.js';
import type { FileNode, RemoteDownload, RemoteTorrent } from '../types/namespace.js';
import {
  joinDir,
  lastSegment,
  mappingKey,
  normalizeDir,
  splitTarget,
  torrentKey,
  type DirPath,
} from '../utils/path.js';
import { FolderTable } from './folders.js';

export const TRASH_MARKER = '.trashed';

export interface BuildInput {
  torrents: readonly RemoteTorrent[];
  downloads: ReadonlyMap<string, RemoteDownload>; // by original link
  rules: Pick<ParsedRules, 'regexRules' | 'mappings'>;
  trashMarker?: string;
}

export interface Namespace {
  folders: FolderTable;
  /**
   * Mapping key -> destination. File keys hold their folder once placed;
   * trashed and rule-only keys keep the raw value of the sort file.
   */
  mapping: Map<string, string>;
}

export function isTrashed(value: string, marker: string = TRASH_MARKER): boolean {
  return value.endsWith(marker);
}

function fileNode(
  torrent: RemoteTorrent,
  link: string,
  leafId: string,
  download: RemoteDownload | undefined,
  name: string,
  renamed: boolean,
): FileNode {
  return {
    type: 'file',
    name,
    id: leafId,
    mappingKey: mappingKey(torrent.name, leafId),
    torrentId: torrent.id,
    torrentHash: torrent.hash,
    originalLink: link,
    url: download?.download ?? null,
    size: download?.size ?? 0,
    mimeType: download?.mimeType ?? 'application/octet-stream',
    modTime: download?.generated ?? torrent.ended ?? torrent.added,
    renamed,
  };
}

/**
 * Derive the folder tree from the inventory and the parsed sort file.
 * Pure: the same input always yields the same tables.
 */
export function buildNamespace(input: BuildInput): Namespace {
  const marker = input.trashMarker ?? TRASH_MARKER;
  const mapping = new Map(input.rules.mappings);
  const folders = new FolderTable();

  for (const torrent of input.torrents) {
    const fallback = joinDir(defaultLocation(torrent.name, input.rules.regexRules), torrent.name);
    const inherited = mapping.get(torrentKey(torrent.name));

    for (const link of torrent.links) {
      if (!link) {
        continue;
      }
      const leafId = lastSegment(link);
      const key = mappingKey(torrent.name, leafId);
      const download = input.downloads.get(link);
      const seeded = mapping.get(key);

      let dir: DirPath;
      let name = download?.filename || leafId;
      let renamed = false;

      if (!seeded) {
        dir = inherited ? normalizeDir(inherited) : fallback;
      } else {
        if (isTrashed(seeded, marker)) {
          continue;
        }
        const target = splitTarget(seeded);
        dir = target.dir;
        if (target.leaf) {
          name = target.leaf;
          renamed = true;
        }
      }

      mapping.set(key, dir);
      folders.add(dir, fileNode(torrent, link, leafId, download, name, renamed));
    }
  }

  for (const value of mapping.values()) {
    if (!isTrashed(value, marker)) {
      folders.synthesize(value);
    }
  }

  return { folders, mapping };
}
