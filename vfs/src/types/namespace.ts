import type { RealDebridTorrentStatus } from './realdebrid.js';
import type { DirPath } from '../utils/path.js';

export type TorrentStatus = RealDebridTorrentStatus;

/**
 * A remote download job
 */
export interface RemoteTorrent {
  id: string;
  name: string;
  hash: string;
  status: TorrentStatus;
  links: string[];
  bytes: number;
  added: number; // ms since epoch
  ended: number | null;
}

export interface RemoteTorrentFile {
  id: number;
  path: string;
  bytes: number;
  selected: boolean;
}

export interface TorrentInfo extends RemoteTorrent {
  files: RemoteTorrentFile[];
}

/**
 * A resolved (unrestricted) direct link, keyed by its original link
 */
export interface RemoteDownload {
  id: string;
  filename: string;
  mimeType: string;
  size: number;
  link: string;
  download: string;
  generated: number | null;
}

export interface Page<T> {
  items: T[];
  total: number;
}

export interface PageRequest {
  offset: number;
  limit: number;
}

export interface FileNode {
  type: 'file';
  name: string;
  id: string; // leaf id of the original link
  mappingKey: string;
  torrentId: string;
  torrentHash: string;
  originalLink: string;
  url: string | null;
  size: number;
  mimeType: string;
  modTime: number; // ms since epoch
  renamed: boolean; // name comes from an explicit leaf override
}

export interface FolderNode {
  type: 'folder';
  name: string;
  id: DirPath;
}

export type TreeNode = FileNode | FolderNode;

export interface RegexRule {
  pattern: RegExp;
  folder: DirPath;
}
