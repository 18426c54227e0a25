import type { Readable } from 'stream';
import type {
  Page,
  PageRequest,
  RemoteDownload,
  RemoteTorrent,
  TorrentInfo,
} from '../types/namespace.js';

export interface ByteRange {
  start: number;
  end?: number; // inclusive
}

export interface OpenOptions {
  range?: ByteRange;
  signal?: AbortSignal;
}

/**
 * Remote object store the namespace is built over
 */
export interface DebridService {
  readonly name: string;

  /**
   * Check if the service is configured (has API key)
   */
  isConfigured(): boolean;

  /**
   * Test connection to the debrid service
   */
  testConnection(): Promise<boolean>;

  listDownloads(page: PageRequest, signal?: AbortSignal): Promise<Page<RemoteDownload>>;

  listTorrents(page: PageRequest, signal?: AbortSignal): Promise<Page<RemoteTorrent>>;

  getTorrentInfo(id: string, signal?: AbortSignal): Promise<TorrentInfo>;

  /**
   * Submit a job by content hash, returns the new job id
   */
  addMagnet(hash: string, signal?: AbortSignal): Promise<string>;

  selectFiles(id: string, fileIds: number[], signal?: AbortSignal): Promise<void>;

  deleteTorrent(id: string, signal?: AbortSignal): Promise<void>;

  deleteDownload(id: string, signal?: AbortSignal): Promise<void>;

  /**
   * Turn a restricted link into a direct download
   */
  unrestrictLink(link: string, signal?: AbortSignal): Promise<RemoteDownload>;

  openStream(url: string, options?: OpenOptions): Promise<Readable>;
}
