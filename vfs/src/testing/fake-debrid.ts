import { Readable } from 'stream';
import type { DebridService, OpenOptions } from '../debrid/base.js';
import { ApiError } from '../errors.js';
import type {
  Page,
  PageRequest,
  RemoteDownload,
  RemoteTorrent,
  TorrentInfo,
  TorrentStatus,
} from '../types/namespace.js';
import { lastSegment } from '../utils/path.js';

export function link(id: string): string {
  return `https://fake.test/d/${id}`;
}

export interface TorrentSeed {
  id: string;
  name: string;
  hash?: string;
  status?: TorrentStatus;
  files: string[]; // leaf ids
}

function strip(info: TorrentInfo): RemoteTorrent {
  const { files: _files, ...torrent } = info;
  return torrent;
}

/**
 * In-memory Real-Debrid account
 */
export class FakeDebrid implements DebridService {
  readonly name = 'Fake';
  readonly torrents: TorrentInfo[] = [];
  downloads: RemoteDownload[] = [];
  readonly calls: string[] = [];
  readonly unrestrictErrors = new Map<string, ApiError>();
  readonly streamErrors = new Map<string, ApiError>();
  readonly filenames = new Map<string, string>(); // leaf id -> filename
  newTorrentStatus: TorrentStatus = 'waiting_files_selection';
  private counter = 0;

  addTorrent(seed: TorrentSeed): TorrentInfo {
    const info: TorrentInfo = {
      id: seed.id,
      name: seed.name,
      hash: seed.hash ?? `hash-${seed.id}`,
      status: seed.status ?? 'downloaded',
      links: seed.files.map(link),
      bytes: seed.files.length * 100,
      added: 1_000,
      ended: 2_000,
      files: seed.files.map((leaf, index) => ({
        id: index + 1,
        path: `/${seed.name}/${leaf}.mkv`,
        bytes: 100,
        selected: true,
      })),
    };
    this.torrents.push(info);
    return info;
  }

  addDownload(leaf: string, filename: string): RemoteDownload {
    const download: RemoteDownload = {
      id: `DL-${leaf}`,
      filename,
      mimeType: 'video/x-matroska',
      size: 100,
      link: link(leaf),
      download: `https://cdn.fake.test/${leaf}/${filename}`,
      generated: 3_000,
    };
    this.downloads.push(download);
    return download;
  }

  isConfigured(): boolean {
    return true;
  }

  async testConnection(): Promise<boolean> {
    return true;
  }

  async listDownloads(page: PageRequest): Promise<Page<RemoteDownload>> {
    this.calls.push(`listDownloads:${page.offset}:${page.limit}`);
    return {
      items: this.downloads.slice(page.offset, page.offset + page.limit),
      total: this.downloads.length,
    };
  }

  async listTorrents(page: PageRequest): Promise<Page<RemoteTorrent>> {
    this.calls.push(`listTorrents:${page.offset}:${page.limit}`);
    return {
      items: this.torrents.slice(page.offset, page.offset + page.limit).map(strip),
      total: this.torrents.length,
    };
  }

  async getTorrentInfo(id: string): Promise<TorrentInfo> {
    this.calls.push(`getTorrentInfo:${id}`);
    const info = this.torrents.find(torrent => torrent.id === id);
    if (!info) {
      throw new ApiError('unknown_ressource (404)', 404, 7);
    }
    return { ...info, links: [...info.links], files: info.files.map(file => ({ ...file })) };
  }

  async addMagnet(hash: string): Promise<string> {
    this.calls.push(`addMagnet:${hash}`);
    const source = this.torrents.find(torrent => torrent.hash === hash);
    const id = `NEW${++this.counter}`;
    this.torrents.push({
      id,
      name: source?.name ?? hash,
      hash,
      status: this.newTorrentStatus,
      links: [],
      bytes: source?.bytes ?? 0,
      added: 5_000,
      ended: null,
      files: (source?.files ?? []).map(file => ({ ...file, selected: false })),
    });
    return id;
  }

  async selectFiles(id: string, fileIds: number[]): Promise<void> {
    this.calls.push(`selectFiles:${id}:${fileIds.join(',')}`);
    const info = this.torrents.find(torrent => torrent.id === id);
    if (!info) {
      throw new ApiError('unknown_ressource (404)', 404, 7);
    }
    info.files = info.files.map(file => ({ ...file, selected: fileIds.includes(file.id) }));
    info.links = fileIds.map(fileId => link(`${id}-${fileId}`));
    info.status = 'downloaded';
  }

  async deleteTorrent(id: string): Promise<void> {
    this.calls.push(`deleteTorrent:${id}`);
    const index = this.torrents.findIndex(torrent => torrent.id === id);
    if (index !== -1) {
      this.torrents.splice(index, 1);
    }
  }

  async deleteDownload(id: string): Promise<void> {
    this.calls.push(`deleteDownload:${id}`);
    this.downloads = this.downloads.filter(download => download.id !== id);
  }

  async unrestrictLink(target: string): Promise<RemoteDownload> {
    this.calls.push(`unrestrictLink:${target}`);
    const error = this.unrestrictErrors.get(target);
    if (error) {
      throw error;
    }
    const leaf = lastSegment(target);
    const filename = this.filenames.get(leaf) ?? `${leaf}.mkv`;
    return {
      id: `DL-${leaf}`,
      filename,
      mimeType: 'video/x-matroska',
      size: 100,
      link: target,
      download: `https://cdn.fake.test/${leaf}/${filename}`,
      generated: 4_000,
    };
  }

  async openStream(url: string, options: OpenOptions = {}): Promise<Readable> {
    this.calls.push(`openStream:${url}`);
    const error = this.streamErrors.get(url);
    if (error) {
      throw error;
    }
    const range = options.range ? `${options.range.start}-${options.range.end ?? ''}` : 'all';
    return Readable.from([`${url}|${range}`]);
  }
}
