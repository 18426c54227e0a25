import type { Readable } from 'stream';
import type { DebridService, OpenOptions } from '../debrid/base.js';
import { BrokenLinkError, isBrokenLinkStatus } from '../errors.js';
import type { InventoryFetcher } from '../inventory/fetcher.js';
import type { FileNode, RemoteDownload } from '../types/namespace.js';

/**
 * Turns the restricted links of files into direct links, and notices
 * torrents whose links went dead.
 */
export class LinkResolver {
  constructor(
    private readonly service: DebridService,
    private readonly fetcher: InventoryFetcher,
    private readonly broken: Set<string>,
  ) {}

  /**
   * Direct link for `file`. Returns null when the torrent turned out to be
   * broken; it is then recovered on the next rebuild.
   */
  async resolve(file: FileNode, signal?: AbortSignal): Promise<RemoteDownload | null> {
    const cached = this.fetcher.downloadFor(file.originalLink);
    if (cached) {
      return cached;
    }

    try {
      const download = await this.service.unrestrictLink(file.originalLink, signal);
      this.fetcher.remember(download);
      return download;
    } catch (error) {
      if (!isBrokenLinkStatus(error)) {
        throw error;
      }
      if (this.broken.has(file.torrentId)) {
        throw new BrokenLinkError(`torrent ${file.torrentId} is still broken: ${error.message}`, file.torrentId, {
          cause: error,
        });
      }
      console.warn(`[Namespace] Link of ${file.name} is broken (${error.status}), torrent ${file.torrentId} queued for recovery`);
      this.markBroken(file.torrentId);
      return null;
    }
  }

  async open(file: FileNode, options: OpenOptions = {}): Promise<Readable> {
    let url = file.url;
    if (!url) {
      const download = await this.resolve(file, options.signal);
      if (!download) {
        throw new BrokenLinkError('link seems broken - job will be re-downloaded', file.torrentId);
      }
      url = download.download;
    }

    try {
      return await this.service.openStream(url, options);
    } catch (error) {
      if (!isBrokenLinkStatus(error) || this.broken.has(file.torrentId)) {
        throw error;
      }
      this.markBroken(file.torrentId);
      throw new BrokenLinkError('link seems broken - job will be re-downloaded', file.torrentId, { cause: error });
    }
  }

  private markBroken(torrentId: string): void {
    this.broken.add(torrentId);
    this.fetcher.invalidate();
  }
}
