import type { DebridService } from '../debrid/base.js';
import type { Page, PageRequest, RemoteDownload, RemoteTorrent } from '../types/namespace.js';

export interface FetcherOptions {
  interval: number; // ms
  pageSize: number;
  now?: () => number;
}

export interface InventorySnapshot {
  torrents: RemoteTorrent[];
  downloads: RemoteDownload[];
  changed: boolean;
}

type Lister<T> = (page: PageRequest, signal?: AbortSignal) => Promise<Page<T>>;

interface Listing<T> {
  items: T[];
  changed: boolean;
}

/**
 * Pulls the torrent and download lists, reusing the cached lists when the
 * remote count did not move within the refresh interval.
 */
export class InventoryFetcher {
  private torrents: RemoteTorrent[] = [];
  private downloads: RemoteDownload[] = [];
  private byLink = new Map<string, RemoteDownload>();
  private lastCheck: number | null = null;
  private invalidated = false;
  private readonly now: () => number;

  constructor(
    private readonly service: DebridService,
    private readonly options: FetcherOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  isStale(): boolean {
    return this.invalidated || this.lastCheck === null || this.now() - this.lastCheck >= this.options.interval;
  }

  invalidate(): void {
    this.invalidated = true;
  }

  get cachedTorrents(): RemoteTorrent[] {
    return this.torrents;
  }

  get cachedDownloads(): RemoteDownload[] {
    return this.downloads;
  }

  /**
   * Downloads keyed by the original (restricted) link
   */
  get downloadIndex(): ReadonlyMap<string, RemoteDownload> {
    return this.byLink;
  }

  downloadFor(link: string): RemoteDownload | undefined {
    return this.byLink.get(link);
  }

  remember(download: RemoteDownload): void {
    this.byLink.set(download.link, download);
    this.downloads = [download, ...this.downloads.filter(item => item.link !== download.link)];
  }

  forget(links: Iterable<string>): void {
    const dropped = new Set(links);
    for (const link of dropped) {
      this.byLink.delete(link);
    }
    this.downloads = this.downloads.filter(item => !dropped.has(item.link));
  }

  /**
   * Replace a torrent of the cached list, or drop it when `next` is null
   */
  replaceTorrent(id: string, next: RemoteTorrent | null): void {
    this.torrents = this.torrents.flatMap(torrent => {
      if (torrent.id !== id) {
        return [torrent];
      }
      return next ? [next] : [];
    });
  }

  async refresh(force = false, signal?: AbortSignal): Promise<InventorySnapshot> {
    const reuse = !force && !this.isStale();
    const startedAt = this.now();

    const torrents = await this.fetchAll(
      (page, s) => this.service.listTorrents(page, s),
      this.torrents,
      reuse,
      signal,
    );
    const downloads = await this.fetchAll(
      (page, s) => this.service.listDownloads(page, s),
      this.downloads,
      reuse,
      signal,
    );

    this.torrents = torrents.items;
    this.downloads = downloads.items;
    this.byLink = new Map(downloads.items.map(download => [download.link, download]));
    this.lastCheck = startedAt;
    this.invalidated = false;

    const changed = torrents.changed || downloads.changed;
    if (changed) {
      console.log(`[Inventory] Fetched ${this.torrents.length} torrents, ${this.downloads.length} downloads`);
    }
    return { torrents: this.torrents, downloads: this.downloads, changed };
  }

  private async fetchAll<T>(
    list: Lister<T>,
    cached: T[],
    reuse: boolean,
    signal?: AbortSignal,
  ): Promise<Listing<T>> {
    const probe = await list({ offset: 0, limit: 1 }, signal);
    if (reuse && probe.total === cached.length) {
      return { items: cached, changed: false };
    }

    const items: T[] = [];
    while (items.length < probe.total) {
      const page = await list({ offset: items.length, limit: this.options.pageSize }, signal);
      if (page.items.length === 0) {
        break;
      }
      items.push(...page.items);
    }
    return { items, changed: true };
  }
}
