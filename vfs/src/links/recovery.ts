import type { DebridService } from '../debrid/base.js';
import { ApiError, errorMessage } from '../errors.js';
import type { InventoryFetcher } from '../inventory/fetcher.js';
import type { RemoteTorrent, TorrentInfo } from '../types/namespace.js';
import { sleep } from '../utils/retry.js';

export interface RecoveryOptions {
  pollAttempts: number;
  pollDelay: number; // ms
}

/**
 * Torrent states that need a re-download
 */
export function needsRecovery(torrent: RemoteTorrent, broken: ReadonlySet<string>): boolean {
  return torrent.status === 'dead' || torrent.status === 'error' || broken.has(torrent.id);
}

/**
 * Re-creates dead torrents from their hash, keeping the same file selection
 */
export class JobRecovery {
  private readonly inFlight = new Map<string, Promise<RemoteTorrent>>();
  // old torrent id -> torrent already re-added for it
  private readonly pending = new Map<string, string>();
  private readonly selection = new Map<string, number[]>();

  constructor(
    private readonly service: DebridService,
    private readonly fetcher: InventoryFetcher,
    private readonly broken: Set<string>,
    private readonly options: RecoveryOptions,
  ) {}

  /**
   * Recover `torrent`; concurrent calls for the same id share one run
   */
  recover(torrent: RemoteTorrent, signal?: AbortSignal): Promise<RemoteTorrent> {
    const running = this.inFlight.get(torrent.id);
    if (running) {
      return running;
    }
    const run = this.run(torrent, signal).finally(() => {
      this.inFlight.delete(torrent.id);
    });
    this.inFlight.set(torrent.id, run);
    return run;
  }

  /**
   * Same as recover, but keeps the original torrent when recovery fails
   */
  async recoverOrKeep(torrent: RemoteTorrent, signal?: AbortSignal): Promise<RemoteTorrent> {
    try {
      return await this.recover(torrent, signal);
    } catch (error) {
      signal?.throwIfAborted();
      console.error(`[Recovery] Failed to recover ${torrent.name} (${torrent.id}): ${errorMessage(error)}`);
      return torrent;
    }
  }

  /**
   * Replacement torrent added by an earlier, unfinished recovery of `id`
   */
  pendingFor(id: string): string | undefined {
    return this.pending.get(id);
  }

  private async run(torrent: RemoteTorrent, signal?: AbortSignal): Promise<RemoteTorrent> {
    const resumed = this.pending.get(torrent.id);
    const newId = resumed ?? (await this.submit(torrent, signal));

    if (resumed) {
      console.log(`[Recovery] Resuming ${torrent.name} (${torrent.id}) with ${resumed}`);
      await this.selectIfWaiting(torrent, resumed, signal);
    } else {
      await this.waitForFileSelection(newId, signal);
      await this.service.selectFiles(newId, this.selection.get(torrent.id) ?? [], signal);
    }
    await this.service.deleteTorrent(torrent.id, signal);
    this.pending.delete(torrent.id);
    this.selection.delete(torrent.id);

    const next = await this.service.getTorrentInfo(newId, signal);
    const recovered: RemoteTorrent = {
      id: next.id,
      name: next.name,
      hash: next.hash,
      status: 'downloaded',
      links: next.links,
      bytes: next.bytes,
      added: next.added,
      ended: next.ended,
    };

    this.broken.delete(torrent.id);
    this.fetcher.invalidate();
    console.log(`[Recovery] ${torrent.name} recovered as ${newId}`);
    return recovered;
  }

  /**
   * Drop the cached links of the old torrent and add its magnet again. The
   * new id is kept until the recovery completes, so a later attempt resumes
   * instead of adding a duplicate.
   */
  private async submit(torrent: RemoteTorrent, signal?: AbortSignal): Promise<string> {
    console.log(`[Recovery] Re-downloading ${torrent.name} (${torrent.id})`);

    const info = await this.service.getTorrentInfo(torrent.id, signal);
    this.selection.set(
      torrent.id,
      info.files.filter(file => file.selected).map(file => file.id),
    );

    // Cached direct links of the old torrent die with it
    const stale = info.links
      .map(link => this.fetcher.downloadFor(link))
      .filter((download): download is NonNullable<typeof download> => download !== undefined);
    for (const download of stale) {
      await this.service.deleteDownload(download.id, signal);
    }
    this.fetcher.forget(stale.map(download => download.link));

    const newId = await this.service.addMagnet(info.hash, signal);
    this.pending.set(torrent.id, newId);
    return newId;
  }

  private async selectIfWaiting(torrent: RemoteTorrent, newId: string, signal?: AbortSignal): Promise<void> {
    let info: TorrentInfo;
    try {
      info = await this.service.getTorrentInfo(newId, signal);
    } catch (error) {
      if (error instanceof ApiError && error.status === 404) {
        // Removed meanwhile; the next attempt adds the magnet again
        this.pending.delete(torrent.id);
      }
      throw error;
    }
    if (info.status === 'waiting_files_selection') {
      await this.service.selectFiles(newId, this.selection.get(torrent.id) ?? [], signal);
    }
  }

  private async waitForFileSelection(id: string, signal?: AbortSignal): Promise<void> {
    for (let attempt = 0; attempt <= this.options.pollAttempts; attempt++) {
      const info = await this.service.getTorrentInfo(id, signal);
      if (info.status === 'waiting_files_selection') {
        return;
      }
      if (attempt < this.options.pollAttempts) {
        await sleep(this.options.pollDelay, signal);
      }
    }
    console.warn(`[Recovery] ${id} did not reach waiting_files_selection, selecting files anyway`);
  }
}
