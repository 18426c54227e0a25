import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ApiError } from '../errors.js';
import { FakeDebrid, link } from '../testing/fake-debrid.js';
import { InventoryFetcher } from './fetcher.js';

describe('InventoryFetcher', () => {
  let service: FakeDebrid;
  let clock: number;
  let fetcher: InventoryFetcher;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    service = new FakeDebrid();
    service.addTorrent({ id: 'a', name: 'A', files: ['A1'] });
    service.addTorrent({ id: 'b', name: 'B', files: ['B1'] });
    service.addTorrent({ id: 'c', name: 'C', files: ['C1'] });
    service.addDownload('A1', 'a.mkv');
    clock = 0;
    fetcher = new InventoryFetcher(service, { interval: 60_000, pageSize: 2, now: () => clock });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('probes the count then pages through both lists', async () => {
    const snapshot = await fetcher.refresh();

    expect(service.calls).toEqual([
      'listTorrents:0:1',
      'listTorrents:0:2',
      'listTorrents:2:2',
      'listDownloads:0:1',
      'listDownloads:0:2',
    ]);
    expect(snapshot.changed).toBe(true);
    expect(snapshot.torrents.map(torrent => torrent.id)).toEqual(['a', 'b', 'c']);
    expect(fetcher.downloadFor(link('A1'))?.filename).toBe('a.mkv');
    expect(fetcher.isStale()).toBe(false);
  });

  it('reuses the cache while the count is unchanged', async () => {
    await fetcher.refresh();
    service.calls.length = 0;
    clock = 30_000;

    const snapshot = await fetcher.refresh();

    expect(service.calls).toEqual(['listTorrents:0:1', 'listDownloads:0:1']);
    expect(snapshot.changed).toBe(false);
    expect(snapshot.torrents).toHaveLength(3);
  });

  it('refetches a list whose count moved', async () => {
    await fetcher.refresh();
    service.addTorrent({ id: 'd', name: 'D', files: ['D1'] });
    service.calls.length = 0;

    const snapshot = await fetcher.refresh();

    expect(service.calls).toEqual([
      'listTorrents:0:1',
      'listTorrents:0:2',
      'listTorrents:2:2',
      'listDownloads:0:1',
    ]);
    expect(snapshot.changed).toBe(true);
    expect(snapshot.torrents.map(torrent => torrent.id)).toEqual(['a', 'b', 'c', 'd']);
  });

  it('refetches everything once the interval elapsed or after invalidate', async () => {
    await fetcher.refresh();
    clock = 60_000;
    expect(fetcher.isStale()).toBe(true);
    expect((await fetcher.refresh()).changed).toBe(true);

    fetcher.invalidate();
    expect(fetcher.isStale()).toBe(true);
    expect((await fetcher.refresh()).changed).toBe(true);
    expect(fetcher.isStale()).toBe(false);
  });

  it('keeps the previous lists when a refresh fails', async () => {
    await fetcher.refresh();
    service.addTorrent({ id: 'd', name: 'D', files: ['D1'] });
    vi.spyOn(service, 'listDownloads').mockRejectedValueOnce(new ApiError('bad_token (401)', 401));

    await expect(fetcher.refresh(true)).rejects.toThrow('bad_token (401)');
    expect(fetcher.cachedTorrents.map(torrent => torrent.id)).toEqual(['a', 'b', 'c']);
  });

  it('stops paging on an empty page', async () => {
    vi.spyOn(service, 'listTorrents').mockResolvedValue({ items: [], total: 10 });

    const snapshot = await fetcher.refresh();

    expect(snapshot.torrents).toEqual([]);
    expect(service.listTorrents).toHaveBeenCalledTimes(2);
  });

  it('remembers and forgets resolved links', async () => {
    await fetcher.refresh();
    const resolved = await service.unrestrictLink(link('B1'));

    fetcher.remember(resolved);
    expect(fetcher.downloadFor(link('B1'))).toBe(resolved);
    expect(fetcher.cachedDownloads.map(download => download.link)).toEqual([link('B1'), link('A1')]);

    fetcher.forget([link('A1'), link('B1')]);
    expect(fetcher.downloadFor(link('A1'))).toBeUndefined();
    expect(fetcher.cachedDownloads).toEqual([]);
  });

  it('replaces and drops cached torrents', async () => {
    await fetcher.refresh();
    const [first] = fetcher.cachedTorrents;

    fetcher.replaceTorrent('a', { ...first, id: 'a2' });
    fetcher.replaceTorrent('b', null);

    expect(fetcher.cachedTorrents.map(torrent => torrent.id)).toEqual(['a2', 'c']);
  });
});
