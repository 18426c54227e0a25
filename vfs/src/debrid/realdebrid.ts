import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import type { Readable } from 'stream';
import { ApiError } from '../errors.js';
import { REJECTED_STATUS_CODES, RETRY_STATUS_CODES, withRetry } from '../utils/retry.js';
import type { DebridService, OpenOptions } from './base.js';
import type {
  Page,
  PageRequest,
  RemoteDownload,
  RemoteTorrent,
  TorrentInfo,
} from '../types/namespace.js';
import type {
  RealDebridAddMagnet,
  RealDebridDownload,
  RealDebridTorrent,
  RealDebridTorrentInfo,
  RealDebridUnrestrictLink,
  RealDebridUser,
} from '../types/realdebrid.js';

export const REALDEBRID_API_BASE = 'https://api.real-debrid.com/rest/1.0';

export interface RealDebridOptions {
  apiKey: string;
  apiUrl?: string;
  timeout?: number; // ms
  retry?: {
    attempts: number;
    delay: number; // ms
  };
  adapter?: AxiosRequestConfig['adapter'];
}

function parseTime(value: string | undefined): number | null {
  if (!value) {
    return null;
  }
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : time;
}

function toRemoteTorrent(torrent: RealDebridTorrent): RemoteTorrent {
  return {
    id: torrent.id,
    name: torrent.filename,
    hash: torrent.hash,
    status: torrent.status,
    links: torrent.links ?? [],
    bytes: torrent.bytes ?? 0,
    added: parseTime(torrent.added) ?? 0,
    ended: parseTime(torrent.ended),
  };
}

function toRemoteDownload(download: RealDebridUnrestrictLink & { generated?: string }): RemoteDownload {
  return {
    id: download.id,
    filename: download.filename,
    mimeType: download.mimeType ?? 'application/octet-stream',
    size: download.filesize ?? 0,
    link: download.link,
    download: download.download,
    generated: parseTime(download.generated),
  };
}

/**
 * Converts an axios failure carrying an HTTP answer into an ApiError.
 * Network failures and cancellations are passed through.
 */
export function toApiError(error: unknown): unknown {
  if (!axios.isAxiosError(error) || !error.response) {
    return error;
  }
  const { status, statusText, data } = error.response;
  if (typeof data === 'object' && data !== null && 'error' in data && typeof data.error === 'string') {
    const code = 'error_code' in data && typeof data.error_code === 'number' ? data.error_code : undefined;
    return new ApiError(`${data.error} (${status})`, status, code);
  }
  return new ApiError(`${statusText || 'HTTP error'} (${status})`, status);
}

function form(fields: Record<string, string>): FormData {
  const body = new FormData();
  for (const [key, value] of Object.entries(fields)) {
    body.append(key, value);
  }
  return body;
}

/**
 * Real-Debrid REST client
 * Documentation: https://api.real-debrid.com/
 */
export class RealDebridClient implements DebridService {
  readonly name = 'Real-Debrid';
  private readonly http: AxiosInstance;

  constructor(private readonly options: RealDebridOptions) {
    this.http = axios.create({
      baseURL: options.apiUrl ?? REALDEBRID_API_BASE,
      timeout: options.timeout ?? 30000,
      adapter: options.adapter,
    });
  }

  isConfigured(): boolean {
    return !!this.options.apiKey;
  }

  async testConnection(): Promise<boolean> {
    if (!this.options.apiKey) {
      console.log('[Real-Debrid] No API key configured');
      return false;
    }

    try {
      console.log('[Real-Debrid] Testing connection...');
      const response = await this.call<RealDebridUser>({ method: 'GET', url: '/user' });
      console.log(`[Real-Debrid] Connected as ${response.data.username}, premium: ${response.data.premium > 0}`);
      return true;
    } catch (error) {
      if (error instanceof ApiError && error.status === 401) {
        console.error('[Real-Debrid] Invalid API key');
      } else {
        console.error('[Real-Debrid] Connection test failed:', error instanceof Error ? error.message : error);
      }
      return false;
    }
  }

  async listDownloads(page: PageRequest, signal?: AbortSignal): Promise<Page<RemoteDownload>> {
    const response = await this.call<RealDebridDownload[] | ''>(
      { method: 'GET', url: '/downloads', params: { offset: page.offset, limit: page.limit } },
      signal,
    );
    const items = Array.isArray(response.data) ? response.data.map(toRemoteDownload) : [];
    return { items, total: this.totalCount(response, page.offset + items.length) };
  }

  async listTorrents(page: PageRequest, signal?: AbortSignal): Promise<Page<RemoteTorrent>> {
    const response = await this.call<RealDebridTorrent[] | ''>(
      { method: 'GET', url: '/torrents', params: { offset: page.offset, limit: page.limit } },
      signal,
    );
    const items = Array.isArray(response.data) ? response.data.map(toRemoteTorrent) : [];
    return { items, total: this.totalCount(response, page.offset + items.length) };
  }

  async getTorrentInfo(id: string, signal?: AbortSignal): Promise<TorrentInfo> {
    const response = await this.call<RealDebridTorrentInfo>(
      { method: 'GET', url: `/torrents/info/${id}` },
      signal,
    );
    return {
      ...toRemoteTorrent(response.data),
      files: (response.data.files ?? []).map(file => ({
        id: file.id,
        path: file.path,
        bytes: file.bytes,
        selected: file.selected === 1,
      })),
    };
  }

  async addMagnet(hash: string, signal?: AbortSignal): Promise<string> {
    const response = await this.call<RealDebridAddMagnet>(
      { method: 'POST', url: '/torrents/addMagnet', data: form({ magnet: `magnet:?xt=urn:btih:${hash}` }) },
      signal,
      false,
    );
    return response.data.id;
  }

  async selectFiles(id: string, fileIds: number[], signal?: AbortSignal): Promise<void> {
    await this.call<unknown>(
      { method: 'POST', url: `/torrents/selectFiles/${id}`, data: form({ files: fileIds.join(',') }) },
      signal,
      false,
    );
  }

  async deleteTorrent(id: string, signal?: AbortSignal): Promise<void> {
    await this.call<unknown>({ method: 'DELETE', url: `/torrents/delete/${id}` }, signal);
  }

  async deleteDownload(id: string, signal?: AbortSignal): Promise<void> {
    await this.call<unknown>({ method: 'DELETE', url: `/downloads/delete/${id}` }, signal);
  }

  async unrestrictLink(link: string, signal?: AbortSignal): Promise<RemoteDownload> {
    const response = await this.call<RealDebridUnrestrictLink>(
      { method: 'POST', url: '/unrestrict/link', data: form({ link }) },
      signal,
    );
    return toRemoteDownload(response.data);
  }

  async openStream(url: string, options: OpenOptions = {}): Promise<Readable> {
    const headers: Record<string, string> = {};
    if (options.range) {
      headers.Range = `bytes=${options.range.start}-${options.range.end ?? ''}`;
    }
    // Direct links carry their own authorization
    const response = await this.send<Readable>(
      { method: 'GET', url, headers, responseType: 'stream', timeout: 0 },
      options.signal,
    );
    return response.data;
  }

  private totalCount(response: AxiosResponse, fallback: number): number {
    const header = response.headers['x-total-count'];
    const total = parseInt(String(header ?? ''), 10);
    return Number.isNaN(total) ? fallback : total;
  }

  /**
   * Authenticated API call. Calls that create remote state pass
   * `replayable: false` and are only retried when the remote rejected them
   * outright.
   */
  private call<T>(config: AxiosRequestConfig, signal?: AbortSignal, replayable = true): Promise<AxiosResponse<T>> {
    return this.send<T>(
      { ...config, params: { ...config.params, auth_token: this.options.apiKey } },
      signal,
      replayable,
    );
  }

  private send<T>(config: AxiosRequestConfig, signal?: AbortSignal, replayable = true): Promise<AxiosResponse<T>> {
    const retry = this.options.retry ?? { attempts: 5, delay: 2000 };
    return withRetry(
      async () => {
        try {
          return await this.http.request<T>({ ...config, signal });
        } catch (error) {
          throw toApiError(error);
        }
      },
      {
        ...retry,
        signal,
        label: `${config.method ?? 'GET'} ${config.url ?? ''}`,
        statuses: replayable ? RETRY_STATUS_CODES : REJECTED_STATUS_CODES,
      },
    );
  }
}
