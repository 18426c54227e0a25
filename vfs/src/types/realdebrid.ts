// Wire formats of https://api.real-debrid.com/rest/1.0

export type RealDebridTorrentStatus =
  | 'magnet_error'
  | 'magnet_conversion'
  | 'waiting_files_selection'
  | 'queued'
  | 'downloading'
  | 'downloaded'
  | 'error'
  | 'virus'
  | 'compressing'
  | 'uploading'
  | 'dead';

export interface RealDebridTorrent {
  id: string;
  filename: string;
  hash: string;
  bytes: number;
  host: string;
  split: number;
  progress: number;
  status: RealDebridTorrentStatus;
  added: string;
  links: string[];
  ended?: string;
}

export interface RealDebridTorrentFile {
  id: number;
  path: string;
  bytes: number;
  selected: 0 | 1;
}

export interface RealDebridTorrentInfo extends RealDebridTorrent {
  original_filename: string;
  original_bytes: number;
  files: RealDebridTorrentFile[];
}

export interface RealDebridDownload {
  id: string;
  filename: string;
  mimeType: string;
  filesize: number;
  link: string; // original (restricted) link
  host: string;
  chunks: number;
  download: string; // direct link
  generated: string;
}

export type RealDebridUnrestrictLink = Omit<RealDebridDownload, 'generated'> & {
  streamable?: number;
};

export interface RealDebridAddMagnet {
  id: string;
  uri: string;
}

export interface RealDebridUser {
  id: number;
  username: string;
  email: string;
  premium: number; // seconds of premium left
  type: string;
  expiration: string;
}
