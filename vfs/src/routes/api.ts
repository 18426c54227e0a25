import type { FastifyInstance } from 'fastify';
import { InvalidPathError } from '../errors.js';
import type { RemoteEntry, RemoteFs } from '../fs/remote-fs.js';
import type { ByteRange } from '../debrid/base.js';
import { lastSegment } from '../utils/path.js';

export interface ApiRoutesOptions {
  fs: RemoteFs;
}

interface PathQuery {
  Querystring: { path?: string };
}

interface MoveBody {
  Body: { from?: string; to?: string };
}

function toEntry(entry: RemoteEntry) {
  if (entry.type === 'dir') {
    return { type: 'dir', name: lastSegment(entry.remote), path: entry.remote, id: entry.id };
  }
  return {
    type: 'file',
    name: lastSegment(entry.remote),
    path: entry.remote,
    id: entry.id(),
    size: entry.size,
    mimeType: entry.mimeType(),
    modTime: entry.modTime.toISOString(),
    url: entry.url,
  };
}

function required(value: string | undefined, field: string): string {
  if (value === undefined || value.trim() === '') {
    throw new InvalidPathError('missing parameter', field);
  }
  return value;
}

/**
 * Parse a single "bytes=start-end" range, null for anything else
 */
export function parseRange(header: string | undefined): ByteRange | null {
  const match = header ? /^bytes=(\d+)-(\d*)$/.exec(header.trim()) : null;
  if (!match) {
    return null;
  }
  const start = parseInt(match[1], 10);
  const end = match[2] ? parseInt(match[2], 10) : undefined;
  if (end !== undefined && end < start) {
    return null;
  }
  return { start, end };
}

export async function apiRoutes(app: FastifyInstance, options: ApiRoutesOptions): Promise<void> {
  const { fs } = options;

  // List a directory
  app.get<PathQuery>('/api/list', async request => {
    const entries = await fs.list(request.query.path ?? '');
    return { entries: entries.map(toEntry) };
  });

  // Stat a file
  app.get<PathQuery>('/api/stat', async request => {
    const object = await fs.newObject(required(request.query.path, 'path'));
    return toEntry(object);
  });

  // Stream a file, forwarding a byte range
  app.get<PathQuery>('/api/download', async (request, reply) => {
    const object = await fs.newObject(required(request.query.path, 'path'));
    const range = parseRange(request.headers.range);
    const stream = await object.open({ range: range ?? undefined });

    reply.header('Content-Type', object.mimeType());
    reply.header('Accept-Ranges', 'bytes');
    if (range) {
      const end = range.end ?? object.size - 1;
      reply.status(206);
      reply.header('Content-Range', `bytes ${range.start}-${end}/${object.size}`);
    }
    return reply.send(stream);
  });

  // Direct link of a file
  app.get<PathQuery>('/api/link', async request => {
    const url = await fs.publicLink(required(request.query.path, 'path'));
    return { url };
  });

  // Move or rename a file
  app.post<MoveBody>('/api/move', async request => {
    const from = required(request.body?.from, 'from');
    const to = required(request.body?.to, 'to');
    const object = await fs.newObject(from);
    const moved = await fs.move(object, to);
    return toEntry(moved);
  });

  // Move or rename a directory
  app.post<MoveBody>('/api/dirmove', async request => {
    await fs.dirMove(required(request.body?.from, 'from'), required(request.body?.to, 'to'));
    return { success: true };
  });

  app.post<{ Body: { path?: string } }>('/api/mkdir', async request => {
    await fs.mkdir(required(request.body?.path, 'path'));
    return { success: true };
  });

  // Logical delete of a file
  app.delete<PathQuery>('/api/file', async request => {
    const object = await fs.newObject(required(request.query.path, 'path'));
    await object.remove();
    return { success: true };
  });

  app.delete<{ Querystring: { path?: string; purge?: string } }>('/api/dir', async request => {
    const path = required(request.query.path, 'path');
    if (request.query.purge === 'true') {
      await fs.purge(path);
    } else {
      await fs.rmdir(path);
    }
    return { success: true };
  });

  // Drop cached state and rebuild from the remote
  app.post('/api/refresh', async () => {
    fs.engine.invalidate();
    fs.engine.invalidateRules();
    await fs.engine.rebuild();
    fs.dirCacheFlush();
    return { success: true };
  });
}
