import { MOVE_SEPARATOR, parseLine } from '../rules/parser.js';
import { replacePrefix, type DirPath } from '../utils/path.js';

export function moveLine(key: string, destination: string): string {
  return `${key}${MOVE_SEPARATOR}${destination}`;
}

/**
 * Point `key` at `destination`. The first line governing the key is
 * replaced, later duplicates are dropped, and a line is appended when none
 * exists, so exactly one line governs the key afterwards.
 */
export function rewriteKey(lines: readonly string[], key: string, destination: string): string[] {
  const result: string[] = [];
  let written = false;

  for (const line of lines) {
    const directive = parseLine(line);
    const governs = (directive.kind === 'move' || directive.kind === 'folder') && directive.key === key;
    if (!governs) {
      result.push(line);
      continue;
    }
    if (!written) {
      result.push(moveLine(key, destination));
      written = true;
    }
  }

  if (!written) {
    result.push(moveLine(key, destination));
  }
  return result;
}

/**
 * Move everything below `from` to below `to`.
 *
 * `affected` holds every mapping key whose current value lies below `from`,
 * with that value. Keys without a line of their own get one appended.
 */
export function rewriteDirMove(
  lines: readonly string[],
  from: DirPath,
  to: DirPath,
  affected: ReadonlyMap<string, string>,
): string[] {
  const covered = new Set<string>();

  const result = lines.map(line => {
    const directive = parseLine(line);
    if (directive.kind === 'move' && (affected.has(directive.key) || directive.value.startsWith(from))) {
      covered.add(directive.key);
      return moveLine(directive.key, replacePrefix(directive.value, from, to));
    }
    if (directive.kind === 'folder' && directive.value.startsWith(from)) {
      covered.add(directive.key);
      return replacePrefix(directive.value, from, to);
    }
    return line;
  });

  for (const [key, value] of affected) {
    if (!covered.has(key)) {
      result.push(moveLine(key, replacePrefix(value, from, to)));
    }
  }
  return result;
}

/**
 * Drop every move line of one torrent: its own "/name/" key and all file
 * keys below it
 */
export function stripTorrentLines(lines: readonly string[], prefix: string): string[] {
  return lines.filter(line => {
    const directive = parseLine(line);
    return !(directive.kind === 'move' && directive.key.startsWith(prefix));
  });
}

/**
 * Drop the bare lines declaring `dir`
 */
export function stripFolderLines(lines: readonly string[], dir: DirPath): string[] {
  return lines.filter(line => {
    const directive = parseLine(line);
    return !(directive.kind === 'folder' && directive.value === dir);
  });
}
