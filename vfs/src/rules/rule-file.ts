import * as fs from 'fs';
import * as path from 'path';
import { RuleFileError, errorMessage } from '../errors.js';
import { joinLines, splitLines } from './parser.js';
import { DEFAULT_SORT_FILE } from './template.js';

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * The sort file on disk. Callers hold the engine's rule lock around every
 * method; this class only does the I/O.
 */
export class RuleFile {
  constructor(readonly filePath: string) {}

  /**
   * Read the file, writing the default template first when it is missing
   */
  async read(): Promise<string> {
    try {
      return await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (!isMissing(error)) {
        throw this.fail('read', error);
      }
    }

    console.warn(`[RuleFile] No sort file found, creating ${this.filePath}`);
    await this.write(DEFAULT_SORT_FILE);
    return DEFAULT_SORT_FILE;
  }

  /**
   * Modification time in ms, null when the file does not exist
   */
  async mtime(): Promise<number | null> {
    try {
      const stats = await fs.promises.stat(this.filePath);
      return stats.mtimeMs;
    } catch (error) {
      if (isMissing(error)) {
        return null;
      }
      throw this.fail('stat', error);
    }
  }

  async append(line: string): Promise<void> {
    const current = await this.read();
    const separator = current.length > 0 && !current.endsWith('\n') ? '\n' : '';
    try {
      await fs.promises.appendFile(this.filePath, `${separator}${line}\n`, 'utf-8');
    } catch (error) {
      throw this.fail('append to', error);
    }
  }

  /**
   * Replace the whole content. The new content is complete before the file
   * is truncated.
   */
  async write(content: string): Promise<void> {
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(this.filePath, content, 'utf-8');
    } catch (error) {
      throw this.fail('write', error);
    }
  }

  /**
   * Read all lines, transform them in memory, write them back at once.
   * Returns the new content.
   */
  async rewrite(transform: (lines: string[]) => string[]): Promise<string> {
    const lines = splitLines(await this.read());
    const content = joinLines(transform(lines));
    await this.write(content);
    return content;
  }

  private fail(action: string, error: unknown): RuleFileError {
    const message = `Failed to ${action} sort file ${this.filePath}: ${errorMessage(error)}`;
    console.error(`[RuleFile] ${message}`);
    return new RuleFileError(message, this.filePath, { cause: error });
  }
}
