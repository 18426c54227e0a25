import type { InvalidRegexMode } from '../config.js';
import { RuleFileError, errorMessage } from '../errors.js';
import type { RegexRule } from '../types/namespace.js';
import { normalizeDir, type DirPath } from '../utils/path.js';

export const MOVE_SEPARATOR = ' -> ';
export const REGEX_SEPARATOR = ' == ';

export type RuleDirective =
  | { kind: 'comment' }
  | { kind: 'blank' }
  | { kind: 'move'; key: string; value: string }
  | { kind: 'regex'; folder: string; source: string }
  | { kind: 'folder'; key: string; value: DirPath };

export interface RuleWarning {
  line: number; // 1-based
  text: string;
  reason: string;
}

export interface ParsedRules {
  regexRules: RegexRule[];
  mappings: Map<string, string>;
  warnings: RuleWarning[];
}

export interface ParseOptions {
  invalidRegex?: InvalidRegexMode;
  filePath?: string;
}

const INLINE_FLAGS = /^\(\?([a-zA-Z]+)\)/;
const SUPPORTED_FLAGS = 'ims';

export function splitLines(content: string): string[] {
  const lines = content.split('\n').map(line => line.replace(/\r$/, ''));
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export function joinLines(lines: string[]): string {
  return lines.length === 0 ? '' : `${lines.join('\n')}\n`;
}

/**
 * Classifies one line of the sort file.
 * Move lines win over regex lines when a line holds both separators.
 */
export function parseLine(raw: string): RuleDirective {
  const line = raw.replace(/\r$/, '');
  if (line.startsWith('#')) {
    return { kind: 'comment' };
  }
  if (line.trim().length === 0) {
    return { kind: 'blank' };
  }

  const moveIndex = line.indexOf(MOVE_SEPARATOR);
  if (moveIndex !== -1) {
    return {
      kind: 'move',
      key: line.slice(0, moveIndex),
      value: line.slice(moveIndex + MOVE_SEPARATOR.length),
    };
  }

  const regexIndex = line.indexOf(REGEX_SEPARATOR);
  if (regexIndex !== -1) {
    return {
      kind: 'regex',
      folder: line.slice(0, regexIndex),
      source: line.slice(regexIndex + REGEX_SEPARATOR.length),
    };
  }

  return { kind: 'folder', key: line, value: normalizeDir(line) };
}

/**
 * Compiles a rule pattern. A leading inline flag group like "(?i)" is
 * turned into RegExp flags.
 */
export function compilePattern(source: string): RegExp {
  const match = INLINE_FLAGS.exec(source);
  if (!match) {
    return new RegExp(source);
  }

  const flags = [...new Set(match[1])];
  const unsupported = flags.filter(flag => !SUPPORTED_FLAGS.includes(flag));
  if (unsupported.length > 0) {
    throw new SyntaxError(`unsupported inline flag(s) "${unsupported.join('')}"`);
  }
  return new RegExp(source.slice(match[0].length), flags.join(''));
}

export function parseRules(content: string, options: ParseOptions = {}): ParsedRules {
  const mode = options.invalidRegex ?? 'skip';
  const result: ParsedRules = {
    regexRules: [],
    mappings: new Map(),
    warnings: [],
  };

  splitLines(content).forEach((text, index) => {
    const directive = parseLine(text);

    switch (directive.kind) {
      case 'comment':
      case 'blank':
        return;
      case 'move':
        result.mappings.set(directive.key, directive.value);
        return;
      case 'folder':
        result.mappings.set(directive.key, directive.value);
        return;
      case 'regex': {
        try {
          result.regexRules.push({
            pattern: compilePattern(directive.source),
            folder: normalizeDir(directive.folder),
          });
        } catch (error) {
          const warning: RuleWarning = { line: index + 1, text, reason: errorMessage(error) };
          if (mode === 'fail') {
            throw new RuleFileError(
              `invalid regex on line ${warning.line}: ${warning.reason}`,
              options.filePath ?? '',
              { cause: error },
            );
          }
          result.warnings.push(warning);
        }
        return;
      }
    }
  });

  return result;
}

/**
 * Folder of the first matching regex rule, "/default/" otherwise
 */
export function defaultLocation(name: string, rules: readonly RegexRule[]): DirPath {
  for (const rule of rules) {
    if (rule.pattern.test(name)) {
      return rule.folder;
    }
  }
  return normalizeDir('/default');
}
