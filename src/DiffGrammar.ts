// file: src/DiffGrammar.ts
// Line-oriented grammar for unified diffs; produces a syntax tree of spans into the input
import { DiffSyntaxError } from './DiffErrors';

/**
 * Node kinds produced by the grammar.
 *
 * ```
 * diffs       = commit? diff* EOI
 * diff        = diff_header hunk*
 * diff_header = "diff --git " line header_extra* ("--- " old_file NL "+++ " new_file NL)?
 * hunk        = "@@ -" old_range " +" new_range " @@" context NL hunk_body
 * old_range   = start ("," lines)?
 * ```
 */
export type Rule =
  | 'diffs'
  | 'commit'
  | 'diff'
  | 'diff_header'
  | 'header_extra'
  | 'old_file'
  | 'new_file'
  | 'hunk'
  | 'old_range'
  | 'new_range'
  | 'start'
  | 'lines'
  | 'context'
  | 'hunk_body';

/**
 * A recognized region of the input. `start` and `end` are offsets into the matched text.
 */
export interface SyntaxNode {
  rule: Rule;
  start: number;
  end: number;
  children: SyntaxNode[];
}

/** One physical line: `textEnd` stops before the `\n`, `end` after it. */
interface Line {
  start: number;
  textEnd: number;
  end: number;
}

const DIFF_GIT = 'diff --git ';
const OLD_MARKER = '--- ';
const NEW_MARKER = '+++ ';
const HUNK_OPEN = '@@';

function node(rule: Rule, start: number, end: number, children: SyntaxNode[] = []): SyntaxNode {
  return { rule, start, end, children };
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

/**
 * Matches unified-diff text against the grammar.
 * @param input - Complete diff text.
 * @returns The root `diffs` node.
 * @throws DiffSyntaxError at the first position that does not match.
 */
export function matchDiffs(input: string): SyntaxNode {
  return new DiffMatcher(input).diffs();
}

class DiffMatcher {
  private pos = 0;

  constructor(private readonly input: string) {}

  diffs(): SyntaxNode {
    const children: SyntaxNode[] = [];
    const first = this.peekLine();
    if (first && !this.startsWith(first, DIFF_GIT)) {
      children.push(node('commit', first.start, this.trimCr(first)));
      this.pos = first.end;
    }
    for (let line = this.peekLine(); line; line = this.peekLine()) {
      if (!this.startsWith(line, DIFF_GIT)) {
        this.fail(line.start, "'diff --git' header");
      }
      children.push(this.diff());
    }
    return node('diffs', 0, this.input.length, children);
  }

  private diff(): SyntaxNode {
    const start = this.pos;
    const { header, hasMarkers } = this.diffHeader();
    const children = [header];
    let line = this.peekLine();
    while (line && this.startsWith(line, HUNK_OPEN)) {
      if (!hasMarkers) {
        this.fail(line.start, "'--- ' and '+++ ' file markers before the first hunk");
      }
      children.push(this.hunk());
      line = this.peekLine();
    }
    if (line && !this.startsWith(line, DIFF_GIT)) {
      this.fail(line.start, "'@@' hunk header or 'diff --git' header");
    }
    return node('diff', start, this.pos, children);
  }

  private diffHeader(): { header: SyntaxNode; hasMarkers: boolean } {
    const start = this.pos;
    const gitLine = this.takeLine();
    const children: SyntaxNode[] = [];
    let line = this.peekLine();
    while (line && !this.isStructural(line) && !this.startsWith(line, OLD_MARKER)) {
      children.push(node('header_extra', line.start, line.end));
      this.pos = line.end;
      line = this.peekLine();
    }
    if (!line || !this.startsWith(line, OLD_MARKER)) {
      // git writes no marker lines for empty, mode-only and binary changes
      children.unshift(...this.gitLinePaths(gitLine));
      return { header: node('diff_header', start, this.pos, children), hasMarkers: false };
    }
    const oldMarker = this.takeLine();
    const newMarker = this.peekLine();
    if (!newMarker || !this.startsWith(newMarker, NEW_MARKER)) {
      this.fail(newMarker ? newMarker.start : this.pos, "'+++ ' new-file marker");
    }
    this.pos = newMarker.end;
    children.push(
      node('old_file', oldMarker.start + OLD_MARKER.length, this.trimCr(oldMarker)),
      node('new_file', newMarker.start + NEW_MARKER.length, this.trimCr(newMarker))
    );
    return { header: node('diff_header', start, this.pos, children), hasMarkers: true };
  }

  /**
   * Splits the two paths of a `diff --git` line: quoted tokens first, then the
   * symmetric `a/X b/X` form, then the last ` b/`, then the last space.
   */
  private gitLinePaths(line: Line): SyntaxNode[] {
    const base = line.start + DIFF_GIT.length;
    const rest = this.input.slice(base, this.trimCr(line));
    let split = -1;
    if (rest.startsWith('"')) {
      let i = 1;
      while (i < rest.length && rest[i] !== '"') {
        i += rest[i] === '\\' ? 2 : 1;
      }
      split = i + 1;
    } else if (rest.endsWith('"')) {
      split = rest.lastIndexOf(' "');
    } else {
      const mid = (rest.length - 1) / 2;
      if (Number.isInteger(mid) && rest[mid] === ' ' && rest.slice(2, mid) === rest.slice(mid + 3)) {
        split = mid;
      } else {
        split = rest.lastIndexOf(' b/');
        if (split === -1) split = rest.lastIndexOf(' ');
      }
    }
    if (split <= 0 || split >= rest.length - 1 || rest[split] !== ' ') {
      this.fail(base, 'two paths on the diff --git line');
    }
    return [
      node('old_file', base, base + split),
      node('new_file', base + split + 1, base + rest.length),
    ];
  }

  private hunk(): SyntaxNode {
    const start = this.pos;
    const line = this.takeLine();
    let p = this.expect(line.start, '@@ -', "'@@ -'");
    const oldRange = this.range('old_range', p);
    p = this.expect(oldRange.node.end, ' +', "' +' before the new range");
    const newRange = this.range('new_range', p);
    p = this.expect(newRange.node.end, ' @@', "closing ' @@'");
    if (line.end === line.textEnd) {
      this.fail(line.textEnd, 'line break after hunk header');
    }
    const context = node('context', p, line.textEnd);
    const body = this.hunkBody(oldRange.count, newRange.count);
    return node('hunk', start, this.pos, [oldRange.node, newRange.node, context, body]);
  }

  private range(rule: 'old_range' | 'new_range', p: number): { node: SyntaxNode; count: number } {
    const start = this.digits('start', p);
    if (this.input[start.end] !== ',') {
      return { node: node(rule, p, start.end, [start]), count: 1 };
    }
    const lines = this.digits('lines', start.end + 1);
    const count = Number(this.input.slice(lines.start, lines.end));
    return { node: node(rule, p, lines.end, [start, lines]), count };
  }

  private digits(rule: 'start' | 'lines', p: number): SyntaxNode {
    let end = p;
    while (isDigit(this.input[end])) end++;
    const what = rule === 'start' ? 'range start line' : 'range line count';
    if (end === p) {
      this.fail(p, what);
    }
    // leading zeros would not render back
    if (end - p > 1 && this.input[p] === '0') {
      this.fail(p, `${what} without leading zeros`);
    }
    return node(rule, p, end);
  }

  /**
   * Consumes the hunk body. The declared counts bound the marked lines; after them come
   * `\` annotations and any unmarked trailing text up to the next structural line.
   */
  private hunkBody(oldCount: number, newCount: number): SyntaxNode {
    const start = this.pos;
    let oldLeft = oldCount;
    let newLeft = newCount;
    while (oldLeft > 0 || newLeft > 0) {
      const line = this.peekLine();
      const marker = line ? this.input[line.start] : undefined;
      if (!line || (line.textEnd > line.start && marker !== '\r' && !this.isMarker(marker))) {
        this.fail(line ? line.start : this.pos, `${oldLeft} more old and ${newLeft} more new hunk lines`);
      }
      if (marker === '-') {
        oldLeft--;
      } else if (marker === '+') {
        newLeft--;
      } else if (marker !== '\\') {
        oldLeft--;
        newLeft--;
      }
      this.pos = line.end;
    }
    let line = this.peekLine();
    while (line && this.input[line.start] === '\\') {
      this.pos = line.end;
      line = this.peekLine();
    }
    while (line && !this.isStructural(line)) {
      this.pos = line.end;
      line = this.peekLine();
    }
    return node('hunk_body', start, this.pos);
  }

  private isMarker(ch: string | undefined): boolean {
    return ch === ' ' || ch === '-' || ch === '+' || ch === '\\';
  }

  private isStructural(line: Line): boolean {
    return this.startsWith(line, DIFF_GIT) || this.startsWith(line, HUNK_OPEN);
  }

  private peekLine(): Line | undefined {
    if (this.pos >= this.input.length) return undefined;
    const nl = this.input.indexOf('\n', this.pos);
    if (nl === -1) {
      return { start: this.pos, textEnd: this.input.length, end: this.input.length };
    }
    return { start: this.pos, textEnd: nl, end: nl + 1 };
  }

  private takeLine(): Line {
    const line = this.peekLine();
    if (!line) {
      this.fail(this.pos, 'another line');
    }
    this.pos = line.end;
    return line;
  }

  private startsWith(line: Line, prefix: string): boolean {
    return this.input.startsWith(prefix, line.start);
  }

  /** Offset of the line's end, excluding a `\r` before the line break. */
  private trimCr(line: Line): number {
    return line.textEnd > line.start && this.input[line.textEnd - 1] === '\r' ? line.textEnd - 1 : line.textEnd;
  }

  private expect(p: number, literal: string, expected: string): number {
    if (!this.input.startsWith(literal, p)) {
      this.fail(p, expected);
    }
    return p + literal.length;
  }

  private fail(offset: number, expected: string): never {
    throw new DiffSyntaxError(this.input, offset, expected);
  }
}
