// file: src/DiffModel.ts
import { decodePath } from './DiffPaths';

/**
 * Fields of a hunk as read from the diff text.
 */
export interface HunkInit {
  /** Verbatim header block of the owning delta. */
  fileHeader: string;
  /** Old path text from the owning delta's header. */
  oldFile: string;
  /** New path text from the owning delta's header. */
  newFile: string;
  oldStart: number;
  oldLines: number;
  newStart: number;
  newLines: number;
  /** Verbatim text after the closing `@@`, without the line break. */
  headerSuffix: string;
  /** Verbatim hunk body, markers and line breaks included. */
  content: string;
  /** The old range was written without a line count (`-5` rather than `-5,1`). */
  oldLinesOmitted?: boolean;
  /** The new range was written without a line count. */
  newLinesOmitted?: boolean;
}

function formatRange(start: number, lines: number, omitted: boolean): string {
  return omitted && lines === 1 ? `${start}` : `${start},${lines}`;
}

/**
 * One contiguous changed region of a file. Carries a copy of its delta's header so it can
 * be rendered as a patch on its own.
 */
export class Hunk {
  readonly fileHeader: string;
  readonly oldFile: string;
  readonly newFile: string;
  readonly oldStart: number;
  readonly oldLines: number;
  readonly newStart: number;
  readonly newLines: number;
  readonly headerSuffix: string;
  readonly content: string;
  readonly oldLinesOmitted: boolean;
  readonly newLinesOmitted: boolean;

  constructor(init: HunkInit) {
    this.fileHeader = init.fileHeader;
    this.oldFile = init.oldFile;
    this.newFile = init.newFile;
    this.oldStart = init.oldStart;
    this.oldLines = init.oldLines;
    this.newStart = init.newStart;
    this.newLines = init.newLines;
    this.headerSuffix = init.headerSuffix;
    this.content = init.content;
    this.oldLinesOmitted = init.oldLinesOmitted ?? false;
    this.newLinesOmitted = init.newLinesOmitted ?? false;
    Object.freeze(this);
  }

  /** Canonical range header, always with both counts and without the suffix. */
  displayHeader(): string {
    return `@@ -${this.oldStart},${this.oldLines} +${this.newStart},${this.newLines} @@`;
  }

  /** Range header as it was written, followed by the header suffix. */
  header(): string {
    const oldRange = formatRange(this.oldStart, this.oldLines, this.oldLinesOmitted);
    const newRange = formatRange(this.newStart, this.newLines, this.newLinesOmitted);
    return `@@ -${oldRange} +${newRange} @@${this.headerSuffix}`;
  }

  /** Standalone patch containing only this hunk. */
  formatPatch(): string {
    return `${this.fileHeader}${this}`;
  }

  toString(): string {
    return `${this.header()}\n${this.content}`;
  }
}

/**
 * Fields of a file delta.
 */
export interface DeltaInit {
  fileHeader: string;
  oldFile: string;
  newFile: string;
  hunks: readonly Hunk[];
}

/**
 * The complete change description for one file.
 */
export class Delta {
  /** Verbatim header block: `diff --git` line, metadata lines and file markers. */
  readonly fileHeader: string;
  /** Old path text as written in the header (e.g. `a/src/x.ts` or `/dev/null`). */
  readonly oldFile: string;
  /** New path text as written in the header. */
  readonly newFile: string;
  readonly hunks: readonly Hunk[];

  constructor(init: DeltaInit) {
    this.fileHeader = init.fileHeader;
    this.oldFile = init.oldFile;
    this.newFile = init.newFile;
    this.hunks = Object.freeze([...init.hunks]);
    Object.freeze(this);
  }

  /** Decoded old path, or undefined when the file was created. */
  get oldPath(): string | undefined {
    return decodePath(this.oldFile);
  }

  /** Decoded new path, or undefined when the file was deleted. */
  get newPath(): string | undefined {
    return decodePath(this.newFile);
  }

  toString(): string {
    return this.fileHeader + this.hunks.join('');
  }
}

/**
 * Fields of a parsed diff.
 */
export interface DiffInit {
  commit?: string;
  deltas: readonly Delta[];
}

/**
 * Result of parsing unified-diff text.
 */
export class Diff {
  /** Leading commit line without its line break, if the input had one. */
  readonly commit?: string;
  readonly deltas: readonly Delta[];

  constructor(init: DiffInit) {
    this.commit = init.commit;
    this.deltas = Object.freeze([...init.deltas]);
    Object.freeze(this);
  }

  /** Diff body: every delta in order, without the commit line. */
  toString(): string {
    return this.deltas.join('');
  }

  /**
   * Commit line (when present) followed by the diff body. The commit line is always ended
   * with `\n`; a `\r` it carried in the input is not restored.
   */
  format(): string {
    return this.commit === undefined ? this.toString() : `${this.commit}\n${this}`;
  }
}
