// file: src/DiffParser.ts
// Walks the grammar's syntax tree and builds the Diff/Delta/Hunk model
import { matchDiffs, SyntaxNode } from './DiffGrammar';
import { invariant, InvariantViolation } from './DiffErrors';
import { Delta, Diff, Hunk } from './DiffModel';

/** Header fields every hunk of a delta shares. */
interface FileHeader {
  fileHeader: string;
  oldFile: string;
  newFile: string;
}

interface Range {
  start: number;
  lines: number;
  omitted: boolean;
}

/**
 * Parses unified-diff text into a Diff.
 * @param diffText - Complete diff text, optionally preceded by a single commit line.
 * @returns The parsed diff; `diff.toString()` reproduces the input after the commit line.
 * @throws DiffSyntaxError when the text does not match the unified-diff grammar.
 * @throws InvariantViolation when the grammar and this walker disagree.
 */
export function parseDiff(diffText: string): Diff {
  return walkDiffs(diffText, matchDiffs(diffText));
}

/**
 * Builds a Diff from a `diffs` syntax tree matched against `text`.
 */
export function walkDiffs(text: string, root: SyntaxNode): Diff {
  invariant(root.rule === 'diffs', `Expected a diffs node at the root, got ${root.rule}`);
  let commit: string | undefined;
  const deltas: Delta[] = [];
  for (const child of root.children) {
    switch (child.rule) {
      case 'commit':
        commit = spanText(text, child);
        break;
      case 'diff':
        deltas.push(walkDiff(text, child));
        break;
      default:
        throw unexpected(child, root);
    }
  }
  return new Diff({ commit, deltas });
}

function walkDiff(text: string, diff: SyntaxNode): Delta {
  let header: FileHeader | undefined;
  const hunks: Hunk[] = [];
  for (const child of diff.children) {
    switch (child.rule) {
      case 'diff_header':
        header = walkDiffHeader(text, child);
        break;
      case 'hunk':
        invariant(header, 'hunk node precedes its diff_header');
        hunks.push(walkHunk(text, child, header));
        break;
      default:
        throw unexpected(child, diff);
    }
  }
  invariant(header, 'diff node has no diff_header');
  return new Delta({ ...header, hunks });
}

function walkDiffHeader(text: string, header: SyntaxNode): FileHeader {
  let oldFile: string | undefined;
  let newFile: string | undefined;
  for (const child of header.children) {
    switch (child.rule) {
      case 'old_file':
        oldFile = spanText(text, child);
        break;
      case 'new_file':
        newFile = spanText(text, child);
        break;
      case 'header_extra':
        // kept verbatim in fileHeader
        break;
      default:
        throw unexpected(child, header);
    }
  }
  invariant(oldFile !== undefined, 'diff_header node has no old_file');
  invariant(newFile !== undefined, 'diff_header node has no new_file');
  return { fileHeader: spanText(text, header), oldFile, newFile };
}

function walkHunk(text: string, hunk: SyntaxNode, header: FileHeader): Hunk {
  let oldRange: Range | undefined;
  let newRange: Range | undefined;
  let headerSuffix: string | undefined;
  let content: string | undefined;
  for (const child of hunk.children) {
    switch (child.rule) {
      case 'old_range':
        oldRange = walkRange(text, child);
        break;
      case 'new_range':
        newRange = walkRange(text, child);
        break;
      case 'context':
        headerSuffix = spanText(text, child);
        break;
      case 'hunk_body':
        content = spanText(text, child);
        break;
      default:
        throw unexpected(child, hunk);
    }
  }
  invariant(oldRange, 'hunk node has no old_range');
  invariant(newRange, 'hunk node has no new_range');
  invariant(headerSuffix !== undefined, 'hunk node has no context');
  invariant(content !== undefined, 'hunk node has no hunk_body');
  return new Hunk({
    ...header,
    oldStart: oldRange.start,
    oldLines: oldRange.lines,
    oldLinesOmitted: oldRange.omitted,
    newStart: newRange.start,
    newLines: newRange.lines,
    newLinesOmitted: newRange.omitted,
    headerSuffix,
    content,
  });
}

function walkRange(text: string, range: SyntaxNode): Range {
  let start: number | undefined;
  let lines: number | undefined;
  for (const child of range.children) {
    switch (child.rule) {
      case 'start':
        start = parseCount(text, child);
        break;
      case 'lines':
        lines = parseCount(text, child);
        break;
      default:
        throw unexpected(child, range);
    }
  }
  invariant(start !== undefined, `${range.rule} node has no start`);
  // an omitted count means a single line
  return lines === undefined ? { start, lines: 1, omitted: true } : { start, lines, omitted: false };
}

function parseCount(text: string, field: SyntaxNode): number {
  const digits = spanText(text, field);
  const value = Number(digits);
  invariant(
    /^[0-9]+$/.test(digits) && Number.isSafeInteger(value),
    `Error parsing range ${field.rule}: '${digits}' is not an unsigned integer`
  );
  return value;
}

function spanText(text: string, field: SyntaxNode): string {
  return text.slice(field.start, field.end);
}

function unexpected(child: SyntaxNode, parent: SyntaxNode): InvariantViolation {
  return new InvariantViolation(`No rule for ${child.rule} node under ${parent.rule}`);
}
