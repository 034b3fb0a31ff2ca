// file: src/DiffValidator.ts
import { Diff, Hunk } from './DiffModel';

/**
 * Counts the old-side and new-side lines in a hunk body. Lines are counted the way the
 * grammar bounds the body until both declared counts are met; after that only marked
 * lines count, up to an empty line, a `-- ` signature separator or unmarked text.
 */
function countBodyLines(hunk: Hunk): { oldLines: number; newLines: number } {
  const lines = hunk.content.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  let oldLines = 0;
  let newLines = 0;
  let index = 0;
  for (; index < lines.length && (oldLines < hunk.oldLines || newLines < hunk.newLines); index++) {
    const line = lines[index];
    const marker = line.charAt(0);
    if (marker === '-') {
      oldLines++;
    } else if (marker === '+') {
      newLines++;
    } else if (marker === ' ' || marker === '' || marker === '\r') {
      oldLines++;
      newLines++;
    } else if (marker !== '\\') {
      return { oldLines, newLines };
    }
  }
  for (const line of lines.slice(index)) {
    if (line === '-- ' || line === '-- \r') break;
    const marker = line.charAt(0);
    if (marker === '-') {
      oldLines++;
    } else if (marker === '+') {
      newLines++;
    } else if (marker === ' ') {
      oldLines++;
      newLines++;
    } else if (marker !== '\\') {
      break;
    }
  }
  return { oldLines, newLines };
}

/**
 * Checks unified-diff conventions the parser stores but does not enforce: hunks ordered
 * by old start line, and declared line counts matching the hunk bodies.
 * @param diff Parsed diff to check.
 * @param report Function to call for each problem found.
 * @returns Number of problems found.
 */
export function validateDiff(diff: Diff, report: (msg: string) => void): number {
  let errors = 0;
  for (const delta of diff.deltas) {
    const file = delta.newPath ?? delta.oldPath ?? delta.newFile;
    let previousStart: number | undefined;
    delta.hunks.forEach((hunk, index) => {
      const where = `[hunkwise] ${file} hunk ${index + 1}`;
      if (previousStart !== undefined && hunk.oldStart < previousStart) {
        report(`${where} -> old start ${hunk.oldStart} precedes previous hunk's ${previousStart}`);
        errors++;
      }
      previousStart = hunk.oldStart;
      const counted = countBodyLines(hunk);
      if (counted.oldLines !== hunk.oldLines) {
        report(`${where} -> declares ${hunk.oldLines} old lines but body has ${counted.oldLines}`);
        errors++;
      }
      if (counted.newLines !== hunk.newLines) {
        report(`${where} -> declares ${hunk.newLines} new lines but body has ${counted.newLines}`);
        errors++;
      }
    });
  }
  return errors;
}
