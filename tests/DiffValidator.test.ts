import * as fs from 'fs';
import * as path from 'path';
import { parseDiff } from '../src/DiffParser';
import { validateDiff } from '../src/DiffValidator';

const FILE_HEADER = 'diff --git a/f.txt b/f.txt\nindex 1..2 100644\n--- a/f.txt\n+++ b/f.txt\n';

describe('validateDiff', () => {
  it('finds no problems in a well-formed diff', () => {
    const text = fs.readFileSync(path.join(__dirname, 'fixtures', 'two-deltas.patch'), 'utf-8');
    const report = jest.fn();
    expect(validateDiff(parseDiff(text), report)).toBe(0);
    expect(report).not.toHaveBeenCalled();
  });

  it('reports hunks out of order', () => {
    const diff = parseDiff(FILE_HEADER + '@@ -10,1 +10,1 @@\n-a\n+b\n@@ -2,1 +2,1 @@\n-c\n+d\n');
    const messages: string[] = [];
    expect(validateDiff(diff, msg => messages.push(msg))).toBe(1);
    expect(messages).toEqual(["[hunkwise] f.txt hunk 2 -> old start 2 precedes previous hunk's 10"]);
  });

  it('reports a body with more lines than declared', () => {
    const diff = parseDiff(FILE_HEADER + '@@ -1,1 +1,1 @@\n-a\n+b\n+c\n');
    const messages: string[] = [];
    expect(validateDiff(diff, msg => messages.push(msg))).toBe(1);
    expect(messages).toEqual(['[hunkwise] f.txt hunk 1 -> declares 1 new lines but body has 2']);
  });

  it('stops counting at a patch signature', () => {
    const diff = parseDiff(FILE_HEADER + '@@ -1 +1 @@\n-a\n+b\n-- \n2.43.0\n');
    expect(validateDiff(diff, () => undefined)).toBe(0);
  });

  it('counts a removed line that reads like a signature separator', () => {
    const diff = parseDiff(FILE_HEADER + '@@ -1,2 +1,1 @@\n-- \n keep\n');
    const report = jest.fn();
    expect(validateDiff(diff, report)).toBe(0);
    expect(report).not.toHaveBeenCalled();
  });

  it('does not count a blank line after the declared lines', () => {
    const second = 'diff --git a/g.txt b/g.txt\n--- a/g.txt\n+++ b/g.txt\n@@ -1 +1 @@\n-a\n+b\n';
    const diff = parseDiff(FILE_HEADER + '@@ -1 +1 @@\n-a\n+b\n\n' + second);
    expect(diff.deltas[0].hunks[0].content).toBe('-a\n+b\n\n');
    const report = jest.fn();
    expect(validateDiff(diff, report)).toBe(0);
    expect(report).not.toHaveBeenCalled();
  });

  it('counts an empty line inside the declared lines as context', () => {
    const diff = parseDiff(FILE_HEADER + '@@ -1,3 +1,3 @@\n a\n\n b\n');
    expect(validateDiff(diff, () => undefined)).toBe(0);
  });
});
