import { matchDiffs, SyntaxNode } from '../src/DiffGrammar';
import { DiffSyntaxError } from '../src/DiffErrors';

const rules = (node: SyntaxNode): string[] => node.children.map(child => child.rule);

describe('matchDiffs', () => {
  const text = [
    'abc1234',
    'diff --git a/f.txt b/f.txt',
    'index 1..2 100644',
    '--- a/f.txt',
    '+++ b/f.txt',
    '@@ -1,2 +1 @@ fn main()',
    ' keep',
    '-drop',
    ''
  ].join('\n');
  const root = matchDiffs(text);
  const slice = (node: SyntaxNode): string => text.slice(node.start, node.end);

  it('produces the commit and diff nodes in order', () => {
    expect(root.rule).toBe('diffs');
    expect(rules(root)).toEqual(['commit', 'diff']);
    expect(slice(root.children[0])).toBe('abc1234');
  });

  it('splits a diff into its header and hunks', () => {
    const diff = root.children[1];
    expect(rules(diff)).toEqual(['diff_header', 'hunk']);
    const header = diff.children[0];
    expect(rules(header)).toEqual(['header_extra', 'old_file', 'new_file']);
    expect(header.children.map(slice)).toEqual(['index 1..2 100644\n', 'a/f.txt', 'b/f.txt']);
  });

  it('splits a hunk into ranges, context and body', () => {
    const hunk = root.children[1].children[1];
    expect(rules(hunk)).toEqual(['old_range', 'new_range', 'context', 'hunk_body']);
    const [oldRange, newRange, context, body] = hunk.children;
    expect(rules(oldRange)).toEqual(['start', 'lines']);
    expect(oldRange.children.map(slice)).toEqual(['1', '2']);
    expect(rules(newRange)).toEqual(['start']);
    expect(slice(context)).toBe(' fn main()');
    expect(slice(body)).toBe(' keep\n-drop\n');
  });

  it('throws a syntax error for a range without a start line', () => {
    expect(() => matchDiffs('diff --git a/f b/f\n--- a/f\n+++ b/f\n@@ -,1 +1 @@\n'))
      .toThrow(DiffSyntaxError);
    expect(() => matchDiffs('diff --git a/f b/f\n--- a/f\n+++ b/f\n@@ -,1 +1 @@\n'))
      .toThrow('Invalid diff at line 4, column 5: expected range start line');
  });

  it('throws a syntax error for text between a header and the next diff', () => {
    expect(() => matchDiffs('diff --git a/f b/f\n--- a/f\n+++ b/f\nstray\n'))
      .toThrow("expected '@@' hunk header or 'diff --git' header");
  });

  it('requires a line break after the hunk header', () => {
    expect(() => matchDiffs('diff --git a/f b/f\n--- a/f\n+++ b/f\n@@ -0,0 +0,0 @@'))
      .toThrow('expected line break after hunk header');
  });
});
