// Utility to generate a large synthetic unified diff for parser benchmarks

// Extensions cycled through the generated file names
const langs = [
  'ts', 'js', 'py', 'bzl', 'java', 'c', 'cpp', 'go', 'rs', 'rb', 'php', 'swift', 'kt', 'scala', 'sh'
];

/**
 * Generates diff text with many file deltas, each holding several hunks of context,
 * removed and added lines.
 * @param options.totalFiles Number of file deltas (defaults to 2000).
 * @param options.hunksPerFile Hunks per delta (defaults to 5).
 * @returns The diff text and the number of hunks it holds.
 */
export function generatePerfDiff(
  options?: { totalFiles?: number; hunksPerFile?: number }
): { diffText: string; hunks: number } {
  const totalFiles = options?.totalFiles ?? 2000;
  const hunksPerFile = options?.hunksPerFile ?? 5;
  const lines: string[] = [];
  for (let i = 0; i < totalFiles; i++) {
    const name = `src/module${i}/file${i}.${langs[i % langs.length]}`;
    lines.push(
      `diff --git a/${name} b/${name}`,
      `index ${(i + 1).toString(16).padStart(7, '0')}..${(i + 2).toString(16).padStart(7, '0')} 100644`,
      `--- a/${name}`,
      `+++ b/${name}`
    );
    for (let h = 0; h < hunksPerFile; h++) {
      // each hunk: 3 context, 2 removed, 3 added, 3 context
      const start = h * 40 + 1;
      lines.push(`@@ -${start},8 +${start + h},9 @@ function block${h}()`);
      for (let c = 0; c < 3; c++) lines.push(` context ${h}.${c}`);
      lines.push(`-removed ${h}.0`, `-removed ${h}.1`);
      lines.push(`+added ${h}.0`, `+@@ -1 +1 @@ added ${h}.1`, `+added ${h}.2`);
      for (let c = 3; c < 6; c++) lines.push(` context ${h}.${c}`);
    }
  }
  lines.push('');
  return { diffText: lines.join('\n'), hunks: totalFiles * hunksPerFile };
}
