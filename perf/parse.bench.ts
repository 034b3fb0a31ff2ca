import { parseDiff } from '../src/DiffParser';
import { generatePerfDiff } from './utils';

/**
 * Performance benchmark: parse and re-render a large synthetic diff.
 */
// Increase timeout for performance benchmarks
jest.setTimeout(60000);
test('performance benchmark for parsing', () => {
  const { diffText, hunks } = generatePerfDiff();
  // Warm-up: verify the diff parses and round-trips
  const warm = parseDiff(diffText);
  expect(warm.deltas.reduce((n, d) => n + d.hunks.length, 0)).toBe(hunks);
  expect(warm.toString()).toBe(diffText);
  // Measure performance
  const hrStart = process.hrtime();
  const cpuStart = process.cpuUsage();
  parseDiff(diffText);
  const hrDiff = process.hrtime(hrStart);
  const cpuDiff = process.cpuUsage(cpuStart);
  const elapsed = hrDiff[0] + hrDiff[1] / 1e9;
  const userMs = cpuDiff.user / 1000;
  const sysMs = cpuDiff.system / 1000;
  console.log(
    `Parsed ${hunks} hunks (${diffText.length} chars) in ${elapsed.toFixed(3)}s; ` +
    `CPU user ${userMs.toFixed(1)}ms sys ${sysMs.toFixed(1)}ms`
  );
});
