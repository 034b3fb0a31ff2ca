// file: src/index.ts
export { parseDiff, walkDiffs } from './DiffParser';
export { matchDiffs } from './DiffGrammar';
export type { Rule, SyntaxNode } from './DiffGrammar';
export { Diff, Delta, Hunk } from './DiffModel';
export type { DiffInit, DeltaInit, HunkInit } from './DiffModel';
export { DiffSyntaxError, InvariantViolation, invariant } from './DiffErrors';
export { decodePath } from './DiffPaths';
export { validateDiff } from './DiffValidator';
