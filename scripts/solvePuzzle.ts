/**
 * Solve a puzzle described by a YAML spec and compare the search strategies.
 *
 * Usage:
 *     npm run solve -- __tests__/fixtures/catToDog.yaml [bfs|dfs ...]
 *
 * Solver names given on the command line override the spec's `solvers` list.
 * Prints the solution trace of every solver followed by its search statistics.
 */

/* eslint-disable no-console -- CLI script output. */

import type { PuzzleSpec } from '../src/puzzleSpec.ts';
import type { PuzzleState } from '../src/PuzzleState.ts';
import type { SolverComparison } from '../src/search/compareSolvers.ts';

import { MalformedInputError } from '../src/MalformedInputError.ts';
import { loadPuzzleSpec } from '../src/puzzleSpec.ts';
import { renderSolution } from '../src/renderSolution.ts';
import { compareSolvers } from '../src/search/compareSolvers.ts';
import { createSolver } from '../src/search/createDefaultSolvers.ts';
import { getMoveCount } from '../src/search/Solver.ts';

const FIRST_CLI_ARG_INDEX = 2;
const ELAPSED_DIGITS = 1;

function main(): void {
  const [specPath, ...solverArgs] = process.argv.slice(FIRST_CLI_ARG_INDEX);
  if (specPath === undefined) {
    console.error('Usage: npm run solve -- <spec.yaml> [bfs|dfs ...]');
    process.exit(1);
  }

  try {
    const spec = loadPuzzleSpec(specPath);
    const solverNames = solverArgs.length > 0 ? solverArgs : spec.solvers;
    solve(spec, solverNames);
  } catch (error: unknown) {
    if (error instanceof MalformedInputError) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

function printComparison<S extends PuzzleState<S>>(comparison: SolverComparison<S>): void {
  const { elapsedMs, outcome, solver } = comparison;
  const { statistics } = outcome;
  console.log(`== ${solver.toUpperCase()} (${elapsedMs.toFixed(ELAPSED_DIGITS)} ms)`);
  console.log(renderSolution(outcome.path));
  console.log(
    `moves: ${String(getMoveCount(outcome) ?? '-')}, expanded: ${String(statistics.expanded)}, `
      + `generated: ${String(statistics.generated)}, duplicates: ${String(statistics.duplicates)}, `
      + `pruned: ${String(statistics.pruned)}, peak nodes held: ${String(statistics.peakRetained)}`
  );
  console.log('');
}

function solve(spec: PuzzleSpec, solverNames: readonly string[]): void {
  console.log(`# ${spec.title}`);
  console.log(String(spec.puzzle));
  console.log('');
  const solvers = solverNames.map(createSolver);
  for (const comparison of compareSolvers(spec.puzzle, solvers)) {
    printComparison(comparison);
  }
}

main();

/* eslint-enable no-console -- End CLI script output. */
