/**
 * Test Batcher
 *
 * Splits the ordered catalog into contiguous batches of at most `maxSize`
 * tests. A run of same-named tests is never split across two batches: when a
 * boundary would land inside such a run, the run is pushed to the next batch.
 */

import { ConfigurationError } from '../lib/errors';
import { MonitoringTest, MonitoringTestModel } from '../models/monitoring-test';

export interface TestBatch {
  batch: MonitoringTest[];
  nextIndex: number;
}

/**
 * Returns the batch starting at `startIndex` and the cursor of the next one.
 * Forward progress needs `maxSize` >= the longest same-name run.
 */
export function subsetOfTests(
  tests: readonly MonitoringTest[],
  startIndex: number,
  maxSize: number
): TestBatch {
  const end = startIndex + maxSize;
  const candidate = tests.slice(startIndex, end);

  if (end >= tests.length || !MonitoringTestModel.matches(tests[end], { name: tests[end - 1].name })) {
    return { batch: candidate, nextIndex: startIndex + candidate.length };
  }

  // boundary falls inside a run: drop the run from this batch
  const lastName = candidate[candidate.length - 1].name;
  const batch = candidate.filter(test => !MonitoringTestModel.matches(test, { name: lastName }));
  return { batch, nextIndex: startIndex + batch.length };
}

/**
 * Length of the longest run of adjacent tests sharing one name
 */
export function longestNameRun(tests: readonly MonitoringTest[]): number {
  let longest = 0;
  let current = 0;

  tests.forEach((test, index) => {
    current = index > 0 && tests[index - 1].name === test.name ? current + 1 : 1;
    longest = Math.max(longest, current);
  });

  return longest;
}

/**
 * Every name must form a single run in the catalog. A name that reappears
 * after another one would be trimmed from one batch and skipped by the cursor.
 */
export function assertContiguousNames(tests: readonly MonitoringTest[]): void {
  const firstFileOf = new Map<string, string>();

  tests.forEach((test, index) => {
    const previous = index > 0 ? tests[index - 1] : undefined;
    if (previous && previous.name === test.name) {
      return;
    }
    const firstFile = firstFileOf.get(test.name);
    if (firstFile !== undefined) {
      throw new ConfigurationError(
        `Test name ${test.name} in ${test.sourceFile} reappears after other tests; it is first declared in ${firstFile}`,
        'NON_CONTIGUOUS_TEST_NAME',
        { test_name: test.name, first_file: firstFile, source_file: test.sourceFile, index }
      );
    }
    firstFileOf.set(test.name, test.sourceFile);
  });
}

/**
 * Rejects a catalog and batch size with which the dispatch loop could skip
 * tests or stop advancing
 */
export function assertForwardProgress(tests: readonly MonitoringTest[], maxSize: number): void {
  if (!Number.isInteger(maxSize) || maxSize < 1) {
    throw new ConfigurationError(
      `Batch size must be a positive integer, got ${maxSize}`,
      'INVALID_BATCH_SIZE',
      { batch_size: maxSize }
    );
  }

  assertContiguousNames(tests);

  const longestRun = longestNameRun(tests);
  if (maxSize < longestRun) {
    throw new ConfigurationError(
      `Batch size ${maxSize} is smaller than the longest run of same-named tests (${longestRun})`,
      'BATCH_SIZE_TOO_SMALL',
      { batch_size: maxSize, longest_name_run: longestRun }
    );
  }
}
