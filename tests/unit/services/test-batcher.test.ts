/**
 * Unit Tests: Test Batcher
 * Batch boundaries never split a run of same-named tests
 */

import { assertContiguousNames, assertForwardProgress, longestNameRun, subsetOfTests } from '../../../src/services/test-batcher';
import { MonitoringTest } from '../../../src/models/monitoring-test';
import { monitorTestUtils } from '../../setup';

const names = (tests: readonly MonitoringTest[]): string[] => tests.map(test => test.name);

/**
 * Feeds nextIndex back in until the list is exhausted
 */
const allBatches = (tests: readonly MonitoringTest[], maxSize: number): MonitoringTest[][] => {
  const batches: MonitoringTest[][] = [];
  let start = 0;
  while (start < tests.length) {
    const { batch, nextIndex } = subsetOfTests(tests, start, maxSize);
    if (nextIndex <= start) {
      throw new Error(`no progress at ${start}`);
    }
    batches.push(batch);
    start = nextIndex;
  }
  return batches;
};

describe('subsetOfTests', () => {
  const catalog = monitorTestUtils.makeNamedTests(['a', 'a', 'b', 'c', 'c']);

  it('should take a plain slice when the boundary falls between two names', () => {
    const { batch, nextIndex } = subsetOfTests(catalog, 0, 2);

    expect(names(batch)).toEqual(['a', 'a']);
    expect(nextIndex).toBe(2);
  });

  it('should trim the run cut by the boundary and leave it for the next batch', () => {
    // end = 4: tests[3] and tests[4] are both c
    const first = subsetOfTests(catalog, 2, 2);

    expect(names(first.batch)).toEqual(['b']);
    expect(first.nextIndex).toBe(3);

    const second = subsetOfTests(catalog, first.nextIndex, 2);
    expect(names(second.batch)).toEqual(['c', 'c']);
    expect(second.batch[0]).toBe(catalog[3]);
    expect(second.nextIndex).toBe(5);
  });

  it('should take the tail without trimming when the boundary reaches the end', () => {
    const { batch, nextIndex } = subsetOfTests(catalog, 3, 2);

    expect(names(batch)).toEqual(['c', 'c']);
    expect(nextIndex).toBe(5);
  });

  it('should return a short tail when fewer tests remain than the batch size', () => {
    const { batch, nextIndex } = subsetOfTests(catalog, 4, 10);

    expect(batch).toEqual([catalog[4]]);
    expect(nextIndex).toBe(5);
  });

  it('should return an empty batch past the end', () => {
    expect(subsetOfTests(catalog, 5, 2)).toEqual({ batch: [], nextIndex: 5 });
  });

  it('should visit [a,a,b,c,c] as [a,a] [b] [c,c] with batch size 2', () => {
    expect(allBatches(catalog, 2).map(names)).toEqual([['a', 'a'], ['b'], ['c', 'c']]);
  });

  it('should trim a run of three and start the next batch with it', () => {
    const tests = monitorTestUtils.makeNamedTests(['x', 'y', 'y', 'y', 'z']);

    // end = 3 falls inside the y run
    const first = subsetOfTests(tests, 0, 3);
    expect(names(first.batch)).toEqual(['x']);
    expect(first.nextIndex).toBe(1);

    const second = subsetOfTests(tests, first.nextIndex, 3);
    expect(names(second.batch)).toEqual(['y', 'y', 'y']);
    expect(second.nextIndex).toBe(4);
  });

  it.each([3, 4, 5, 7])('should visit every test exactly once with batch size %p', maxSize => {
    const tests = monitorTestUtils.makeNamedTests(['a', 'b', 'b', 'b', 'c', 'd', 'd', 'e', 'f', 'f', 'f', 'g']);

    const batches = allBatches(tests, maxSize);

    expect(batches.flat()).toEqual(tests);
    batches.forEach(batch => expect(batch.length).toBeLessThanOrEqual(maxSize));
    // no name appears in two batches
    const owners = new Map<string, number>();
    batches.forEach((batch, index) => batch.forEach(test => {
      expect(owners.get(test.name) ?? index).toBe(index);
      owners.set(test.name, index);
    }));
  });
});

describe('longestNameRun', () => {
  it('should measure the longest run of adjacent equal names', () => {
    expect(longestNameRun(monitorTestUtils.makeNamedTests(['a', 'b', 'b', 'c', 'c', 'c', 'b']))).toBe(3);
  });

  it('should be zero for an empty list', () => {
    expect(longestNameRun([])).toBe(0);
  });
});

describe('assertContiguousNames', () => {
  const inFile = (name: string, sourceFile: string) => monitorTestUtils.makeQualityTest({ name, sourceFile });

  it('should accept one name spread over adjacent files', () => {
    expect(() => assertContiguousNames([inFile('x', 'a.json'), inFile('x', 'b.json'), inFile('y', 'c.json')])).not.toThrow();
  });

  it('should reject a name that comes back after another name', () => {
    let thrown: unknown;
    try {
      assertContiguousNames([inFile('x', 'a.json'), inFile('y', 'b.json'), inFile('x', 'c.json')]);
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toHaveErrorCode('NON_CONTIGUOUS_TEST_NAME');
  });
});

describe('assertForwardProgress', () => {
  const tests = monitorTestUtils.makeNamedTests(['a', 'b', 'b', 'b']);

  it('should accept a batch size equal to the longest run', () => {
    expect(() => assertForwardProgress(tests, 3)).not.toThrow();
  });

  it('should reject a batch size smaller than the longest run', () => {
    expect(() => assertForwardProgress(tests, 2)).toThrow(
      'Batch size 2 is smaller than the longest run of same-named tests (3)'
    );
  });

  it('should reject a catalog whose names are not contiguous', () => {
    const split = monitorTestUtils.makeNamedTests(['x', 'y', 'x', 'x']);

    expect(() => assertForwardProgress(split, 3)).toThrow('Test name x in x.json reappears after other tests');
  });

  it.each([0, -1, 1.5])('should reject a batch size of %p', size => {
    let thrown: unknown;
    try {
      assertForwardProgress(tests, size);
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toHaveErrorCode('INVALID_BATCH_SIZE');
  });
});
