import { MatrixError, expandMatrix } from '../../src/engine/matrix-expander';
import { MatrixDeclaration } from '../../src/domain/matrix';
import { FEATURE_MATRIX } from '../helpers/fakes';

describe('expandMatrix', () => {
  test('expands groups in order with each group timeout', () => {
    const specs = expandMatrix(FEATURE_MATRIX);

    expect(specs).toEqual([
      { name: 'job1', group: 'A', timeoutMs: 1_800_000, index: 0 },
      { name: 'job2', group: 'A', timeoutMs: 1_800_000, index: 1 },
      { name: 'job3', group: 'B', timeoutMs: 2_400_000, index: 2 },
    ]);
  });

  test('is deterministic', () => {
    expect(expandMatrix(FEATURE_MATRIX)).toEqual(expandMatrix(FEATURE_MATRIX));
  });

  test('returns frozen specs', () => {
    const [spec] = expandMatrix(FEATURE_MATRIX);
    expect(Object.isFrozen(spec)).toBe(true);
  });

  test('an empty group contributes no jobs', () => {
    const specs = expandMatrix({
      groups: [
        { name: 'empty', timeoutMs: 1000, members: [] },
        { name: 'B', timeoutMs: 1000, members: ['only'] },
      ],
    });
    expect(specs.map((s) => s.name)).toEqual(['only']);
    expect(specs[0].index).toBe(0);
  });

  test('skips excluded groups and keeps indexes contiguous', () => {
    const specs = expandMatrix(FEATURE_MATRIX, { includeGroup: (g) => g.name === 'B' });
    expect(specs).toEqual([{ name: 'job3', group: 'B', timeoutMs: 2_400_000, index: 0 }]);
  });

  test('rejects a job declared in two groups', () => {
    const declaration: MatrixDeclaration = {
      groups: [
        { name: 'A', timeoutMs: 1000, members: ['shared'] },
        { name: 'B', timeoutMs: 1000, members: ['shared'] },
      ],
    };

    let caught: unknown;
    try {
      expandMatrix(declaration);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MatrixError);
    if (caught instanceof MatrixError) {
      expect(caught.typedError.code).toBe('VALIDATION.DUPLICATE_JOB');
      expect(caught.typedError.details).toEqual({ groups: ['A', 'B'] });
    }
  });

  test('rejects duplicates even inside a group that is excluded', () => {
    const declaration: MatrixDeclaration = {
      groups: [
        { name: 'A', timeoutMs: 1000, members: ['x'] },
        { name: 'B', timeoutMs: 1000, members: ['y', 'y'] },
      ],
    };
    expect(() => expandMatrix(declaration, { includeGroup: (g) => g.name === 'A' })).toThrow(MatrixError);
  });
});
