import { resolveTargets } from '../../src/agents/targetResolver';
import { makeTarget } from '../helpers/fakes';

describe('resolveTargets', () => {
  it('keeps auto-enroll targets sorted by priority, ties in stored order', () => {
    const targets = [
      makeTarget('acct-1', 'A', 2),
      makeTarget('acct-1', 'B', 1),
      makeTarget('acct-1', 'C', 1, { autoEnroll: false }),
      makeTarget('acct-1', 'D', 1),
      makeTarget('acct-1', 'E', 2),
    ];

    const resolved = resolveTargets({ targets });

    expect(resolved.map((t) => t.courseId)).toEqual(['B', 'D', 'A', 'E']);
  });

  it('resolves identically on repeated calls and leaves the input untouched', () => {
    const targets = [
      makeTarget('acct-1', '18290', 3),
      makeTarget('acct-1', '18285', 1),
      makeTarget('acct-1', '18300', 3),
    ];

    const first = resolveTargets({ targets }).map((t) => t.courseId);
    const second = resolveTargets({ targets }).map((t) => t.courseId);

    expect(first).toEqual(['18285', '18290', '18300']);
    expect(second).toEqual(first);
    expect(targets.map((t) => t.courseId)).toEqual(['18290', '18285', '18300']);
  });

  it('returns an empty list for no targets', () => {
    expect(resolveTargets({ targets: [] })).toEqual([]);
  });
});
