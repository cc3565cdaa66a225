/**
 * targetResolver.ts — Which courses an account attempts, and in what order.
 *
 * Keep `autoEnroll` targets, sort ascending by priority.  Array#sort is
 * stable, so equal priorities keep their stored (insertion) order and the
 * same input always resolves to the same sequence.
 */

import type { Account, CourseTarget } from '../core/types';

export function resolveTargets(account: Pick<Account, 'targets'>): CourseTarget[] {
  return account.targets
    .filter((target) => target.autoEnroll)
    .sort((a, b) => a.priority - b.priority);
}
