import { firstValueFrom, isObservable } from 'rxjs';

import { TreeChildrenResult } from '../types/tree-adapter';

/** Settles whatever a nested adapter returned into a plain list. */
export async function resolveChildren<TSource>(
  result: TreeChildrenResult<TSource> | null | undefined,
): Promise<readonly TSource[]> {
  if (!result) {
    return [];
  }

  if (isObservable(result)) {
    return firstValueFrom(result, { defaultValue: [] });
  }

  return result;
}
