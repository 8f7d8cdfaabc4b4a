import { Observable } from 'rxjs';

import type { TreeNode } from '../engine/tree-node';
import { TreeConfig } from '../types/tree-config';
import { TreeBuildResult } from './create-tree';

export type TreeBuildProgress<T> =
  | { kind: 'progress'; processed: number; node: TreeNode<T> }
  | { kind: 'done'; result: TreeBuildResult<T> };

export type TreeBuilder<T> = (config: TreeConfig<T>) => Promise<TreeBuildResult<T>>;

/**
 * Runs `build` on subscription and streams one `progress` event per created
 * node followed by a single `done` event. Unsubscribing early cancels the
 * build; the caller's own `signal` and `onProgress` keep working.
 */
export function observeBuildProgress<T>(
  build: TreeBuilder<T>,
  config: TreeConfig<T> = {},
): Observable<TreeBuildProgress<T>> {
  return new Observable<TreeBuildProgress<T>>((subscriber) => {
    const controller = new AbortController();
    const outer = config.signal;
    const forwardAbort = () => controller.abort(outer?.reason);

    if (outer?.aborted) {
      forwardAbort();
    } else {
      outer?.addEventListener('abort', forwardAbort, { once: true });
    }

    void build({
      ...config,
      signal: controller.signal,
      onProgress: (processed, node) => {
        config.onProgress?.(processed, node);
        subscriber.next({ kind: 'progress', processed, node });
      },
    }).then(
      (result) => {
        subscriber.next({ kind: 'done', result });
        subscriber.complete();
      },
      (error: unknown) => subscriber.error(error),
    );

    return () => {
      outer?.removeEventListener('abort', forwardAbort);
      controller.abort();
    };
  });
}
