import type { Observable } from 'rxjs';

import { TreeId } from './tree-node';

/** Standard result shape for sync or async child loading. */
export type TreeChildrenResult<TSource> =
  | readonly TSource[]
  | Promise<readonly TSource[]>
  | Observable<readonly TSource[]>;

/** Adapter contract for records that already carry their children. */
export interface NestedDataAdapter<TSource> {
  getId(source: TSource): TreeId;
  getLabel(source: TSource): string;
  /** Only the first emission of an Observable is used. */
  getChildren(source: TSource): TreeChildrenResult<TSource> | null | undefined;
}

/** Adapter contract for flat records that point at their parent. */
export interface FlatDataAdapter<TSource> {
  getId(source: TSource): TreeId;
  getLabel(source: TSource): string;
  /** Empty string marks a root. */
  getParentId(source: TSource): TreeId;
}
