import { isTreeError } from '../types/tree-errors';
import { FlatDataAdapter } from '../types/tree-adapter';
import { TreeBuildResult } from './create-tree';
import { createTreeFromFlatData, detectCycle } from './flat-builder';

interface Employee {
  id: string;
  name: string;
  managerId: string;
}

const adapter: FlatDataAdapter<Employee> = {
  getId: (item) => item.id,
  getLabel: (item) => item.name,
  getParentId: (item) => item.managerId,
};

const employee = (id: string, managerId = ''): Employee => ({ id, name: id.toUpperCase(), managerId });

const ids = (result: TreeBuildResult<Employee>): string[] =>
  result.tree.all().toArray().map((info) => info.node.id);

describe('createTreeFromFlatData', () => {
  it('wires parents and keeps input order', async () => {
    const result = await createTreeFromFlatData(
      [employee('cto'), employee('dev1', 'cto'), employee('ceo'), employee('dev2', 'cto')],
      adapter,
    );

    expect(result.error).toBeUndefined();
    expect(result.tree.nodes.map((node) => node.id)).toEqual(['cto', 'ceo']);
    expect(ids(result)).toEqual(['cto', 'dev1', 'dev2', 'ceo']);
    expect(result.tree.findById('dev2').parent?.name).toBe('CTO');
  });

  it('accepts children listed before their parent', async () => {
    const result = await createTreeFromFlatData([employee('dev', 'lead'), employee('lead')], adapter);

    expect(ids(result)).toEqual(['lead', 'dev']);
  });

  describe('cycle detection', () => {
    it('rejects a direct cycle', async () => {
      const result = await createTreeFromFlatData([employee('a', 'b'), employee('b', 'a')], adapter);

      expect(isTreeError(result.error, 'cyclic-reference')).toBeTrue();
      expect(result.tree.nodes).toEqual([]);
    });

    it('rejects an indirect cycle', async () => {
      const result = await createTreeFromFlatData(
        [employee('a', 'b'), employee('b', 'c'), employee('c', 'a')],
        adapter,
      );

      expect(isTreeError(result.error, 'cyclic-reference')).toBeTrue();
    });

    it('rejects a node that is its own parent', async () => {
      const result = await createTreeFromFlatData([employee('self', 'self')], adapter);

      expect(isTreeError(result.error, 'cyclic-reference')).toBeTrue();
      expect(result.error instanceof Error ? result.error.message : '').toBe(
        'cyclic reference detected in tree: node "self" -> parent "self"',
      );
    });

    it('walks the recorded parent chain', () => {
      const parentOf = new Map([
        ['b', 'a'],
        ['c', 'b'],
      ]);

      expect(detectCycle('a', 'c', parentOf)).toBeTrue();
      expect(detectCycle('d', 'c', parentOf)).toBeFalse();
    });
  });

  it('reports a parent that is missing from the input', async () => {
    const result = await createTreeFromFlatData([employee('a'), employee('b', 'ghost')], adapter);

    expect(isTreeError(result.error, 'parent-not-found')).toBeTrue();
    expect(result.tree.nodes).toEqual([]);
  });

  it('stops at the traversal cap', async () => {
    const result = await createTreeFromFlatData(
      [employee('r'), employee('c1', 'r'), employee('c2', 'r'), employee('c3', 'r')],
      adapter,
      { traversalCap: 2 },
    );

    expect(isTreeError(result.error, 'traversal-limit')).toBeTrue();
    expect(ids(result)).toEqual(['r', 'c1']);
  });

  it('drops items whose parent the cap never reached', async () => {
    const result = await createTreeFromFlatData([employee('x', 'y'), employee('y')], adapter, {
      traversalCap: 1,
    });

    expect(isTreeError(result.error, 'traversal-limit')).toBeTrue();
    expect(result.tree.nodes).toEqual([]);
  });

  it('drops the descendants of a filtered item', async () => {
    const result = await createTreeFromFlatData(
      [employee('a'), employee('b', 'a'), employee('c', 'b'), employee('d', 'a')],
      adapter,
      { filter: (item) => item.id !== 'b' },
    );

    expect(result.error).toBeUndefined();
    expect(ids(result)).toEqual(['a', 'd']);
  });

  it('limits depth after wiring', async () => {
    const result = await createTreeFromFlatData(
      [employee('a'), employee('b', 'a'), employee('c', 'b')],
      adapter,
      { maxDepth: 1, expandAll: true },
    );

    expect(ids(result)).toEqual(['a', 'b']);
    expect(result.tree.findById('a').expanded).toBeTrue();
  });

  it('rejects empty ids', async () => {
    const result = await createTreeFromFlatData([employee('')], adapter);

    expect(isTreeError(result.error, 'empty-id')).toBeTrue();
  });
});
