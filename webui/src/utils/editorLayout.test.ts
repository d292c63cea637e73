import { describe, expect, it } from 'vitest';

import type { GroupNode, SplitNode } from '../types/editor';
import {
  activateTab,
  closeGroup,
  closeTab,
  createLayout,
  findGroup,
  findGroupContaining,
  firstGroupId,
  getAllTabs,
  getGroups,
  layoutFromPreset,
  moveTab,
  openTab,
  resizeSplit,
  splitGroup
} from './editorLayout';

const onlyGroup = (layout: SplitNode): GroupNode => {
  const [group] = getGroups(layout);
  return group;
};

const splitOrFail = (layout: SplitNode, groupId: string, direction: 'horizontal' | 'vertical') => {
  const result = splitGroup(layout, groupId, direction);
  if (!result.groupId) throw new Error('split failed');
  return { layout: result.layout, groupId: result.groupId };
};

describe('editor layout', () => {
  it('starts with a horizontal root holding one empty group', () => {
    const layout = createLayout();

    expect(layout.kind).toBe('split');
    expect(layout.orientation).toBe('horizontal');
    expect(layout.sizes).toEqual([1]);
    expect(onlyGroup(layout)).toMatchObject({ kind: 'group', tabs: [], activeTab: null });
  });

  it('splitting vertically places the new group to the right', () => {
    const layout = createLayout();
    const first = onlyGroup(layout).id;

    const { layout: next, groupId } = splitOrFail(layout, first, 'vertical');

    expect(next.orientation).toBe('horizontal');
    expect(next.children.map(child => child.id)).toEqual([first, groupId]);
    expect(next.sizes).toEqual([0.5, 0.5]);
  });

  it('splitting horizontally makes a lone group adopt a vertical splitter', () => {
    const layout = createLayout();
    const first = onlyGroup(layout).id;

    const { layout: next, groupId } = splitOrFail(layout, first, 'horizontal');

    expect(next.id).toBe(layout.id);
    expect(next.orientation).toBe('vertical');
    expect(next.children.map(child => child.id)).toEqual([first, groupId]);
  });

  it('inserts the new group right after its source when orientations agree', () => {
    const start = createLayout();
    const g1 = onlyGroup(start).id;
    const { layout: two, groupId: g2 } = splitOrFail(start, g1, 'vertical');

    const { layout: three, groupId: g3 } = splitOrFail(two, g1, 'vertical');

    expect(three.children.map(child => child.id)).toEqual([g1, g3, g2]);
    expect(three.sizes).toEqual([1 / 3, 1 / 3, 1 / 3]);
  });

  it('wraps the source group when the parent runs the other way', () => {
    const start = createLayout();
    const g1 = onlyGroup(start).id;
    const { layout: two, groupId: g2 } = splitOrFail(start, g1, 'vertical');

    const { layout: nested, groupId: g3 } = splitOrFail(two, g2, 'horizontal');

    expect(nested.orientation).toBe('horizontal');
    expect(nested.sizes).toEqual([0.5, 0.5]);
    const wrapper = nested.children[1];
    expect(wrapper.kind).toBe('split');
    if (wrapper.kind !== 'split') return;
    expect(wrapper.orientation).toBe('vertical');
    expect(wrapper.children.map(child => child.id)).toEqual([g2, g3]);
    expect(wrapper.sizes).toEqual([0.5, 0.5]);
  });

  it('leaves the layout alone when splitting an unknown group', () => {
    const layout = createLayout();
    const result = splitGroup(layout, 'group-missing', 'vertical');

    expect(result.layout).toBe(layout);
    expect(result.groupId).toBeNull();
  });

  it('opens and activates tabs without mutating the previous tree', () => {
    const layout = createLayout();
    const groupId = onlyGroup(layout).id;

    const opened = openTab(openTab(layout, groupId, 'a'), groupId, 'b');
    const reopened = openTab(opened, groupId, 'a');

    expect(onlyGroup(layout).tabs).toEqual([]);
    expect(onlyGroup(opened)).toMatchObject({ tabs: ['a', 'b'], activeTab: 'b' });
    expect(onlyGroup(reopened)).toMatchObject({ tabs: ['a', 'b'], activeTab: 'a' });
    expect(onlyGroup(activateTab(opened, groupId, 'missing')).activeTab).toBe('b');
  });

  it('activates the neighbouring tab when the active one closes', () => {
    const layout = createLayout();
    const groupId = onlyGroup(layout).id;
    let next = ['a', 'b', 'c'].reduce((acc, tab) => openTab(acc, groupId, tab), layout);
    next = activateTab(next, groupId, 'b');

    next = closeTab(next, groupId, 'b');
    expect(onlyGroup(next)).toMatchObject({ tabs: ['a', 'c'], activeTab: 'c' });

    next = closeTab(next, groupId, 'c');
    expect(onlyGroup(next)).toMatchObject({ tabs: ['a'], activeTab: 'a' });

    next = closeTab(next, groupId, 'a');
    expect(getGroups(next)).toHaveLength(1);
    expect(onlyGroup(next)).toMatchObject({ id: groupId, tabs: [], activeTab: null });
  });

  it('removes an emptied group and collapses its splitter', () => {
    const start = createLayout();
    const g1 = onlyGroup(start).id;
    const { layout: two, groupId: g2 } = splitOrFail(start, g1, 'vertical');
    const { layout: nested, groupId: g3 } = splitOrFail(two, g2, 'horizontal');

    const withTab = openTab(nested, g3, 'x');
    const collapsed = closeTab(withTab, g3, 'x');

    expect(collapsed.children.map(child => `${child.kind}:${child.id}`)).toEqual([`group:${g1}`, `group:${g2}`]);
    expect(collapsed.sizes).toEqual([0.5, 0.5]);
  });

  it('moves tabs of a closed group into the first other group', () => {
    const start = createLayout();
    const g1 = onlyGroup(start).id;
    const { layout: two, groupId: g2 } = splitOrFail(start, g1, 'vertical');
    let layout = openTab(openTab(two, g1, 'b'), g1, 'a');
    layout = openTab(openTab(layout, g2, 'b'), g2, 'c');

    const closedSecond = closeGroup(layout, g2);
    expect(getGroups(closedSecond)).toHaveLength(1);
    expect(onlyGroup(closedSecond)).toMatchObject({ id: g1, tabs: ['b', 'a', 'c'], activeTab: 'c' });

    const closedFirst = closeGroup(layout, g1);
    expect(onlyGroup(closedFirst)).toMatchObject({ id: g2, tabs: ['b', 'c', 'a'], activeTab: 'a' });

    expect(closeGroup(start, g1)).toBe(start);
  });

  it('moves a tab between groups and reorders inside one', () => {
    const start = createLayout();
    const g1 = onlyGroup(start).id;
    const { layout: two, groupId: g2 } = splitOrFail(start, g1, 'vertical');
    let layout = openTab(openTab(two, g1, 'a'), g1, 'b');
    layout = openTab(layout, g2, 'c');

    const moved = moveTab(layout, g1, g2, 'a', 0);
    expect(findGroup(moved, g1)).toMatchObject({ tabs: ['b'], activeTab: 'b' });
    expect(findGroup(moved, g2)).toMatchObject({ tabs: ['a', 'c'], activeTab: 'a' });

    const emptied = moveTab(layout, g2, g1, 'c');
    expect(getGroups(emptied)).toHaveLength(1);
    expect(onlyGroup(emptied)).toMatchObject({ id: g1, tabs: ['a', 'b', 'c'], activeTab: 'c' });

    const reordered = moveTab(layout, g1, g1, 'b', 0);
    expect(findGroup(reordered, g1)).toMatchObject({ tabs: ['b', 'a'], activeTab: 'b' });
  });

  it('normalises split sizes and keeps a minimum pane size', () => {
    const start = createLayout();
    const g1 = onlyGroup(start).id;
    const { layout } = splitOrFail(start, g1, 'vertical');

    expect(resizeSplit(layout, layout.id, [3, 1]).sizes).toEqual([0.75, 0.25]);

    const squeezed = resizeSplit(layout, layout.id, [0.99, 0.01]).sizes;
    expect(squeezed[0]).toBeCloseTo(0.95);
    expect(squeezed[1]).toBeCloseTo(0.05);

    expect(resizeSplit(layout, layout.id, [1])).toBe(layout);
  });

  it('holds the minimum pane size when a drag overshoots the neighbour', () => {
    const start = createLayout();
    const { layout } = splitOrFail(start, onlyGroup(start).id, 'vertical');
    const narrow = resizeSplit(layout, layout.id, [0.9, 0.1]);

    const overshot = resizeSplit(narrow, narrow.id, [1.1, -0.1]).sizes;

    expect(overshot[0]).toBeCloseTo(0.95);
    expect(overshot[1]).toBeCloseTo(0.05);
    expect(resizeSplit(narrow, narrow.id, [Number.NaN, 1]).sizes).toEqual([0.5, 0.5]);
  });

  it('builds start-up layouts from presets', () => {
    const stacked = layoutFromPreset('split-horizontal');
    expect(stacked.orientation).toBe('vertical');
    expect(getGroups(stacked)).toHaveLength(2);

    const sideBySide = layoutFromPreset('split-vertical');
    expect(sideBySide.orientation).toBe('horizontal');
    expect(getGroups(sideBySide)).toHaveLength(2);

    expect(getGroups(layoutFromPreset('single'))).toHaveLength(1);
  });

  it('answers tab queries in tree order', () => {
    const start = createLayout();
    const g1 = onlyGroup(start).id;
    const { layout: two, groupId: g2 } = splitOrFail(start, g1, 'vertical');
    const layout = openTab(openTab(two, g1, 'a'), g2, 'b');

    expect(getAllTabs(layout)).toEqual(['a', 'b']);
    expect(findGroupContaining(layout, 'b')?.id).toBe(g2);
    expect(findGroupContaining(layout, 'z')).toBeNull();
    expect(firstGroupId(layout)).toBe(g1);
  });
});
