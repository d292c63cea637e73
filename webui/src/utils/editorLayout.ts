/**
 * Editor layout tree
 *
 * The editor area is a tree of splitters and tab groups. Every operation here
 * is pure: it returns a new tree and leaves the input untouched. The root is
 * always a splitter and the tree always holds at least one group.
 */

import { GroupNode, LayoutNode, LayoutPreset, SplitDirection, SplitNode, SplitOrientation } from '../types/editor';
import { createId } from './ids';

export const MIN_PANE_SIZE = 0.05;

export interface SplitResult {
  layout: SplitNode;
  groupId: string | null;
}

interface ParentLocation {
  parent: SplitNode;
  index: number;
  node: LayoutNode;
}

export const equalSizes = (count: number): number[] =>
  Array.from({ length: count }, () => 1 / count);

const createGroup = (tabs: string[] = [], activeTab: string | null = null): GroupNode => ({
  kind: 'group',
  id: createId('group'),
  tabs,
  activeTab
});

const createSplit = (orientation: SplitOrientation, children: LayoutNode[]): SplitNode => ({
  kind: 'split',
  id: createId('split'),
  orientation,
  children,
  sizes: equalSizes(children.length)
});

export const createLayout = (): SplitNode => createSplit('horizontal', [createGroup()]);

export const layoutFromPreset = (preset: LayoutPreset): SplitNode => {
  switch (preset) {
    case 'split-horizontal':
      return createSplit('vertical', [createGroup(), createGroup()]);
    case 'split-vertical':
      return createSplit('horizontal', [createGroup(), createGroup()]);
    default:
      return createLayout();
  }
};

// Queries

export const findNode = (node: LayoutNode, id: string): LayoutNode | null => {
  if (node.id === id) return node;
  if (node.kind === 'group') return null;
  for (const child of node.children) {
    const found = findNode(child, id);
    if (found) return found;
  }
  return null;
};

export const findGroup = (root: LayoutNode, groupId: string): GroupNode | null => {
  const node = findNode(root, groupId);
  return node && node.kind === 'group' ? node : null;
};

export const findSplit = (root: LayoutNode, splitId: string): SplitNode | null => {
  const node = findNode(root, splitId);
  return node && node.kind === 'split' ? node : null;
};

export const getGroups = (node: LayoutNode): GroupNode[] => {
  if (node.kind === 'group') return [node];
  return node.children.flatMap(getGroups);
};

export const findGroupContaining = (root: LayoutNode, tabId: string): GroupNode | null =>
  getGroups(root).find(group => group.tabs.includes(tabId)) ?? null;

export const getAllTabs = (root: LayoutNode): string[] =>
  getGroups(root).flatMap(group => group.tabs);

export const firstGroupId = (root: LayoutNode): string | null => getGroups(root)[0]?.id ?? null;

const findParent = (node: LayoutNode, id: string): ParentLocation | null => {
  if (node.kind === 'group') return null;
  for (let index = 0; index < node.children.length; index++) {
    const child = node.children[index];
    if (child.id === id) return { parent: node, index, node: child };
    const nested = findParent(child, id);
    if (nested) return nested;
  }
  return null;
};

// Immutable helpers

const replaceNode = (node: LayoutNode, id: string, replacement: LayoutNode): LayoutNode => {
  if (node.id === id) return replacement;
  if (node.kind === 'group') return node;
  let changed = false;
  const children = node.children.map(child => {
    const next = replaceNode(child, id, replacement);
    if (next !== child) changed = true;
    return next;
  });
  return changed ? { ...node, children } : node;
};

const replaceInRoot = (root: SplitNode, id: string, replacement: LayoutNode): SplitNode => {
  const next = replaceNode(root, id, replacement);
  // Only the root itself can be swapped for a group, and callers never ask for that.
  return next.kind === 'split' ? next : root;
};

const updateGroup = (root: SplitNode, groupId: string, update: (group: GroupNode) => GroupNode): SplitNode => {
  const group = findGroup(root, groupId);
  return group ? replaceInRoot(root, groupId, update(group)) : root;
};

// Negative shares come from a drag that overshoots its neighbour and count as zero.
const normalizeSizes = (sizes: number[], count: number): number[] => {
  if (sizes.length !== count || sizes.some(size => !Number.isFinite(size))) {
    return equalSizes(count);
  }
  const clamped = sizes.map(size => Math.max(size, 0));
  const total = clamped.reduce((sum, size) => sum + size, 0);
  if (!(total > 0)) return equalSizes(count);
  return clamped.map(size => size / total);
};

const clampSizes = (sizes: number[]): number[] => {
  const result = [...sizes];
  const pinned = new Set<number>();
  for (let pass = 0; pass < result.length; pass++) {
    const free = result.map((_, index) => index).filter(index => !pinned.has(index));
    const freeTotal = free.reduce((sum, index) => sum + result[index], 0);
    const remaining = 1 - pinned.size * MIN_PANE_SIZE;
    for (const index of free) {
      result[index] = freeTotal > 0 ? (result[index] / freeTotal) * remaining : remaining / free.length;
    }
    let changed = false;
    for (const index of free) {
      if (result[index] < MIN_PANE_SIZE) {
        result[index] = MIN_PANE_SIZE;
        pinned.add(index);
        changed = true;
      }
    }
    if (!changed) break;
  }
  return result;
};

/**
 * Removes a group from its splitter. A group that is the only child of its
 * splitter stays (empty). A non-root splitter left with one child is replaced
 * by that child.
 */
const removeGroup = (root: SplitNode, groupId: string): SplitNode => {
  const location = findParent(root, groupId);
  if (!location || location.parent.children.length <= 1) return root;

  const { parent, index } = location;
  const children = parent.children.filter((_, i) => i !== index);
  const sizes = normalizeSizes(parent.sizes.filter((_, i) => i !== index), children.length);

  if (children.length === 1 && parent.id !== root.id) {
    return replaceInRoot(root, parent.id, children[0]);
  }
  return replaceInRoot(root, parent.id, { ...parent, children, sizes });
};

// Operations

export const splitGroup = (layout: SplitNode, groupId: string, direction: SplitDirection): SplitResult => {
  const location = findParent(layout, groupId);
  if (!location || location.node.kind !== 'group') {
    return { layout, groupId: null };
  }

  // Splitting horizontally stacks the groups, which takes a vertical splitter.
  const needed: SplitOrientation = direction === 'horizontal' ? 'vertical' : 'horizontal';
  const { parent, index, node } = location;
  const newGroup = createGroup();

  if (parent.orientation === needed || parent.children.length === 1) {
    const children = [...parent.children.slice(0, index + 1), newGroup, ...parent.children.slice(index + 1)];
    const next: SplitNode = { ...parent, orientation: needed, children, sizes: equalSizes(children.length) };
    return { layout: replaceInRoot(layout, parent.id, next), groupId: newGroup.id };
  }

  const wrapper = createSplit(needed, [node, newGroup]);
  return { layout: replaceInRoot(layout, node.id, wrapper), groupId: newGroup.id };
};

export const openTab = (layout: SplitNode, groupId: string, tabId: string): SplitNode =>
  updateGroup(layout, groupId, group => ({
    ...group,
    tabs: group.tabs.includes(tabId) ? group.tabs : [...group.tabs, tabId],
    activeTab: tabId
  }));

export const activateTab = (layout: SplitNode, groupId: string, tabId: string): SplitNode =>
  updateGroup(layout, groupId, group => (group.tabs.includes(tabId) ? { ...group, activeTab: tabId } : group));

export const closeTab = (layout: SplitNode, groupId: string, tabId: string): SplitNode => {
  const group = findGroup(layout, groupId);
  if (!group) return layout;
  const index = group.tabs.indexOf(tabId);
  if (index === -1) return layout;

  const tabs = group.tabs.filter(tab => tab !== tabId);
  let activeTab = group.activeTab;
  if (activeTab === tabId) {
    activeTab = tabs[index] ?? tabs[index - 1] ?? null;
  }

  const next = replaceInRoot(layout, groupId, { ...group, tabs, activeTab });
  return tabs.length === 0 ? removeGroup(next, groupId) : next;
};

/** Moves every tab of the group into the first other group, then drops the group. */
export const closeGroup = (layout: SplitNode, groupId: string): SplitNode => {
  const groups = getGroups(layout);
  const source = groups.find(group => group.id === groupId);
  const target = groups.find(group => group.id !== groupId);
  if (!source || !target) return layout;

  const moved = source.tabs.filter(tab => !target.tabs.includes(tab));
  const merged = updateGroup(layout, target.id, group => ({
    ...group,
    tabs: [...group.tabs, ...moved],
    activeTab: moved.length > 0 ? moved[moved.length - 1] : group.activeTab
  }));
  return removeGroup(merged, groupId);
};

export const moveTab = (
  layout: SplitNode,
  fromGroupId: string,
  toGroupId: string,
  tabId: string,
  index?: number
): SplitNode => {
  const from = findGroup(layout, fromGroupId);
  const to = findGroup(layout, toGroupId);
  if (!from || !to || !from.tabs.includes(tabId)) return layout;

  const insert = (tabs: string[]): string[] => {
    const without = tabs.filter(tab => tab !== tabId);
    const at = index === undefined ? without.length : Math.min(Math.max(index, 0), without.length);
    return [...without.slice(0, at), tabId, ...without.slice(at)];
  };

  if (fromGroupId === toGroupId) {
    return replaceInRoot(layout, from.id, { ...from, tabs: insert(from.tabs), activeTab: tabId });
  }

  const cleaned = closeTab(layout, fromGroupId, tabId);
  return updateGroup(cleaned, toGroupId, group => ({ ...group, tabs: insert(group.tabs), activeTab: tabId }));
};

export const resizeSplit = (layout: SplitNode, splitId: string, sizes: number[]): SplitNode => {
  const split = findSplit(layout, splitId);
  if (!split || sizes.length !== split.children.length) return layout;
  const next: SplitNode = { ...split, sizes: clampSizes(normalizeSizes(sizes, split.children.length)) };
  return splitId === layout.id ? next : replaceInRoot(layout, splitId, next);
};
