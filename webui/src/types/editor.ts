export interface FileInfo {
  name: string;
  path: string;
  isDir: boolean;
  size: number;
  modified: number;
  ext: string;
}

export interface CursorPosition {
  line: number; // 1-based
  column: number; // 1-based
}

export interface EditorBuffer {
  id: string;
  file: FileInfo | null; // null = Untitled buffer
  title: string;
  content: string;
  savedContent: string; // Content as last loaded or saved
  cursor: CursorPosition;
  languageId: string;
  isModified: boolean;
  isLoading: boolean;
  error: string | null;
}

export type SplitOrientation = 'horizontal' | 'vertical';

// 'horizontal' puts the new group below, 'vertical' to the right
export type SplitDirection = 'horizontal' | 'vertical';

export interface SplitNode {
  kind: 'split';
  id: string;
  orientation: SplitOrientation; // horizontal = side by side, vertical = stacked
  children: LayoutNode[];
  sizes: number[];
}

export interface GroupNode {
  kind: 'group';
  id: string;
  tabs: string[];
  activeTab: string | null;
}

export type LayoutNode = SplitNode | GroupNode;

export type LayoutPreset = 'single' | 'split-horizontal' | 'split-vertical';

export const WELCOME_TAB_ID = 'welcome';
