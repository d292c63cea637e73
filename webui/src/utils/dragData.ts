import { isFileInfo } from '../services/fileApi';
import { FileInfo } from '../types/editor';

// Custom types keep foreign drags (text, OS files) from being mistaken for ours.
export const TAB_MIME = 'application/x-codepane-tab';
export const FILE_MIME = 'application/x-codepane-file';

export interface TabDragData {
  groupId: string;
  tabId: string;
}

type DragStore = Pick<DataTransfer, 'getData' | 'setData' | 'types'>;

const parse = (raw: string): unknown => {
  if (!raw) return null;
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
};

const isTabDragData = (value: unknown): value is TabDragData =>
  typeof value === 'object' &&
  value !== null &&
  'groupId' in value &&
  'tabId' in value &&
  typeof value.groupId === 'string' &&
  typeof value.tabId === 'string';

export const writeTabDrag = (transfer: DragStore, data: TabDragData): void => {
  transfer.setData(TAB_MIME, JSON.stringify(data));
};

export const readTabDrag = (transfer: DragStore): TabDragData | null => {
  const value = parse(transfer.getData(TAB_MIME));
  return isTabDragData(value) ? value : null;
};

export const writeFileDrag = (transfer: DragStore, file: FileInfo): void => {
  transfer.setData(FILE_MIME, JSON.stringify(file));
  transfer.setData('text/plain', file.path);
};

export const readFileDrag = (transfer: DragStore): FileInfo | null => {
  const value = parse(transfer.getData(FILE_MIME));
  return isFileInfo(value) && !value.isDir ? value : null;
};

export const carriesEditorDrag = (transfer: DragStore): boolean =>
  Array.from(transfer.types).some(type => type === TAB_MIME || type === FILE_MIME);
