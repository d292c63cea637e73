import { describe, expect, it } from 'vitest';

import { fileInfo } from '../test/memoryFileApi';
import { FILE_MIME, carriesEditorDrag, readFileDrag, readTabDrag, writeFileDrag, writeTabDrag } from './dragData';

const createTransfer = () => {
  const data = new Map<string, string>();
  const types: string[] = [];
  return {
    types,
    getData: (type: string) => data.get(type) ?? '',
    setData: (type: string, value: string) => {
      data.set(type, value);
      if (!types.includes(type)) types.push(type);
    }
  };
};

describe('drag data', () => {
  it('carries a tab between groups', () => {
    const transfer = createTransfer();

    writeTabDrag(transfer, { groupId: 'group-1', tabId: 'buffer-4' });

    expect(readTabDrag(transfer)).toEqual({ groupId: 'group-1', tabId: 'buffer-4' });
    expect(readFileDrag(transfer)).toBeNull();
    expect(carriesEditorDrag(transfer)).toBe(true);
  });

  it('carries a file from the explorer with a plain-text fallback', () => {
    const transfer = createTransfer();
    const file = fileInfo('src/app.ts', 12);

    writeFileDrag(transfer, file);

    expect(readFileDrag(transfer)).toEqual(file);
    expect(transfer.getData('text/plain')).toBe('src/app.ts');
  });

  it('ignores malformed payloads and foreign drags', () => {
    const transfer = createTransfer();
    transfer.setData(FILE_MIME, '{"path":');
    transfer.setData('text/plain', 'hello');

    expect(readFileDrag(transfer)).toBeNull();
    expect(readTabDrag(transfer)).toBeNull();
    expect(carriesEditorDrag(createTransfer())).toBe(false);
  });
});
