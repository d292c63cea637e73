import React, { useCallback, useEffect, useState } from 'react';
import { useEditorManager } from '../contexts/EditorManagerContext';
import { useWorkbench } from '../contexts/WorkbenchContext';
import { useWorkspace } from '../contexts/WorkspaceContext';
import { FileInfo } from '../types/editor';
import { writeFileDrag } from '../utils/dragData';
import { formatSize, getFileIcon, getFileIconColor } from '../utils/fileIcons';
import { isValidName, joinPath, parentPath, toAbsolutePath } from '../utils/paths';
import ContextMenu, { ContextMenuItem, ContextMenuPosition } from './ContextMenu';
import './FileTree.css';

const ROOT = '.';
const FILTER_DELAY_MS = 200;

interface TreeMenu {
  entry: FileInfo | null; // null = workspace root
  position: ContextMenuPosition;
}

const errorText = (err: unknown): string => (err instanceof Error ? err.message : 'Unknown error');

const FileTree: React.FC = () => {
  const { fileApi, workspace, revision } = useWorkspace();
  const { openFile } = useEditorManager();
  const { switchWorkspace } = useWorkbench();

  const [entries, setEntries] = useState<Map<string, FileInfo[]>>(new Map());
  const [expandedDirs, setExpandedDirs] = useState<Set<string>>(new Set([ROOT]));
  const [selectedPath, setSelectedPath] = useState<string | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [filter, setFilter] = useState('');
  const [matches, setMatches] = useState<FileInfo[] | null>(null);
  const [menu, setMenu] = useState<TreeMenu | null>(null);

  const loadDir = useCallback(async (path: string) => {
    try {
      const files = await fileApi.listDirectory(path);
      setEntries(prev => new Map(prev).set(path, files));
    } catch (err) {
      console.error('Failed to list directory:', path, err);
      setError(errorText(err));
    }
  }, [fileApi]);

  // Reload from the root whenever the workspace changes or asks for a refresh
  useEffect(() => {
    let cancelled = false;
    setLoading(true);
    setError(null);
    setEntries(new Map());
    setExpandedDirs(new Set([ROOT]));
    fileApi.listDirectory(ROOT)
      .then(files => {
        if (!cancelled) setEntries(new Map([[ROOT, files]]));
      })
      .catch(err => {
        console.error('Failed to list workspace:', err);
        if (!cancelled) setError(errorText(err));
      })
      .finally(() => {
        if (!cancelled) setLoading(false);
      });
    return () => {
      cancelled = true;
    };
  }, [fileApi, workspace?.root, revision]);

  // Name filter across the whole workspace
  useEffect(() => {
    const text = filter.trim();
    if (!text) {
      setMatches(null);
      return;
    }
    let cancelled = false;
    const timer = setTimeout(() => {
      fileApi.searchFiles(text)
        .then(files => {
          if (!cancelled) setMatches(files);
        })
        .catch(err => {
          console.error('File search failed:', err);
          if (!cancelled) setError(errorText(err));
        });
    }, FILTER_DELAY_MS);
    return () => {
      cancelled = true;
      clearTimeout(timer);
    };
  }, [fileApi, filter, revision]);

  const toggleDir = async (path: string) => {
    const expanded = new Set(expandedDirs);
    if (expanded.has(path)) {
      expanded.delete(path);
      setExpandedDirs(expanded);
      return;
    }
    expanded.add(path);
    setExpandedDirs(expanded);
    if (!entries.has(path)) {
      await loadDir(path);
    }
  };

  const activate = async (entry: FileInfo) => {
    setSelectedPath(entry.path);
    if (entry.isDir) {
      await toggleDir(entry.path);
    } else {
      await openFile(entry);
    }
  };

  // Context menu actions. Failures land in the inline error block.
  const runAction = (action: () => Promise<void>) => {
    setError(null);
    action().catch(err => {
      console.error('File action failed:', err);
      setError(errorText(err));
    });
  };

  const askName = (message: string, defaultValue = ''): string | null => {
    const name = window.prompt(message, defaultValue)?.trim();
    if (!name) return null;
    if (!isValidName(name)) {
      setError(`Invalid name: ${name}`);
      return null;
    }
    return name;
  };

  const createEntry = (dir: string, kind: 'file' | 'directory') => runAction(async () => {
    const name = askName(kind === 'file' ? 'New file name' : 'New folder name');
    if (!name) return;
    const path = joinPath(dir, name);
    const created = kind === 'file' ? await fileApi.createFile(path) : await fileApi.createDirectory(path);
    setExpandedDirs(prev => new Set(prev).add(dir));
    await loadDir(dir);
    setSelectedPath(created.path);
    if (!created.isDir) {
      await openFile(created);
    }
  });

  const renameEntry = (entry: FileInfo) => runAction(async () => {
    const name = askName('Rename to', entry.name);
    if (!name || name === entry.name) return;
    const dir = parentPath(entry.path);
    const renamed = await fileApi.rename(entry.path, joinPath(dir, name));
    await loadDir(dir);
    setSelectedPath(renamed.path);
  });

  const deleteEntry = (entry: FileInfo) => runAction(async () => {
    const what = entry.isDir ? 'folder' : 'file';
    if (!window.confirm(`Delete ${what} "${entry.name}"?`)) return;
    await fileApi.remove(entry.path);
    await loadDir(parentPath(entry.path));
    setSelectedPath(null);
  });

  const openEntry = (entry: FileInfo) => runAction(async () => {
    if (!entry.isDir) {
      await openFile(entry);
      return;
    }
    if (!workspace) return;
    await switchWorkspace(toAbsolutePath(workspace.root, entry.path));
  });

  const menuItems = (entry: FileInfo | null): ContextMenuItem[] => {
    const dir = entry ? (entry.isDir ? entry.path : null) : ROOT;
    const items: ContextMenuItem[] = [];
    if (dir !== null) {
      items.push(
        { id: 'new-file', label: 'New File', onSelect: () => createEntry(dir, 'file') },
        { id: 'new-folder', label: 'New Folder', onSelect: () => createEntry(dir, 'directory') }
      );
    }
    if (entry) {
      items.push(
        { id: 'open', label: 'Open', separatorBefore: dir !== null, onSelect: () => openEntry(entry) },
        { id: 'rename', label: 'Rename', onSelect: () => renameEntry(entry) },
        { id: 'delete', label: 'Delete', onSelect: () => deleteEntry(entry) }
      );
    }
    return items;
  };

  const openMenu = (e: React.MouseEvent, entry: FileInfo | null) => {
    e.preventDefault();
    e.stopPropagation();
    if (entry) setSelectedPath(entry.path);
    setMenu({ entry, position: { x: e.clientX, y: e.clientY } });
  };

  const renderEntry = (entry: FileInfo, depth: number, showPath = false): React.ReactNode => {
    const isOpen = expandedDirs.has(entry.path);
    return (
      <React.Fragment key={entry.path}>
        <div
          role="treeitem"
          aria-expanded={entry.isDir ? isOpen : undefined}
          aria-selected={selectedPath === entry.path}
          tabIndex={0}
          className={`file-item ${entry.isDir ? 'directory' : 'file'} ${selectedPath === entry.path ? 'selected' : ''}`}
          style={{ paddingLeft: 8 + depth * 12 }}
          title={entry.path}
          draggable={!entry.isDir}
          onDragStart={(e) => writeFileDrag(e.dataTransfer, entry)}
          onClick={() => setSelectedPath(entry.path)}
          onDoubleClick={() => {
            activate(entry).catch(err => setError(errorText(err)));
          }}
          onKeyDown={(e) => {
            if (e.key === 'Enter') {
              e.preventDefault();
              activate(entry).catch(err => setError(errorText(err)));
            }
          }}
          onContextMenu={(e) => openMenu(e, entry)}
        >
          {entry.isDir ? (
            <span
              className="file-chevron"
              onClick={(e) => {
                e.stopPropagation();
                toggleDir(entry.path).catch(err => setError(errorText(err)));
              }}
            >
              {isOpen ? '▾' : '▸'}
            </span>
          ) : (
            <span className="file-chevron" />
          )}
          <span className="file-icon" style={{ color: entry.isDir ? undefined : getFileIconColor(entry.ext) }}>
            {getFileIcon(entry.ext, entry.isDir, isOpen)}
          </span>
          <span className="file-name">{entry.name}</span>
          {showPath && <span className="file-path">{parentPath(entry.path)}</span>}
          {!entry.isDir && !showPath && <span className="file-size">{formatSize(entry.size)}</span>}
        </div>
        {entry.isDir && isOpen && !showPath && renderChildren(entry.path, depth + 1)}
      </React.Fragment>
    );
  };

  const renderChildren = (dir: string, depth: number): React.ReactNode => {
    const children = entries.get(dir);
    if (!children) {
      return <div className="file-tree-loading" style={{ paddingLeft: 8 + depth * 12 }}>Loading...</div>;
    }
    return children.map(child => renderEntry(child, depth));
  };

  const rootEntries = entries.get(ROOT);

  return (
    <div className="file-tree">
      <div className="file-tree-header">
        <h3 title={workspace?.root}>{workspace ? workspace.name.toUpperCase() : 'EXPLORER'}</h3>
        <div className="file-tree-controls">
          <button onClick={() => createEntry(ROOT, 'file')} className="tree-button" title="New File">
            📄
          </button>
          <button onClick={() => createEntry(ROOT, 'directory')} className="tree-button" title="New Folder">
            📁
          </button>
          <button
            onClick={() => runAction(() => loadDir(ROOT))}
            disabled={loading}
            className="tree-button"
            title="Refresh"
          >
            🔄
          </button>
        </div>
      </div>

      <div className="file-tree-filter">
        <input
          type="search"
          value={filter}
          onChange={(e) => setFilter(e.target.value)}
          placeholder="Filter files"
          aria-label="Filter files"
        />
      </div>

      {error && (
        <div className="error-message">
          <span className="error-icon">⚠️</span>
          <span className="error-text">{error}</span>
        </div>
      )}

      <div className="file-list" role="tree" onContextMenu={(e) => openMenu(e, null)}>
        {loading && (
          <div className="loading-indicator">
            <div className="spinner">⚡</div>
            <span>Loading...</span>
          </div>
        )}

        {matches !== null
          ? matches.length === 0
            ? <div className="empty-directory">No matching files</div>
            : matches.map(match => renderEntry(match, 0, true))
          : rootEntries && (rootEntries.length === 0
            ? <div className="empty-directory">Empty directory</div>
            : rootEntries.map(entry => renderEntry(entry, 0)))}
      </div>

      {menu && <ContextMenu position={menu.position} items={menuItems(menu.entry)} onClose={() => setMenu(null)} />}
    </div>
  );
};

export default FileTree;
