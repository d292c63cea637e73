import React, { useEffect, useRef, useState } from 'react';
import { useEditorManager } from '../contexts/EditorManagerContext';
import { useWorkspace } from '../contexts/WorkspaceContext';
import { FileInfo } from '../types/editor';
import { getFileIcon, getFileIconColor } from '../utils/fileIcons';
import { parentPath } from '../utils/paths';
import './QuickOpen.css';

const SEARCH_DELAY_MS = 150;
const PAGE_SIZE = 10;

interface QuickOpenProps {
  onClose: () => void;
}

/** Workspace file picker, searching file names on the server. */
const QuickOpen: React.FC<QuickOpenProps> = ({ onClose }) => {
  const { fileApi } = useWorkspace();
  const { openFile } = useEditorManager();
  const [searchQuery, setSearchQuery] = useState('');
  const [items, setItems] = useState<FileInfo[]>([]);
  const [selectedIndex, setSelectedIndex] = useState(0);
  const [error, setError] = useState<string | null>(null);
  const searchInputRef = useRef<HTMLInputElement>(null);

  useEffect(() => {
    searchInputRef.current?.focus();
  }, []);

  useEffect(() => {
    const query = searchQuery.trim();
    if (!query) {
      setItems([]);
      return;
    }
    let cancelled = false;
    const timer = setTimeout(() => {
      fileApi.searchFiles(query)
        .then(files => {
          if (cancelled) return;
          setItems(files);
          setSelectedIndex(0);
          setError(null);
        })
        .catch(err => {
          console.error('Quick open search failed:', err);
          if (!cancelled) setError(err instanceof Error ? err.message : 'Search failed');
        });
    }, SEARCH_DELAY_MS);
    return () => {
      cancelled = true;
      clearTimeout(timer);
    };
  }, [fileApi, searchQuery]);

  const select = (file: FileInfo) => {
    onClose();
    openFile(file).catch(err => console.error('Failed to open file:', err));
  };

  const handleKeyDown = (e: React.KeyboardEvent) => {
    switch (e.key) {
      case 'Escape':
        e.preventDefault();
        onClose();
        break;
      case 'Enter': {
        e.preventDefault();
        const item = items[selectedIndex];
        if (item) select(item);
        break;
      }
      case 'ArrowUp':
        e.preventDefault();
        setSelectedIndex(prev => Math.max(0, prev - 1));
        break;
      case 'ArrowDown':
        e.preventDefault();
        setSelectedIndex(prev => Math.min(items.length - 1, prev + 1));
        break;
      case 'PageUp':
        e.preventDefault();
        setSelectedIndex(prev => Math.max(0, prev - PAGE_SIZE));
        break;
      case 'PageDown':
        e.preventDefault();
        setSelectedIndex(prev => Math.min(items.length - 1, prev + PAGE_SIZE));
        break;
    }
  };

  return (
    <div className="dropdown-overlay" onClick={onClose}>
      <div className="dropdown-container" role="dialog" aria-label="Open File" onClick={(e) => e.stopPropagation()}>
        <div className="dropdown-search">
          <input
            ref={searchInputRef}
            type="text"
            value={searchQuery}
            onChange={(e) => setSearchQuery(e.target.value)}
            onKeyDown={handleKeyDown}
            placeholder="Search files by name"
            aria-label="Search files by name"
            className="dropdown-search-input"
          />
        </div>

        {error && (
          <div className="error-message">
            <span className="error-icon">⚠️</span>
            <span className="error-text">{error}</span>
          </div>
        )}

        <div className="dropdown-items" role="listbox">
          {searchQuery.trim() && items.length === 0 ? (
            <div className="dropdown-no-results">No matching files</div>
          ) : (
            items.map((item, index) => (
              <div
                key={item.path}
                role="option"
                aria-selected={index === selectedIndex}
                className={`dropdown-item ${index === selectedIndex ? 'selected' : ''}`}
                onClick={() => select(item)}
                onMouseEnter={() => setSelectedIndex(index)}
              >
                <span className="dropdown-item-icon" style={{ color: getFileIconColor(item.ext) }}>
                  {getFileIcon(item.ext)}
                </span>
                <span className="dropdown-item-display">{item.name}</span>
                <span className="dropdown-item-path">{parentPath(item.path)}</span>
              </div>
            ))
          )}
        </div>

        <div className="dropdown-footer">
          <div className="dropdown-help">
            <span>↑↓ Navigate</span>
            <span>Enter Open</span>
            <span>Esc Cancel</span>
          </div>
        </div>
      </div>
    </div>
  );
};

export default QuickOpen;
