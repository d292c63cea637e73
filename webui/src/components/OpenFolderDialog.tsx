import React, { useState } from 'react';
import { useWorkbench } from '../contexts/WorkbenchContext';
import { useWorkspace } from '../contexts/WorkspaceContext';
import Dialog from './Dialog';

interface OpenFolderDialogProps {
  onClose: () => void;
}

const OpenFolderDialog: React.FC<OpenFolderDialogProps> = ({ onClose }) => {
  const { workspace } = useWorkspace();
  const { switchWorkspace } = useWorkbench();
  const [path, setPath] = useState(workspace?.root ?? '');
  const [opening, setOpening] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const handleSubmit = async (e: React.FormEvent) => {
    e.preventDefault();
    const target = path.trim();
    if (!target) return;
    setOpening(true);
    setError(null);
    try {
      if (await switchWorkspace(target)) {
        onClose();
        return;
      }
    } catch (err) {
      console.error('Failed to open folder:', err);
      setError(err instanceof Error ? err.message : 'Failed to open folder');
    }
    setOpening(false);
  };

  return (
    <Dialog title="Open Folder" onClose={onClose}>
      <form className="dialog-body" onSubmit={handleSubmit}>
        <input
          type="text"
          aria-label="Folder path"
          placeholder="/path/to/project"
          value={path}
          onChange={(e) => setPath(e.target.value)}
          autoFocus
        />
        {error && (
          <div className="error-message">
            <span className="error-icon">⚠️</span>
            <span className="error-text">{error}</span>
          </div>
        )}
        <div className="dialog-actions">
          <button type="button" className="dialog-button" onClick={onClose}>
            Cancel
          </button>
          <button type="submit" className="dialog-button primary" disabled={opening || !path.trim()}>
            Open
          </button>
        </div>
      </form>
    </Dialog>
  );
};

export default OpenFolderDialog;
