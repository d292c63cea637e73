import React from 'react';
import Dialog from './Dialog';

interface AboutDialogProps {
  onClose: () => void;
}

const AboutDialog: React.FC<AboutDialogProps> = ({ onClose }) => (
  <Dialog title="About Codepane" onClose={onClose}>
    <div className="dialog-body">
      <strong>Codepane</strong>
      <span>A source code editor with a file explorer, split editor groups and find and replace.</span>
      <span>Built on React and CodeMirror 6.</span>
      <div className="dialog-actions">
        <button className="dialog-button primary" onClick={onClose} autoFocus>
          OK
        </button>
      </div>
    </div>
  </Dialog>
);

export default AboutDialog;
