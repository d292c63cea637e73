import React, { ReactNode } from 'react';
import './Dialog.css';

interface DialogProps {
  title: string;
  onClose: () => void;
  children: ReactNode;
  className?: string;
  // Modal dialogs block clicks on the window behind them
  modal?: boolean;
}

const Dialog: React.FC<DialogProps> = ({ title, onClose, children, className = '', modal = true }) => {
  const handleKeyDown = (e: React.KeyboardEvent) => {
    if (e.key === 'Escape') {
      e.preventDefault();
      e.stopPropagation();
      onClose();
    }
  };

  const panel = (
    <div
      className={`dialog-container ${className}`}
      role="dialog"
      aria-modal={modal}
      aria-label={title}
      onClick={(e) => e.stopPropagation()}
      onKeyDown={handleKeyDown}
    >
      <div className="dialog-header">
        <span className="dialog-title">{title}</span>
        <button className="dialog-close" onClick={onClose} title="Close">
          ✕
        </button>
      </div>
      {children}
    </div>
  );

  if (!modal) {
    return <div className="dialog-floating">{panel}</div>;
  }

  return (
    <div className="dialog-overlay" onClick={onClose}>
      {panel}
    </div>
  );
};

export default Dialog;
