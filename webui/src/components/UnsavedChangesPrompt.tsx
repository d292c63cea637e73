import React, { useEffect, useState } from 'react';
import { CloseChoice, useEditorManager } from '../contexts/EditorManagerContext';
import './UnsavedChangesPrompt.css';

interface PromptOption {
  label: string;
  value: CloseChoice;
  hotkey?: string;
}

const OPTIONS: PromptOption[] = [
  { label: 'Save', value: 'save', hotkey: 's' },
  { label: "Don't Save", value: 'discard', hotkey: 'd' },
  { label: 'Cancel', value: 'cancel' }
];

/** Asks what to do with a modified buffer whose tab is being closed. */
const UnsavedChangesPrompt: React.FC = () => {
  const { pendingClose, resolvePendingClose } = useEditorManager();
  const [selectedIndex, setSelectedIndex] = useState(0);
  const isOpen = pendingClose !== null;

  useEffect(() => {
    setSelectedIndex(0);
  }, [pendingClose]);

  useEffect(() => {
    if (!isOpen) return;

    const choose = (choice: CloseChoice) => {
      resolvePendingClose(choice).catch(err => console.error('Failed to close editor:', err));
    };

    const handleKeyDown = (e: KeyboardEvent) => {
      const hotkeyOption = OPTIONS.find(option => option.hotkey === e.key.toLowerCase());
      if (hotkeyOption && !e.ctrlKey && !e.metaKey) {
        e.preventDefault();
        choose(hotkeyOption.value);
        return;
      }
      switch (e.key) {
        case 'Escape':
          e.preventDefault();
          choose('cancel');
          break;
        case 'Enter':
          e.preventDefault();
          choose(OPTIONS[selectedIndex]?.value ?? 'cancel');
          break;
        case 'ArrowLeft':
          e.preventDefault();
          setSelectedIndex(prev => Math.max(0, prev - 1));
          break;
        case 'ArrowRight':
        case 'Tab':
          e.preventDefault();
          setSelectedIndex(prev => (prev + 1) % OPTIONS.length);
          break;
      }
    };

    document.addEventListener('keydown', handleKeyDown);
    return () => document.removeEventListener('keydown', handleKeyDown);
  }, [isOpen, resolvePendingClose, selectedIndex]);

  if (!pendingClose) return null;

  return (
    <div className="quickprompt-overlay">
      <div className="quickprompt-container" role="alertdialog" aria-label="Unsaved changes">
        <div className="quickprompt-prompt">
          Do you want to save the changes you made to {pendingClose.title}?
        </div>
        <div className="quickprompt-detail">Your changes will be lost if you don't save them.</div>
        <div className="quickprompt-options">
          {OPTIONS.map((option, index) => (
            <button
              key={option.value}
              className={`quickprompt-option ${index === selectedIndex ? 'selected' : ''}`}
              onClick={() => {
                resolvePendingClose(option.value).catch(err => console.error('Failed to close editor:', err));
              }}
            >
              {option.label}
              {option.hotkey && <span className="quickprompt-hotkey">{option.hotkey.toUpperCase()}</span>}
            </button>
          ))}
        </div>
      </div>
    </div>
  );
};

export default UnsavedChangesPrompt;
