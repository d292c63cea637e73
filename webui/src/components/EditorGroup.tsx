import React, { useState } from 'react';
import { useEditorManager } from '../contexts/EditorManagerContext';
import { GroupNode, WELCOME_TAB_ID } from '../types/editor';
import { carriesEditorDrag, readFileDrag, readTabDrag } from '../utils/dragData';
import EditorPane from './EditorPane';
import EditorTabs from './EditorTabs';
import WelcomeScreen from './WelcomeScreen';
import './EditorGroup.css';

interface EditorGroupProps {
  group: GroupNode;
}

const EditorGroup: React.FC<EditorGroupProps> = ({ group }) => {
  const { buffers, activeGroupId, focusGroup, moveTab, openFile } = useEditorManager();
  const [isDropTarget, setIsDropTarget] = useState(false);

  const activeBuffer = group.activeTab ? buffers.get(group.activeTab) : undefined;

  const handleDrop = (e: React.DragEvent) => {
    e.preventDefault();
    setIsDropTarget(false);
    const tab = readTabDrag(e.dataTransfer);
    if (tab) {
      moveTab(tab.groupId, group.id, tab.tabId);
      return;
    }
    const file = readFileDrag(e.dataTransfer);
    if (file) {
      openFile(file, group.id).catch(error => console.error('Failed to open dropped file:', error));
    }
  };

  const renderContent = () => {
    if (group.activeTab === WELCOME_TAB_ID) {
      return <WelcomeScreen />;
    }
    if (activeBuffer) {
      return <EditorPane groupId={group.id} buffer={activeBuffer} />;
    }
    return (
      <div className="editor-group-empty">
        <div className="no-file-icon">📄</div>
        <div className="no-file-text">Open a file from the explorer or press Ctrl+O</div>
      </div>
    );
  };

  return (
    <div
      className={`editor-group ${group.id === activeGroupId ? 'active' : ''} ${isDropTarget ? 'drop-target' : ''}`}
      data-group-id={group.id}
      onMouseDown={() => focusGroup(group.id)}
    >
      <EditorTabs group={group} />
      <div
        className="editor-group-body"
        onDragOver={(e) => {
          if (!carriesEditorDrag(e.dataTransfer)) return;
          e.preventDefault();
          setIsDropTarget(true);
        }}
        onDragLeave={() => setIsDropTarget(false)}
        onDrop={handleDrop}
      >
        {renderContent()}
      </div>
    </div>
  );
};

export default EditorGroup;
