import React, { useCallback, useState } from 'react';
import { useEditorManager } from '../contexts/EditorManagerContext';
import { GroupNode, WELCOME_TAB_ID } from '../types/editor';
import { readFileDrag, readTabDrag, writeTabDrag } from '../utils/dragData';
import { getFileIcon, getFileIconColor } from '../utils/fileIcons';
import ContextMenu, { ContextMenuItem, ContextMenuPosition } from './ContextMenu';
import './EditorTabs.css';

interface EditorTabsProps {
  group: GroupNode;
}

interface TabMenu {
  tabId: string;
  position: ContextMenuPosition;
}

const EditorTabs: React.FC<EditorTabsProps> = ({ group }) => {
  const { buffers, activeGroupId, activateTab, requestCloseTab, moveTab, openFile, splitActiveGroup } = useEditorManager();
  const [menu, setMenu] = useState<TabMenu | null>(null);
  const [dropIndex, setDropIndex] = useState<number | null>(null);

  const closeMenu = useCallback(() => setMenu(null), []);

  const describeTab = (tabId: string) => {
    if (tabId === WELCOME_TAB_ID) {
      return { title: 'Welcome', icon: '👋', color: undefined, tooltip: 'Welcome', isModified: false };
    }
    const buffer = buffers.get(tabId);
    const ext = buffer?.file?.ext ?? '';
    return {
      title: buffer?.title ?? tabId,
      icon: getFileIcon(ext),
      color: getFileIconColor(ext),
      tooltip: buffer?.file?.path ?? buffer?.title ?? tabId,
      isModified: buffer?.isModified ?? false
    };
  };

  const handleTabClose = (e: React.MouseEvent, tabId: string) => {
    e.stopPropagation();
    requestCloseTab(group.id, tabId);
  };

  const handleDrop = (e: React.DragEvent, index?: number) => {
    e.preventDefault();
    e.stopPropagation();
    setDropIndex(null);

    const tab = readTabDrag(e.dataTransfer);
    if (tab) {
      moveTab(tab.groupId, group.id, tab.tabId, index);
      return;
    }
    const file = readFileDrag(e.dataTransfer);
    if (file) {
      openFile(file, group.id).catch(error => console.error('Failed to open dropped file:', error));
    }
  };

  const menuItems = (tabId: string): ContextMenuItem[] => [
    { id: 'close', label: 'Close', onSelect: () => requestCloseTab(group.id, tabId) },
    {
      id: 'close-others',
      label: 'Close Others',
      disabled: group.tabs.length < 2,
      onSelect: () => group.tabs.filter(other => other !== tabId).forEach(other => requestCloseTab(group.id, other))
    },
    {
      id: 'split-right',
      label: 'Split Right',
      separatorBefore: true,
      onSelect: () => {
        activateTab(group.id, tabId);
        splitActiveGroup('vertical');
      }
    },
    {
      id: 'split-down',
      label: 'Split Down',
      onSelect: () => {
        activateTab(group.id, tabId);
        splitActiveGroup('horizontal');
      }
    }
  ];

  const isFocused = group.id === activeGroupId;

  return (
    <div
      className={`editor-tabs ${isFocused ? 'focused' : ''}`}
      onDragOver={(e) => {
        e.preventDefault();
        setDropIndex(group.tabs.length);
      }}
      onDragLeave={() => setDropIndex(null)}
      onDrop={(e) => handleDrop(e)}
    >
      <div className="tabs-list" role="tablist">
        {group.tabs.map((tabId, index) => {
          const tab = describeTab(tabId);
          return (
            <div
              key={tabId}
              role="tab"
              aria-selected={tabId === group.activeTab}
              className={`tab ${tabId === group.activeTab ? 'active' : ''} ${dropIndex === index ? 'drop-before' : ''}`}
              title={tab.tooltip}
              draggable
              onClick={() => activateTab(group.id, tabId)}
              onAuxClick={(e) => {
                if (e.button === 1) handleTabClose(e, tabId);
              }}
              onContextMenu={(e) => {
                e.preventDefault();
                setMenu({ tabId, position: { x: e.clientX, y: e.clientY } });
              }}
              onDragStart={(e) => {
                writeTabDrag(e.dataTransfer, { groupId: group.id, tabId });
                e.dataTransfer.effectAllowed = 'move';
              }}
              onDragOver={(e) => {
                e.preventDefault();
                e.stopPropagation();
                setDropIndex(index);
              }}
              onDrop={(e) => handleDrop(e, index)}
            >
              <span className="tab-icon" style={{ color: tab.color }}>
                {tab.icon}
              </span>
              <span className="tab-name">{tab.title}</span>
              {tab.isModified && <span className="tab-modified" aria-label="modified">●</span>}
              <button
                className="tab-close"
                onClick={(e) => handleTabClose(e, tabId)}
                title={`Close ${tab.title}`}
              >
                ✕
              </button>
            </div>
          );
        })}
      </div>

      {menu && <ContextMenu position={menu.position} items={menuItems(menu.tabId)} onClose={closeMenu} />}
    </div>
  );
};

export default EditorTabs;
