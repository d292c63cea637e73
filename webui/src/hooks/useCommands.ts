import { useCallback } from 'react';
import { requestGoToLine } from '../components/EditorToolbar';
import { useEditorManager } from '../contexts/EditorManagerContext';
import { useSettings } from '../contexts/SettingsContext';
import { useTheme } from '../contexts/ThemeContext';
import { useWorkbench } from '../contexts/WorkbenchContext';
import { editorRegistry } from '../services/editorRegistry';
import { findGroup, getGroups } from '../utils/editorLayout';
import { EditCommand, runEditCommand } from '../utils/editorSetup';
import { CommandId } from '../utils/shortcuts';

const EDIT_COMMANDS: Partial<Record<CommandId, EditCommand>> = {
  'edit.undo': 'undo',
  'edit.redo': 'redo',
  'edit.cut': 'cut',
  'edit.copy': 'copy',
  'edit.paste': 'paste'
};

// Commands that act on the text of the active editor
const NEEDS_EDITOR = new Set<CommandId>([
  'file.save',
  'file.saveAs',
  'edit.undo',
  'edit.redo',
  'edit.cut',
  'edit.copy',
  'edit.paste',
  'edit.find',
  'edit.replace',
  'edit.goToLine'
]);

/** Menu and keyboard commands of the main window. */
export const useCommands = () => {
  const {
    layout,
    activeGroupId,
    newFile,
    saveActiveBuffer,
    closeActiveTab,
    splitActiveGroup,
    closeGroup,
    showWelcome,
    getActiveBuffer,
    setStatusMessage
  } = useEditorManager();
  const { openDialog } = useWorkbench();
  const { toggleSetting } = useSettings();
  const { toggleTheme } = useTheme();

  const isEnabled = useCallback((command: CommandId): boolean => {
    if (NEEDS_EDITOR.has(command)) {
      return getActiveBuffer() !== null;
    }
    if (command === 'file.close') {
      return Boolean(findGroup(layout, activeGroupId)?.activeTab);
    }
    if (command === 'view.closeSplit') {
      return getGroups(layout).length > 1;
    }
    return true;
  }, [activeGroupId, getActiveBuffer, layout]);

  const runEdit = useCallback((command: EditCommand) => {
    const view = editorRegistry.getView(activeGroupId);
    if (!view) return;
    runEditCommand(view, command)
      .then(() => view.focus())
      .catch(error => {
        console.error(`Edit command ${command} failed:`, error);
        setStatusMessage(`${command[0].toUpperCase()}${command.slice(1)} failed`);
      });
  }, [activeGroupId, setStatusMessage]);

  const runCommand = useCallback((command: CommandId) => {
    if (!isEnabled(command)) return;

    const editCommand = EDIT_COMMANDS[command];
    if (editCommand) {
      runEdit(editCommand);
      return;
    }

    switch (command) {
      case 'file.new':
        newFile();
        break;
      case 'file.open':
        openDialog('quick-open');
        break;
      case 'file.openFolder':
        openDialog('open-folder');
        break;
      case 'file.save':
      case 'file.saveAs':
        saveActiveBuffer(command === 'file.saveAs').catch(error => {
          console.error('Save failed:', error);
        });
        break;
      case 'file.close':
        closeActiveTab();
        break;
      case 'edit.find':
        openDialog('find');
        break;
      case 'edit.replace':
        openDialog('replace');
        break;
      case 'edit.goToLine':
        requestGoToLine(activeGroupId);
        break;
      case 'view.explorer':
        toggleSetting('showExplorer');
        break;
      case 'view.statusBar':
        toggleSetting('showStatusBar');
        break;
      case 'view.splitHorizontal':
        splitActiveGroup('horizontal');
        break;
      case 'view.splitVertical':
        splitActiveGroup('vertical');
        break;
      case 'view.closeSplit':
        closeGroup();
        break;
      case 'view.theme':
        toggleTheme();
        break;
      case 'view.lineNumbers':
        toggleSetting('showLineNumbers');
        break;
      case 'view.wordWrap':
        toggleSetting('wordWrap');
        break;
      case 'help.welcome':
        showWelcome();
        break;
      case 'help.about':
        openDialog('about');
        break;
    }
  }, [
    activeGroupId,
    closeActiveTab,
    closeGroup,
    isEnabled,
    newFile,
    openDialog,
    runEdit,
    saveActiveBuffer,
    showWelcome,
    splitActiveGroup,
    toggleSetting,
    toggleTheme
  ]);

  return { runCommand, isEnabled };
};
