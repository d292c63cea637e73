/**
 * Editor Registry
 *
 * Tracks the CodeMirror view mounted in each editor group and the editor
 * state of every buffer that is not currently on screen, so that undo
 * history and selection survive tab switches and moves between groups.
 */

import { EditorState } from '@codemirror/state';
import { EditorView } from '@codemirror/view';

class EditorRegistry {
  private views = new Map<string, EditorView>();
  private states = new Map<string, EditorState>();

  registerView(groupId: string, view: EditorView): void {
    this.views.set(groupId, view);
  }

  unregisterView(groupId: string, view: EditorView): void {
    // A remount may already have registered a newer view for the group.
    if (this.views.get(groupId) === view) {
      this.views.delete(groupId);
    }
  }

  getView(groupId: string): EditorView | undefined {
    return this.views.get(groupId);
  }

  saveState(bufferId: string, state: EditorState): void {
    this.states.set(bufferId, state);
  }

  takeState(bufferId: string): EditorState | undefined {
    const state = this.states.get(bufferId);
    this.states.delete(bufferId);
    return state;
  }

  /** Drops cached states of buffers that have been closed. */
  retainStates(open: { has(bufferId: string): boolean }): void {
    for (const bufferId of Array.from(this.states.keys())) {
      if (!open.has(bufferId)) {
        this.states.delete(bufferId);
      }
    }
  }

  clear(): void {
    this.views.clear();
    this.states.clear();
  }
}

export const editorRegistry = new EditorRegistry();
