import React, { useRef } from 'react';
import { useEditorManager } from '../contexts/EditorManagerContext';
import { LayoutNode, SplitNode } from '../types/editor';
import EditorGroup from './EditorGroup';
import ResizeHandle from './ResizeHandle';
import './SplitView.css';

interface SplitViewProps {
  node: SplitNode;
}

/** Renders a splitter and, recursively, everything below it. */
const SplitView: React.FC<SplitViewProps> = ({ node }) => {
  const { resizeSplit } = useEditorManager();
  const containerRef = useRef<HTMLDivElement>(null);

  const handleResize = (index: number, delta: number) => {
    const container = containerRef.current;
    if (!container) return;
    const rect = container.getBoundingClientRect();
    const total = node.orientation === 'horizontal' ? rect.width : rect.height;
    if (total <= 0) return;

    const shift = delta / total;
    const sizes = [...node.sizes];
    sizes[index] += shift;
    sizes[index + 1] -= shift;
    resizeSplit(node.id, sizes);
  };

  const renderChild = (child: LayoutNode) =>
    child.kind === 'split' ? <SplitView node={child} /> : <EditorGroup group={child} />;

  return (
    <div ref={containerRef} className={`split-view split-${node.orientation}`}>
      {node.children.map((child, index) => (
        <React.Fragment key={child.id}>
          {index > 0 && (
            <ResizeHandle orientation={node.orientation} onResize={(delta) => handleResize(index - 1, delta)} />
          )}
          <div className="split-child" style={{ flexGrow: node.sizes[index] ?? 1, flexBasis: 0 }}>
            {renderChild(child)}
          </div>
        </React.Fragment>
      ))}
    </div>
  );
};

export default SplitView;
