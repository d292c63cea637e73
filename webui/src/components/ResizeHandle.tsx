import React, { useState, useRef, useCallback, useEffect } from 'react';
import { SplitOrientation } from '../types/editor';
import './ResizeHandle.css';

interface ResizeHandleProps {
  orientation: SplitOrientation; // Orientation of the splitter the handle sits in
  onResize: (delta: number) => void; // Pixel delta since the previous move
}

/**
 * Divider between two children of a splitter.
 *
 * - horizontal splitter: vertical bar, drag left/right
 * - vertical splitter: horizontal bar, drag up/down
 */
const ResizeHandle: React.FC<ResizeHandleProps> = ({ orientation, onResize }) => {
  const [isDragging, setIsDragging] = useState(false);
  const lastPos = useRef<number | null>(null);
  const cursor = orientation === 'horizontal' ? 'col-resize' : 'row-resize';

  const handleMouseDown = useCallback((e: React.MouseEvent) => {
    e.preventDefault();
    lastPos.current = orientation === 'horizontal' ? e.clientX : e.clientY;
    setIsDragging(true);
  }, [orientation]);

  // Document listeners live only for the duration of a drag
  useEffect(() => {
    if (!isDragging) return;

    const handleMouseMove = (e: MouseEvent) => {
      if (lastPos.current === null) return;
      const pos = orientation === 'horizontal' ? e.clientX : e.clientY;
      const delta = pos - lastPos.current;
      lastPos.current = pos;
      if (delta !== 0) onResize(delta);
    };

    const handleMouseUp = () => {
      lastPos.current = null;
      setIsDragging(false);
    };

    document.addEventListener('mousemove', handleMouseMove);
    document.addEventListener('mouseup', handleMouseUp);
    document.body.style.userSelect = 'none';
    document.body.style.cursor = cursor;

    return () => {
      document.removeEventListener('mousemove', handleMouseMove);
      document.removeEventListener('mouseup', handleMouseUp);
      document.body.style.userSelect = '';
      document.body.style.cursor = '';
    };
  }, [isDragging, orientation, cursor, onResize]);

  return (
    <div
      className={`resize-handle resize-handle-${orientation} ${isDragging ? 'resizing' : ''}`}
      onMouseDown={handleMouseDown}
      role="separator"
      aria-orientation={orientation === 'horizontal' ? 'vertical' : 'horizontal'}
      style={{ cursor }}
    >
      <div className="resize-handle-indicator" />
    </div>
  );
};

export default ResizeHandle;
