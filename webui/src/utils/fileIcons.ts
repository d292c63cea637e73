export const getFileIcon = (ext: string, isDir = false, isOpen = false): string => {
  if (isDir) return isOpen ? '📂' : '📁';

  switch (ext.toLowerCase()) {
    case '.js':
    case '.jsx':
    case '.mjs':
      return '🟨';
    case '.ts':
    case '.tsx':
      return '🔷';
    case '.go':
      return '🐹';
    case '.py':
      return '🐍';
    case '.json':
      return '📋';
    case '.html':
    case '.htm':
      return '🌐';
    case '.css':
    case '.scss':
      return '🎨';
    case '.md':
      return '📝';
    case '.yml':
    case '.yaml':
      return '⚙️';
    case '.sh':
      return '🐚';
    default:
      return '📄';
  }
};

export const getFileIconColor = (ext: string): string => {
  switch (ext.toLowerCase()) {
    case '.js':
    case '.jsx':
    case '.mjs':
      return '#f7df1e';
    case '.ts':
    case '.tsx':
      return '#3178c6';
    case '.go':
      return '#00add8';
    case '.py':
      return '#3776ab';
    case '.json':
      return '#cbcb41';
    case '.html':
    case '.htm':
      return '#e34c26';
    case '.css':
    case '.scss':
      return '#264de4';
    case '.md':
      return '#083fa1';
    default:
      return '#9ca3af';
  }
};

export const formatSize = (bytes: number): string => {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return parseFloat((bytes / Math.pow(k, i)).toFixed(1)) + ' ' + sizes[i];
};
