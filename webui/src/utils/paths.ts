// Workspace paths are '/'-separated and relative to the root, which is '.'.

export const joinPath = (dir: string, name: string): string => (dir === '.' || dir === '' ? name : `${dir}/${name}`);

export const parentPath = (path: string): string => {
  const slash = path.lastIndexOf('/');
  return slash === -1 ? '.' : path.slice(0, slash);
};

export const baseName = (path: string): string => path.slice(path.lastIndexOf('/') + 1);

/** Absolute path of a workspace entry, for switching the workspace root to it. */
export const toAbsolutePath = (root: string, path: string): string => {
  if (path === '.' || path === '') return root;
  return root.endsWith('/') ? `${root}${path}` : `${root}/${path}`;
};

/** A single path segment: no separators, not '.' or '..'. */
export const isValidName = (name: string): boolean =>
  name.length > 0 && name !== '.' && name !== '..' && !/[\\/]/.test(name);
