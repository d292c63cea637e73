let counter = 0;

// Unique within a page session; ids are never persisted.
export const createId = (prefix: string): string => {
  counter += 1;
  return `${prefix}-${counter}`;
};
