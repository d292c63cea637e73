export type WorkspaceErrorCode =
  | 'invalid_request'
  | 'outside_workspace'
  | 'not_found'
  | 'already_exists'
  | 'is_directory'
  | 'not_a_directory'
  | 'file_too_large'
  | 'binary_file'
  | 'internal';

const STATUS_BY_CODE: Record<WorkspaceErrorCode, number> = {
  invalid_request: 400,
  outside_workspace: 403,
  not_found: 404,
  already_exists: 409,
  is_directory: 400,
  not_a_directory: 400,
  file_too_large: 413,
  binary_file: 415,
  internal: 500
};

export class WorkspaceError extends Error {
  readonly code: WorkspaceErrorCode;
  readonly status: number;

  constructor(code: WorkspaceErrorCode, message: string) {
    super(message);
    this.name = 'WorkspaceError';
    this.code = code;
    this.status = STATUS_BY_CODE[code];
  }
}

export const hasErrnoCode = (error: unknown): error is Error & { code: string } => {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
};

/**
 * Maps file-system failures onto workspace errors. `displayPath` is the
 * workspace-relative path the client asked for, never the absolute one.
 */
export const toWorkspaceError = (error: unknown, displayPath: string): WorkspaceError => {
  if (error instanceof WorkspaceError) {
    return error;
  }
  if (hasErrnoCode(error)) {
    switch (error.code) {
      case 'ENOENT':
        return new WorkspaceError('not_found', `No such file or directory: ${displayPath}`);
      case 'EEXIST':
      case 'ENOTEMPTY':
        return new WorkspaceError('already_exists', `Already exists: ${displayPath}`);
      case 'EISDIR':
        return new WorkspaceError('is_directory', `Is a directory: ${displayPath}`);
      case 'ENOTDIR':
        return new WorkspaceError('not_a_directory', `Not a directory: ${displayPath}`);
      default:
        break;
    }
  }
  const message = error instanceof Error ? error.message : 'Unknown error';
  return new WorkspaceError('internal', message);
};
