/** Payload of every node produced by the filesystem builder. */
export interface FileInfo {
  /** Absolute path. */
  path: string;
  name: string;
  size: number;
  mode: number;
  modifiedAt: Date;
  isDirectory: boolean;
  isSymbolicLink: boolean;
}

export function isFileInfo(value: unknown): value is FileInfo {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'path' in value &&
    typeof value.path === 'string' &&
    'isDirectory' in value &&
    typeof value.isDirectory === 'boolean'
  );
}
