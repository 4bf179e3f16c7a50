/**
 * Overlay Types
 *
 * An overlay is a directory tree merged onto the target filesystem.
 */

export interface OverlayOwner {
  /** User name that will own every unpacked file */
  user: string;
  /** Group name; defaults to the user name */
  group?: string;
}

export interface Overlay {
  /** Directory whose contents are copied; must exist and be readable */
  sourcePath: string;
  /** Destination directory; its parent must exist */
  destPath: string;
  owner?: OverlayOwner;
}

export interface UnpackResult {
  sourcePath: string;
  destPath: string;
  /** Number of regular files and symlinks copied */
  filesCopied: number;
}
