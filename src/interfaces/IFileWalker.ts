/**
 * File walker interface
 *
 * Expands a scan location into the list of regular files beneath it.
 */

import { ICancellationToken } from "./ICancellationToken";

export interface WalkOptions {
  /** Checked between directories; a set token ends the walk early */
  token?: ICancellationToken;
  /**
   * Follow symbolic links to files and directories (default: false)
   *
   * When false, symlinks below the root are skipped entirely. A root that is
   * itself a symlink is always resolved.
   */
  followSymlinks?: boolean;
  /** Glob patterns matched against the path relative to the root */
  excludePatterns?: string[];
}

export interface WalkResult {
  /** Absolute paths of regular files in traversal order */
  files: string[];
  /** Directories that could not be listed, as `<dir> - Unable to read directory: <reason>` */
  errors: string[];
  /** True if the walk stopped early on cancellation */
  cancelled: boolean;
}

export interface IFileWalker {
  /**
   * Expand a file or directory into its regular files
   *
   * A regular file yields a single entry. A directory is walked depth-first
   * with entries visited in byte-wise name order, so the same tree always
   * yields the same sequence.
   *
   * @throws LocationNotFoundError if the location does not exist
   * @throws LocationUnreadableError if the location cannot be read
   */
  expand(location: string, options?: WalkOptions): Promise<WalkResult>;
}
