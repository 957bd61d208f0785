/**
 * File walker implementation
 */

import * as fs from "fs";
import * as path from "path";
import { minimatch } from "minimatch";
import {
  IFileWalker,
  WalkOptions,
  WalkResult,
} from "../interfaces/IFileWalker";
import { LocationNotFoundError, LocationUnreadableError } from "../types";
import { ErrorHandler } from "./ErrorHandler";

function byName(a: fs.Dirent, b: fs.Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

export class FileWalker implements IFileWalker {
  async expand(location: string, options: WalkOptions = {}): Promise<WalkResult> {
    const root = path.resolve(location);
    const stats = await this.statLocation(root);

    if (stats.isFile()) {
      return { files: [root], errors: [], cancelled: false };
    }
    if (!stats.isDirectory()) {
      throw new LocationUnreadableError(root, "not a regular file or directory");
    }

    const files: string[] = [];
    const errors: string[] = [];
    const visited = new Set<string>();
    const pending: string[] = [root];
    let cancelled = false;

    while (pending.length > 0) {
      if (options.token?.isCancelled) {
        cancelled = true;
        break;
      }

      const dirPath = pending.pop();
      if (dirPath === undefined) {
        break;
      }

      if (options.followSymlinks && !(await this.markVisited(dirPath, visited, errors))) {
        continue;
      }

      let entries: fs.Dirent[];
      try {
        entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
      } catch (error) {
        if (dirPath === root) {
          throw this.toLocationError(root, error);
        }
        errors.push(
          `${dirPath} - Unable to read directory: ${ErrorHandler.describe(error)}`
        );
        continue;
      }

      const subdirectories: string[] = [];
      for (const entry of entries.sort(byName)) {
        const fullPath = path.join(dirPath, entry.name);
        if (this.isExcluded(root, fullPath, options.excludePatterns)) {
          continue;
        }

        if (entry.isFile()) {
          files.push(fullPath);
        } else if (entry.isDirectory()) {
          subdirectories.push(fullPath);
        } else if (entry.isSymbolicLink() && options.followSymlinks) {
          try {
            const target = await fs.promises.stat(fullPath);
            if (target.isFile()) {
              files.push(fullPath);
            } else if (target.isDirectory()) {
              subdirectories.push(fullPath);
            }
          } catch (error) {
            errors.push(
              `${fullPath} - Unable to follow symbolic link: ${ErrorHandler.describe(error)}`
            );
          }
        }
      }

      // Reversed so the stack pops them in name order
      for (let i = subdirectories.length - 1; i >= 0; i--) {
        pending.push(subdirectories[i]);
      }
    }

    return { files, errors, cancelled };
  }

  /**
   * Record a directory's real path; false if it was already walked
   */
  private async markVisited(
    dirPath: string,
    visited: Set<string>,
    errors: string[]
  ): Promise<boolean> {
    let real: string;
    try {
      real = await fs.promises.realpath(dirPath);
    } catch (error) {
      errors.push(
        `${dirPath} - Unable to read directory: ${ErrorHandler.describe(error)}`
      );
      return false;
    }
    if (visited.has(real)) {
      return false;
    }
    visited.add(real);
    return true;
  }

  private async statLocation(root: string): Promise<fs.Stats> {
    try {
      return await fs.promises.stat(root);
    } catch (error) {
      throw this.toLocationError(root, error);
    }
  }

  private toLocationError(root: string, error: unknown): Error {
    if (ErrorHandler.isNodeError(error)) {
      if (error.code === "ENOENT" || error.code === "ENOTDIR") {
        return new LocationNotFoundError(root);
      }
      return new LocationUnreadableError(root, error.code ?? error.message);
    }
    return new LocationUnreadableError(root, ErrorHandler.describe(error));
  }

  private isExcluded(root: string, fullPath: string, patterns?: string[]): boolean {
    if (!patterns || patterns.length === 0) {
      return false;
    }
    const relative = path.relative(root, fullPath);
    return patterns.some((pattern) =>
      minimatch(relative, pattern, { dot: true, matchBase: true })
    );
  }
}
