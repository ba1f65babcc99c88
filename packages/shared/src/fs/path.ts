import path from 'node:path';

/**
 * Normalizes a path to use forward slashes, which is the standard for shellgate.
 *
 * @param p The path to normalize.
 * @returns The normalized path with forward slashes.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Joins all given path segments together using the platform-specific separator as a delimiter,
 * then normalizes the resulting path to use forward slashes.
 */
export function join(...paths: string[]): string {
  return normalizePath(path.join(...paths));
}

/**
 * A platform-agnostic version of `path.resolve`.
 */
export function resolve(...pathSegments: string[]): string {
  return normalizePath(path.resolve(...pathSegments));
}

/**
 * Resolves `target` against `root` with POSIX semantics, independent of the host platform.
 * Shell commands are always interpreted the POSIX way.
 */
export function resolvePosix(root: string, target: string): string {
  return path.posix.resolve(root, target);
}

/**
 * Checks whether `target` (already absolute and normalized) lies inside `root` or is `root` itself.
 * Matching is on directory boundaries: `/home/proj2` is not inside `/home/proj`.
 */
export function isWithinRoot(root: string, target: string): boolean {
  if (root === '/') {
    return target.startsWith('/');
  }
  return target === root || target.startsWith(root + '/');
}

/**
 * Strips directory qualification from a program token: `/usr/bin/git` becomes `git`.
 */
export function basename(p: string): string {
  return path.posix.basename(p);
}
