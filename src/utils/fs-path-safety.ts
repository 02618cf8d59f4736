/**
 * Filesystem Path Safety Utilities for mandump
 *
 * Cache files are user-editable JSON, so every path read from one is
 * checked before it is deleted or written relative to the output directory.
 *
 * @module utils/fs-path-safety
 */

import { isAbsolute, posix, relative, resolve, win32 } from 'node:path'

/**
 * Characters that are dangerous in file paths.
 * - Null byte: truncates strings passed to system calls
 * - Line breaks: corrupt log and cache output
 */
const DANGEROUS_CHARACTERS = [
  '\0',        // Null byte
  '\n',        // Line feed
  '\r',        // Carriage return
]

/**
 * Check if a path contains dangerous characters.
 *
 * @example
 * hasDangerousCharacters('man1/ls.1')          // false
 * hasDangerousCharacters('man1/ls\0.1')        // true (null byte)
 */
export function hasDangerousCharacters(filePath: string): boolean {
  return DANGEROUS_CHARACTERS.some(char => filePath.includes(char))
}

/**
 * Check if a path contains a parent-directory segment.
 *
 * @example
 * hasPathTraversal('man1/ls.1')                // false
 * hasPathTraversal('../etc/passwd')            // true
 * hasPathTraversal('man1/../../secret')        // true
 * hasPathTraversal('..\\windows\\system32')    // true (Windows)
 * hasPathTraversal('man1/..ls.1')              // false
 */
export function hasPathTraversal(filePath: string): boolean {
  const normalized = filePath.replace(/\\/g, '/')
  const parts = normalized.split('/')
  return parts.some(part => part === '..')
}

/**
 * Check if a path is absolute in either POSIX or Windows form.
 */
export function isAbsolutePath(filePath: string): boolean {
  return isAbsolute(filePath) || posix.isAbsolute(filePath) || win32.isAbsolute(filePath)
}

/**
 * Check if a file path escapes a base directory after resolution.
 *
 * @example
 * // Assuming cwd is /home/user/man
 * escapesBaseDirectory('/home/user/man', 'man1/ls.1')      // false
 * escapesBaseDirectory('/home/user/man', '../other/file')  // true
 * escapesBaseDirectory('/home/user/man', '/etc/passwd')    // true
 */
export function escapesBaseDirectory(basePath: string, filePath: string): boolean {
  const resolvedBase = resolve(basePath)
  const resolvedPath = resolve(basePath, filePath)
  const relativePath = relative(resolvedBase, resolvedPath)
  return relativePath === '' || relativePath.startsWith('..') || isAbsolute(relativePath)
}

/**
 * Decide whether a cached output path may be removed from `basePath`.
 *
 * Absolute paths and paths with `..` segments are refused outright, so a
 * hand-edited cache cannot name `/usr/share/man/...` or anything above the
 * output directory.
 */
export function isSafeRemovalPath(basePath: string, filePath: string): boolean {
  if (filePath === '' || hasDangerousCharacters(filePath)) return false
  if (isAbsolutePath(filePath) || hasPathTraversal(filePath)) return false
  return !escapesBaseDirectory(basePath, filePath)
}
