/**
 * Filesystem path safety tests
 */

import { describe, it, expect } from 'vitest'
import {
  escapesBaseDirectory,
  hasDangerousCharacters,
  hasPathTraversal,
  isAbsolutePath,
  isSafeRemovalPath,
} from '../../src/utils/fs-path-safety'

describe('hasDangerousCharacters', () => {
  it('should detect null bytes and line breaks', () => {
    expect(hasDangerousCharacters('man1/ls.1')).toBe(false)
    expect(hasDangerousCharacters('man1/ls\0.1')).toBe(true)
    expect(hasDangerousCharacters('man1/ls\n.1')).toBe(true)
  })
})

describe('hasPathTraversal', () => {
  it('should detect parent segments only', () => {
    expect(hasPathTraversal('man1/ls.1')).toBe(false)
    expect(hasPathTraversal('../etc/passwd')).toBe(true)
    expect(hasPathTraversal('man1/../../secret')).toBe(true)
    expect(hasPathTraversal('..\\windows\\system32')).toBe(true)
    expect(hasPathTraversal('man1/..ls.1')).toBe(false)
  })
})

describe('isAbsolutePath', () => {
  it('should detect POSIX and Windows absolute paths', () => {
    expect(isAbsolutePath('/etc/passwd')).toBe(true)
    expect(isAbsolutePath('C:\\Windows')).toBe(true)
    expect(isAbsolutePath('man1/ls.1')).toBe(false)
  })
})

describe('escapesBaseDirectory', () => {
  it('should compare resolved paths', () => {
    expect(escapesBaseDirectory('/home/user/man', 'man1/ls.1')).toBe(false)
    expect(escapesBaseDirectory('/home/user/man', '../other/file')).toBe(true)
    expect(escapesBaseDirectory('/home/user/man', '/etc/passwd')).toBe(true)
  })

  it('should treat the base itself as escaping', () => {
    expect(escapesBaseDirectory('/home/user/man', '.')).toBe(true)
  })
})

describe('isSafeRemovalPath', () => {
  it('should allow section pages', () => {
    expect(isSafeRemovalPath('/out', 'man1/ls.1')).toBe(true)
    expect(isSafeRemovalPath('/out', 'de/man8/mount.8')).toBe(true)
  })

  it('should refuse everything else', () => {
    expect(isSafeRemovalPath('/out', '')).toBe(false)
    expect(isSafeRemovalPath('/out', '.')).toBe(false)
    expect(isSafeRemovalPath('/out', '/etc/passwd')).toBe(false)
    expect(isSafeRemovalPath('/out', '../../etc/passwd')).toBe(false)
    expect(isSafeRemovalPath('/out', 'man1/../man1/ls.1')).toBe(false)
    expect(isSafeRemovalPath('/out', 'man1/ls\0.1')).toBe(false)
  })
})
