/**
 * Dumper tests
 *
 * Package archives are built in a temporary repository directory beside a
 * repodata snapshot; pages are extracted into a separate output directory.
 */

import { lstat, mkdir, readFile, readlink, readdir, symlink, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { CacheLedger } from '../../src/cache/ledger'
import { WeightedSemaphore } from '../../src/concurrency/semaphore'
import { Dumper, isSkippedPackage, packageArchivePath } from '../../src/dump/dumper'
import { UnsupportedCompressionError, ValidationError } from '../../src/errors'
import { type PackageRecord, decodePackage } from '../../src/repodata/package'
import { createLogger } from '../../src/utils/logger'
import { manPackage, packageEntry, writePackage, writeRepodata } from '../helpers/archives'
import { cleanupTempDir, createIsolatedTempDir } from '../helpers/temp-dir'

function record(pkgver: string, hash: string): PackageRecord {
  const name = pkgver.slice(0, pkgver.lastIndexOf('-'))
  return decodePackage(name, packageEntry(pkgver, hash), 'current')
}

describe('packageArchivePath', () => {
  it('should place archives beside the snapshot', () => {
    expect(packageArchivePath('/repo/current/x86_64-repodata', record('ls-1.0_1', 'h')))
      .toBe('/repo/current/ls-1.0_1.x86_64.xbps')
  })
})

describe('isSkippedPackage', () => {
  it('should skip debug and multilib packages', () => {
    expect(isSkippedPackage('coreutils-dbg')).toBe(true)
    expect(isSkippedPackage('glibc-32bit')).toBe(true)
    expect(isSkippedPackage('coreutils')).toBe(false)
    expect(isSkippedPackage('dbg-tools')).toBe(false)
  })
})

describe('Dumper', () => {
  let tempDir: string
  let repoDir: string
  let outputDir: string

  beforeEach(async () => {
    tempDir = await createIsolatedTempDir()
    repoDir = join(tempDir, 'repo')
    outputDir = join(tempDir, 'out')
    await mkdir(repoDir)
    await mkdir(outputDir)
  })

  afterEach(async () => {
    await cleanupTempDir(tempDir)
  })

  function dumper(ledger = new CacheLedger(), lines: string[] = []): Dumper {
    return new Dumper({
      outputDir,
      dirMode: 0o755,
      semaphore: new WeightedSemaphore(4),
      ledger,
      logger: createLogger({ level: 'warn', sink: line => lines.push(line), clock: () => new Date(0) }),
    })
  }

  describe('processPackage', () => {
    for (const compression of ['xz', 'zstd'] as const) {
      it(`should extract pages and links from a ${compression} archive`, async () => {
        const path = await writePackage(repoDir, 'ls-1.0_1', manPackage(compression))

        const result = await dumper().processPackage(record('ls-1.0_1', 'hash-ls'), path)

        expect(result).toEqual({ hash: 'hash-ls', paths: ['man1/ls.1', 'man1/dir.1'], status: 'extracted' })
        expect(await readFile(join(outputDir, 'man1', 'ls.1'), 'utf8')).toBe('.TH LS 1\n')
        expect(await readlink(join(outputDir, 'man1', 'dir.1'))).toBe('ls.1')
        expect(await readdir(outputDir)).toEqual(['man1'])
      })
    }

    it('should report a package without a man directory as irrelevant', async () => {
      const path = await writePackage(repoDir, 'true-1.0_1', {
        manifest: { dirs: ['/usr/bin'], files: ['/usr/bin/true'] },
        entries: [{ name: './usr/bin/true', content: 'binary' }],
      })

      const result = await dumper().processPackage(record('true-1.0_1', 'hash-true'), path)

      expect(result).toEqual({ hash: 'hash-true', paths: [], status: 'irrelevant' })
      expect(await readdir(outputDir)).toEqual([])
    })

    it('should report a package without directories as irrelevant', async () => {
      const path = await writePackage(repoDir, 'odd-1.0_1', {
        manifest: { files: ['/usr/share/man/man1/odd.1'] },
        entries: [{ name: './usr/share/man/man1/odd.1', content: '.TH ODD 1\n' }],
      })

      const result = await dumper().processPackage(record('odd-1.0_1', 'hash-odd'), path)
      expect(result.status).toBe('irrelevant')
    })

    it('should only extract pages the manifest lists', async () => {
      const path = await writePackage(repoDir, 'tool-2.0_1', {
        manifest: { dirs: ['/usr/share/man/man1'], files: ['/usr/share/man/man1/tool.1'] },
        entries: [
          { name: './usr/share/man/man1/tool.1', content: '.TH TOOL 1\n' },
          { name: './usr/share/man/man1/stray.1', content: '.TH STRAY 1\n' },
        ],
      })

      const result = await dumper().processPackage(record('tool-2.0_1', 'hash-tool'), path)

      expect(result.paths).toEqual(['man1/tool.1'])
      expect(await readdir(join(outputDir, 'man1'))).toEqual(['tool.1'])
    })

    it('should use the cache without opening the archive', async () => {
      const path = join(repoDir, 'ls-1.0_1.x86_64.xbps')
      await writeFile(path, 'not an archive')
      const ledger = new CacheLedger({ 'hash-ls': ['man1/ls.1'] })

      const result = await dumper(ledger).processPackage(record('ls-1.0_1', 'hash-ls'), path)

      expect(result).toEqual({ hash: 'hash-ls', paths: ['man1/ls.1'], status: 'cached' })
    })

    it('should report a missing archive', async () => {
      const lines: string[] = []
      const path = join(repoDir, 'gone-1.0_1.x86_64.xbps')

      const result = await dumper(new CacheLedger(), lines).processPackage(record('gone-1.0_1', 'hash-gone'), path)

      expect(result).toEqual({ hash: 'hash-gone', paths: [], status: 'missing' })
      expect(lines).toEqual([`1970-01-01T00:00:00.000Z\tWARN\tFile does not exist\t${JSON.stringify({ file: path })}`])
    })

    it('should skip debug packages without opening them', async () => {
      const path = join(repoDir, 'ls-dbg-1.0_1.x86_64.xbps')
      const ledger = new CacheLedger({ 'hash-dbg': ['man1/old.1'] })

      expect(await dumper().processPackage(record('ls-dbg-1.0_1', 'hash-dbg'), path))
        .toEqual({ hash: 'hash-dbg', paths: [], status: 'skipped' })
      expect(await dumper(ledger).processPackage(record('ls-dbg-1.0_1', 'hash-dbg'), path))
        .toEqual({ hash: 'hash-dbg', paths: ['man1/old.1'], status: 'skipped' })
    })

    it('should reject an unsupported compression format', async () => {
      const path = join(repoDir, 'zip-1.0_1.x86_64.xbps')
      await writeFile(path, Buffer.from('PK\u0003\u0004 not xbps'))

      const pending = dumper().processPackage(record('zip-1.0_1', 'hash-zip'), path)

      await expect(pending).rejects.toThrow(UnsupportedCompressionError)
      await expect(dumper().processPackage(record('zip-1.0_1', 'hash-zip'), path))
        .rejects.toThrow(`Compression format for ${path} is not supported`)
    })

    it('should reject a corrupt archive as malformed', async () => {
      const path = join(repoDir, 'bad-1.0_1.x86_64.xbps')
      await writeFile(path, Buffer.concat([Buffer.from([0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00]), Buffer.alloc(64, 0x55)]))

      await expect(dumper().processPackage(record('bad-1.0_1', 'hash-bad'), path)).rejects.toThrow(ValidationError)
    })

    it('should replace an existing file with a page link', async () => {
      await mkdir(join(outputDir, 'man1'))
      await writeFile(join(outputDir, 'man1', 'dir.1'), 'stale copy')
      const path = await writePackage(repoDir, 'ls-1.0_1', manPackage())

      await dumper().processPackage(record('ls-1.0_1', 'hash-ls'), path)

      expect((await lstat(join(outputDir, 'man1', 'dir.1'))).isSymbolicLink()).toBe(true)
      expect(await readlink(join(outputDir, 'man1', 'dir.1'))).toBe('ls.1')
    })

    it('should overwrite an existing page', async () => {
      await mkdir(join(outputDir, 'man1'))
      await writeFile(join(outputDir, 'man1', 'ls.1'), 'old page')
      const path = await writePackage(repoDir, 'ls-1.0_1', manPackage())

      await dumper().processPackage(record('ls-1.0_1', 'hash-ls'), path)

      expect(await readFile(join(outputDir, 'man1', 'ls.1'), 'utf8')).toBe('.TH LS 1\n')
    })

    it('should replace a link with a page instead of writing through it', async () => {
      const outside = join(tempDir, 'outside.txt')
      await writeFile(outside, 'keep me')
      await mkdir(join(outputDir, 'man1'))
      await symlink(outside, join(outputDir, 'man1', 'ls.1'))
      const path = await writePackage(repoDir, 'ls-1.0_1', manPackage())

      await dumper().processPackage(record('ls-1.0_1', 'hash-ls'), path)

      expect((await lstat(join(outputDir, 'man1', 'ls.1'))).isFile()).toBe(true)
      expect(await readFile(join(outputDir, 'man1', 'ls.1'), 'utf8')).toBe('.TH LS 1\n')
      expect(await readFile(outside, 'utf8')).toBe('keep me')
    })
  })

  describe('processRepoData', () => {
    it('should record every scanned package in the ledger', async () => {
      const repodata = await writeRepodata(repoDir, {
        ls: packageEntry('ls-1.0_1', 'hash-ls'),
        true: packageEntry('true-1.0_1', 'hash-true'),
        gone: packageEntry('gone-1.0_1', 'hash-gone'),
        'ls-dbg': packageEntry('ls-dbg-1.0_1', 'hash-dbg'),
      })
      await writePackage(repoDir, 'ls-1.0_1', manPackage('zstd'))
      await writePackage(repoDir, 'true-1.0_1', {
        manifest: { dirs: ['/usr/bin'], files: ['/usr/bin/true'] },
        entries: [{ name: './usr/bin/true', content: 'binary' }],
      })
      const ledger = new CacheLedger()

      await dumper(ledger).processRepoData(repodata)

      expect(ledger.toRecords()).toEqual({
        version: 1,
        cache: { 'hash-gone': [], 'hash-ls': ['man1/ls.1', 'man1/dir.1'], 'hash-true': [] },
      })
    })

    it('should warn and continue when the snapshot is missing', async () => {
      const lines: string[] = []
      const repodata = join(repoDir, 'x86_64-repodata')

      await dumper(new CacheLedger(), lines).processRepoData(repodata)

      expect(lines).toEqual([`1970-01-01T00:00:00.000Z\tWARN\tFile does not exist\t${JSON.stringify({ repodata })}`])
    })

    it('should fail when the snapshot has no index', async () => {
      const repodata = join(repoDir, 'x86_64-repodata')
      await writeFile(repodata, Buffer.from('not zstd'))
      await expect(dumper().processRepoData(repodata)).rejects.toThrow()
    })
  })

  describe('dumpAll', () => {
    it('should stop on the first package failure', async () => {
      const repodata = await writeRepodata(repoDir, {
        ls: packageEntry('ls-1.0_1', 'hash-ls'),
        zip: packageEntry('zip-1.0_1', 'hash-zip'),
      })
      await writePackage(repoDir, 'ls-1.0_1', manPackage())
      await writeFile(join(repoDir, 'zip-1.0_1.x86_64.xbps'), Buffer.from('PK\u0003\u0004 not xbps'))

      await expect(dumper().dumpAll([repodata])).rejects.toThrow(UnsupportedCompressionError)
    })

    it('should process several snapshots', async () => {
      const first = await writeRepodata(repoDir, { ls: packageEntry('ls-1.0_1', 'hash-ls') }, 'x86_64-repodata')
      const second = await writeRepodata(repoDir, { true: packageEntry('true-1.0_1', 'hash-true') }, 'i686-repodata')
      await writePackage(repoDir, 'ls-1.0_1', manPackage())
      await writePackage(repoDir, 'true-1.0_1', {
        manifest: { dirs: ['/usr/bin'] },
        entries: [],
      })
      const ledger = new CacheLedger()

      await dumper(ledger).dumpAll([first, second])

      expect(Object.keys(ledger.toRecords().cache)).toEqual(['hash-ls', 'hash-true'])
    })
  })
})
