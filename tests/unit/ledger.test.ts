/**
 * Cache ledger tests
 */

import { describe, it, expect } from 'vitest'
import { CacheLedger } from '../../src/cache/ledger'

describe('CacheLedger', () => {
  describe('lookup', () => {
    it('should answer from the prior cache only', () => {
      const ledger = new CacheLedger({ hashA: ['man1/a.1'] })
      ledger.record('hashB', ['man1/b.1'])

      expect(ledger.lookup('hashA')).toEqual(['man1/a.1'])
      expect(ledger.lookup('hashB')).toBeUndefined()
    })

    it('should not share arrays with the caller', () => {
      const prior = { hashA: ['man1/a.1'] }
      const ledger = new CacheLedger(prior)
      prior.hashA.push('man1/b.1')
      expect(ledger.lookup('hashA')).toEqual(['man1/a.1'])
    })
  })

  describe('record', () => {
    it('should append paths as given', () => {
      const ledger = new CacheLedger()
      ledger.record('h', ['man1/a.1', 'man1/b.1'])
      ledger.record('h', ['man1/c.1'])
      expect(ledger.toRecords().cache).toEqual({ h: ['man1/a.1', 'man1/b.1', 'man1/c.1'] })
    })

    it('should reproduce a cached list verbatim', () => {
      const ledger = new CacheLedger({ h: ['man1/a.1', 'man1/a.1'] })
      ledger.accept({ hash: 'h', paths: [...(ledger.lookup('h') ?? [])], status: 'cached' })
      expect(ledger.toRecords().cache).toEqual({ h: ['man1/a.1', 'man1/a.1'] })
    })

    it('should store an empty entry for a package without pages', () => {
      const ledger = new CacheLedger()
      ledger.record('h')
      expect(ledger.toRecords()).toEqual({ version: 1, cache: { h: [] } })
    })
  })

  describe('accept', () => {
    it('should record cached, extracted and irrelevant packages', () => {
      const ledger = new CacheLedger({ c: ['man1/c.1'] })
      ledger.accept({ hash: 'c', paths: ['man1/c.1'], status: 'cached' })
      ledger.accept({ hash: 'e', paths: ['man8/e.8'], status: 'extracted' })
      ledger.accept({ hash: 'i', paths: [], status: 'irrelevant' })

      expect(ledger.toRecords().cache).toEqual({ c: ['man1/c.1'], e: ['man8/e.8'], i: [] })
    })

    it('should record a missing archive as an empty entry', () => {
      const ledger = new CacheLedger()
      ledger.accept({ hash: 'm', paths: [], status: 'missing' })
      expect(ledger.toRecords().cache).toEqual({ m: [] })
    })

    it('should record skipped packages only when already cached', () => {
      const ledger = new CacheLedger({ old: ['man1/old.1'] })
      ledger.accept({ hash: 'old', paths: ['man1/old.1'], status: 'skipped' })
      ledger.accept({ hash: 'new', paths: [], status: 'skipped' })
      expect(ledger.toRecords().cache).toEqual({ old: ['man1/old.1'] })
    })
  })

  describe('pruning', () => {
    it('should report files of an entry that lost its pages', () => {
      const ledger = new CacheLedger({ hashA: ['man1/a.1'] }, { prune: true })
      ledger.accept({ hash: 'hashA', paths: [], status: 'extracted' })
      ledger.carryForward()

      expect(ledger.staleFiles()).toEqual(['man1/a.1'])
      expect(ledger.toRecords()).toEqual({ version: 1, cache: { hashA: [] } })
    })

    it('should drop entries not seen this run', () => {
      const ledger = new CacheLedger({ h1: ['man1/x.1'], h2: ['man5/y.5', 'man5/z.5'] }, { prune: true })
      ledger.accept({ hash: 'h1', paths: ['man1/x.1'], status: 'cached' })
      ledger.carryForward()

      expect(ledger.staleFiles()).toEqual(['man5/y.5', 'man5/z.5'])
      expect(ledger.toRecords().cache).toEqual({ h1: ['man1/x.1'] })
    })

    it('should keep a path that another package still claims', () => {
      const ledger = new CacheLedger({ old: ['man1/a.1', 'man1/b.1'] }, { prune: true })
      ledger.accept({ hash: 'new', paths: ['man1/a.1'], status: 'extracted' })
      ledger.carryForward()

      expect(ledger.staleFiles()).toEqual(['man1/b.1'])
    })
  })

  describe('carryForward', () => {
    it('should keep untouched entries without pruning', () => {
      const ledger = new CacheLedger({ h1: ['man1/x.1'], h2: ['man5/y.5'] })
      ledger.accept({ hash: 'h1', paths: ['man1/x.1'], status: 'cached' })
      ledger.carryForward()

      expect(ledger.staleFiles()).toEqual([])
      expect(ledger.toRecords().cache).toEqual({ h1: ['man1/x.1'], h2: ['man5/y.5'] })
    })

    it('should not override this run\'s entry', () => {
      const ledger = new CacheLedger({ h1: ['man1/x.1'] })
      ledger.accept({ hash: 'h1', paths: ['man1/x.1', 'man1/w.1'], status: 'extracted' })
      ledger.carryForward()
      expect(ledger.toRecords().cache).toEqual({ h1: ['man1/x.1', 'man1/w.1'] })
    })
  })

  describe('toRecords', () => {
    it('should sort hashes', () => {
      const ledger = new CacheLedger()
      ledger.record('c')
      ledger.record('a')
      ledger.record('b')
      expect(Object.keys(ledger.toRecords().cache)).toEqual(['a', 'b', 'c'])
    })
  })
})
