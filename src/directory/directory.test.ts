import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { fileURLToPath } from 'node:url'

const mocks = vi.hoisted(() => {
  class FakePublished {
    private onError: ((err: Error) => void) | null = null
    readonly stop = vi.fn((done?: () => void) => {
      done?.()
    })

    constructor(readonly name: string) {}

    on(event: string, handler: (err: Error) => void): this {
      if (event === 'error') this.onError = handler
      return this
    }

    fail(message: string): void {
      this.onError?.(new Error(message))
    }
  }

  const published: FakePublished[] = []
  const browser = { stop: vi.fn() }
  const visible: string[] = []

  return {
    published,
    browser,
    visible,
    find: vi.fn((_options: { type: string }, onUp: (service: { name: string }) => void) => {
      for (const name of visible) onUp({ name })
      return browser
    }),
    publish: vi.fn((options: { name: string }) => {
      const service = new FakePublished(options.name)
      published.push(service)
      return service
    }),
    unpublishAll: vi.fn((done?: () => void) => {
      done?.()
    }),
    destroy: vi.fn(),
  }
})

vi.mock('bonjour-service', () => ({
  Bonjour: vi.fn(function () {
    return {
      find: mocks.find,
      publish: mocks.publish,
      unpublishAll: mocks.unpublishAll,
      destroy: mocks.destroy,
    }
  }),
}))

import { MemoryDirectory, parseMemoryOptions } from './memory.js'
import { BonjourDirectory, parseBonjourOptions } from './bonjour.js'
import { isDirectoryService, openDirectoryService } from './open.js'

const fixture = (name: string): string =>
  fileURLToPath(new URL(`../../tests/fixtures/${name}`, import.meta.url))

describe('MemoryDirectory', () => {
  it('finds seeded entries followed by its own registrations', () => {
    const directory = new MemoryDirectory({ seed: [{ identity: 'peer', leaseSeconds: 90 }] })
    directory.register('printer-a', 30)

    expect(directory.findServices()).toEqual({
      entries: [
        { identity: 'peer', leaseSeconds: 90 },
        { identity: 'printer-a', leaseSeconds: 30 },
      ],
    })
  })

  it('grants the requested lease and forgets deregistered identities', () => {
    const directory = new MemoryDirectory()
    expect(directory.register('printer-a', 30)).toEqual({ grantedLeaseSeconds: 30 })
    expect(directory.deregister('printer-a')).toEqual({})
    expect(directory.findServices()).toEqual({ entries: [] })
  })

  it('advertises its configured minimum refresh interval', () => {
    expect(new MemoryDirectory().minRefreshInterval()).toBe(0)
    expect(new MemoryDirectory({ minRefreshSeconds: 15 }).minRefreshInterval()).toBe(15)
  })

  it('validates its options', () => {
    expect(parseMemoryOptions({})).toEqual({ seed: [], minRefreshSeconds: 0 })
    expect(() => parseMemoryOptions({ minRefreshSeconds: -1 })).toThrow(
      /^Invalid memory directory options: \/minRefreshSeconds/,
    )
  })
})

describe('BonjourDirectory', () => {
  let directory: BonjourDirectory

  beforeEach(() => {
    vi.clearAllMocks()
    mocks.published.length = 0
    mocks.visible.length = 0
    directory = new BonjourDirectory(parseBonjourOptions({ port: 7400 }))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('browses for browseMs and reports each name once with the default lease', async () => {
    vi.useFakeTimers()
    mocks.visible.push('printer-a', 'printer-a', 'scanner-b')

    const found = directory.findServices()
    await vi.advanceTimersByTimeAsync(2000)

    await expect(found).resolves.toEqual({
      entries: [
        { identity: 'printer-a', leaseSeconds: 120 },
        { identity: 'scanner-b', leaseSeconds: 120 },
      ],
    })
    expect(mocks.find).toHaveBeenCalledWith({ type: 'discovery-bridge' }, expect.any(Function))
    expect(mocks.browser.stop).toHaveBeenCalledTimes(1)
  })

  it('publishes an identity once and only refreshes the lease afterwards', () => {
    expect(directory.register('printer-a', 30)).toEqual({ grantedLeaseSeconds: 30 })
    expect(directory.register('printer-a', 45)).toEqual({ grantedLeaseSeconds: 45 })

    expect(mocks.publish).toHaveBeenCalledTimes(1)
    expect(mocks.publish).toHaveBeenCalledWith({ name: 'printer-a', type: 'discovery-bridge', port: 7400 })
  })

  it('surfaces a publish error as the confirmation error', () => {
    directory.register('printer-a', 30)
    mocks.published[0].fail('name in use')

    expect(directory.register('printer-a', 30)).toEqual({
      grantedLeaseSeconds: 30,
      callbackError: 'name in use',
    })
  })

  it('stops a published identity on deregister', async () => {
    directory.register('printer-a', 30)

    await expect(directory.deregister('printer-a')).resolves.toEqual({})
    expect(mocks.published[0].stop).toHaveBeenCalledTimes(1)
    await expect(directory.deregister('printer-a')).resolves.toEqual({})
    expect(mocks.published[0].stop).toHaveBeenCalledTimes(1)
  })

  it('unpublishes everything and releases bonjour on close', async () => {
    directory.register('printer-a', 30)
    await directory.close()

    expect(mocks.unpublishAll).toHaveBeenCalledTimes(1)
    expect(mocks.destroy).toHaveBeenCalledTimes(1)
  })

  it('has no minimum refresh interval', () => {
    expect(directory.minRefreshInterval()).toBe(0)
  })

  it('requires a port', () => {
    expect(() => parseBonjourOptions({})).toThrow(/^Invalid bonjour directory options: /)
  })
})

describe('openDirectoryService', () => {
  it('opens the memory backend with its options', async () => {
    const service = await openDirectoryService({
      backend: 'memory',
      options: { seed: [{ identity: 'peer', leaseSeconds: 40 }] },
    })
    expect(service).toBeInstanceOf(MemoryDirectory)
    expect(await service.findServices()).toEqual({ entries: [{ identity: 'peer', leaseSeconds: 40 }] })
  })

  it('rejects invalid backend options', async () => {
    await expect(
      openDirectoryService({ backend: 'bonjour', options: { port: 'not-a-port' } }),
    ).rejects.toThrow(/^Invalid bonjour directory options/)
  })

  it('loads a module by path and hands it the options', async () => {
    const service = await openDirectoryService({
      backend: 'module',
      module: fixture('static-directory.ts'),
      options: { label: 'from-module' },
    })
    expect(isDirectoryService(service)).toBe(true)
    expect(await service.findServices()).toEqual({
      entries: [{ identity: 'from-module', leaseSeconds: 25 }],
    })
  })

  it('rejects a module whose factory returns something else', async () => {
    const modulePath = fixture('not-a-directory.ts')
    await expect(
      openDirectoryService({ backend: 'module', module: modulePath, options: {} }),
    ).rejects.toThrow(`Factory in ${modulePath} did not return a DirectoryService`)
  })

  it('rejects a module without a factory export', async () => {
    await expect(
      openDirectoryService({ backend: 'module', module: 'node:os', options: {} }),
    ).rejects.toThrow('Module node:os exports neither createDirectoryService nor a default factory')
  })

  it('requires a module path for the module backend', async () => {
    await expect(openDirectoryService({ backend: 'module', options: {} })).rejects.toThrow(
      'service.module is required for backend "module"',
    )
  })
})
