import { isAbsolute, resolve } from 'node:path'
import { pathToFileURL } from 'node:url'
import type { ServiceSpec } from '../types/config.js'
import type { DirectoryService } from '../types/directory.js'
import { MemoryDirectory, parseMemoryOptions } from './memory.js'
import { BonjourDirectory, parseBonjourOptions } from './bonjour.js'

const REQUIRED_METHODS = ['findServices', 'register', 'deregister', 'minRefreshInterval'] as const

/** Structural check for objects handed back by user modules. */
export function isDirectoryService(value: unknown): value is DirectoryService {
  if (value === null || typeof value !== 'object') return false
  return REQUIRED_METHODS.every(
    (method) => method in value && typeof Reflect.get(value, method) === 'function',
  )
}

/** Relative and absolute paths become file URLs; bare names stay package specifiers. */
function toImportSpecifier(modulePath: string): string {
  if (isAbsolute(modulePath) || modulePath.startsWith('.')) {
    return pathToFileURL(resolve(modulePath)).href
  }
  return modulePath
}

async function loadModuleService(
  modulePath: string,
  options: Record<string, unknown>,
): Promise<DirectoryService> {
  const loaded: unknown = await import(toImportSpecifier(modulePath))
  if (loaded === null || typeof loaded !== 'object') {
    throw new Error(`Module ${modulePath} did not load as an ES module namespace`)
  }

  const factory: unknown =
    Reflect.get(loaded, 'createDirectoryService') ?? Reflect.get(loaded, 'default')
  if (typeof factory !== 'function') {
    throw new Error(`Module ${modulePath} exports neither createDirectoryService nor a default factory`)
  }

  const service: unknown = await factory(options)
  if (!isDirectoryService(service)) {
    throw new Error(`Factory in ${modulePath} did not return a DirectoryService`)
  }
  return service
}

/**
 * Open the DirectoryService described by the `service` config section.
 * Runs on the worker thread; the returned handle never leaves it.
 *
 * @throws Error when the options are invalid or the module cannot provide a service
 */
export async function openDirectoryService(spec: ServiceSpec): Promise<DirectoryService> {
  switch (spec.backend) {
    case 'memory':
      return new MemoryDirectory(parseMemoryOptions(spec.options))
    case 'bonjour':
      return new BonjourDirectory(parseBonjourOptions(spec.options))
    case 'module': {
      if (spec.module === undefined) {
        throw new Error('service.module is required for backend "module"')
      }
      return loadModuleService(spec.module, spec.options)
    }
  }
}
