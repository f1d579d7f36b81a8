/**
 * Cache directory resolution
 * @module cache/cache-path
 */

import { mkdir } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join } from 'node:path'
import type { Logger } from '../lookup/types.js'
import { createSilentLogger } from '../utils/logger.js'

/**
 * Subdirectory created inside the platform directories
 */
export const CACHE_APP_DIRECTORY = 'public-ip-lookup'

/**
 * Per-user cache and data directories of a platform
 */
export interface PlatformDirectories {
  cache?: string
  data?: string
}

/**
 * Platform cache and data directories, following XDG on Linux,
 * `~/Library` on macOS and the local app data folder on Windows
 */
export function platformDirectories(
  platform: NodeJS.Platform,
  env: NodeJS.ProcessEnv,
  home: string | undefined
): PlatformDirectories {
  switch (platform) {
    case 'win32': {
      const local = env.LOCALAPPDATA ?? (home ? join(home, 'AppData', 'Local') : undefined)
      const roaming = env.APPDATA ?? (home ? join(home, 'AppData', 'Roaming') : undefined)
      return { cache: local, data: roaming }
    }
    case 'darwin':
      return home
        ? { cache: join(home, 'Library', 'Caches'), data: join(home, 'Library', 'Application Support') }
        : {}
    default:
      return {
        cache: absolute(env.XDG_CACHE_HOME) ?? (home ? join(home, '.cache') : undefined),
        data: absolute(env.XDG_DATA_HOME) ?? (home ? join(home, '.local', 'share') : undefined),
      }
  }
}

// XDG ignores relative paths
function absolute(value: string | undefined): string | undefined {
  return value && value.startsWith('/') ? value : undefined
}

/**
 * Environment the directory resolution runs against
 */
export interface CachePathDeps {
  platform: NodeJS.Platform
  env: NodeJS.ProcessEnv
  home?: string
  cwd: string
  makeDirectory: (path: string) => Promise<unknown>
  logger?: Logger
}

function defaultHome(): string | undefined {
  const home = homedir()
  return home.length > 0 ? home : undefined
}

/**
 * Picks the first usable directory: platform cache directory, then data
 * directory, then the home directory, then the working directory.
 * The first two get an application subdirectory, created on demand.
 */
export async function resolveCacheDirectory(deps: Partial<CachePathDeps> = {}): Promise<string> {
  const platform = deps.platform ?? process.platform
  const env = deps.env ?? process.env
  const home = 'home' in deps ? deps.home : defaultHome()
  const cwd = deps.cwd ?? process.cwd()
  const makeDirectory = deps.makeDirectory ?? ((path: string) => mkdir(path, { recursive: true }))
  const logger = deps.logger ?? createSilentLogger()

  const dirs = platformDirectories(platform, env, home)
  for (const base of [dirs.cache, dirs.data]) {
    if (!base) {
      continue
    }
    const candidate = join(base, CACHE_APP_DIRECTORY)
    try {
      await makeDirectory(candidate)
      return candidate
    } catch (error) {
      logger.debug('Cache directory not usable', {
        path: candidate,
        error: error instanceof Error ? error.message : String(error),
      })
    }
  }

  return home ?? cwd
}
