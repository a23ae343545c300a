/**
 * FsSourceReader: reads project files for the code context.
 */

import { readFile } from 'node:fs/promises'
import { isAbsolute, relative, resolve } from 'node:path'
import type pino from 'pino'
import { createLogger } from '../../utils/logger.js'
import type { SourceReader } from './types.js'

export class FsSourceReader implements SourceReader {
  private readonly _root: string
  private readonly _logger: pino.Logger

  constructor(projectRoot: string, logger?: pino.Logger) {
    this._root = resolve(projectRoot)
    this._logger = logger ?? createLogger('source-reader')
  }

  async read(path: string): Promise<string | undefined> {
    const absolute = resolve(this._root, path)
    const rel = relative(this._root, absolute)
    if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
      this._logger.warn({ path }, 'Refusing to read a path outside the project root')
      return undefined
    }

    try {
      return await readFile(absolute, 'utf-8')
    } catch (err) {
      this._logger.debug({ path, err }, 'Source file could not be read')
      return undefined
    }
  }
}

export function createFsSourceReader(projectRoot: string, logger?: pino.Logger): SourceReader {
  return new FsSourceReader(projectRoot, logger)
}
