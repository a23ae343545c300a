/**
 * Code context assembly for one repair iteration.
 *
 * Primary source: the context search, queried once with the bug description
 * and once per leading failure message. Fallback, when the search is absent,
 * throws or finds nothing: the source and test files named by the failures.
 */

import type pino from 'pino'
import type { FailingTest } from '../../core/types.js'
import type { SourceReader } from '../test-runner/types.js'
import type { ContextSearch, ContextSearchSettings } from './types.js'

export const DEFAULT_CONTEXT_SEARCH_SETTINGS: ContextSearchSettings = {
  limit: 5,
  scoreThreshold: 0.7,
  maxFailureQueries: 3,
}

export interface AssembleContextOptions {
  reader: SourceReader
  search?: ContextSearch
  settings: ContextSearchSettings
  logger: pino.Logger
}

/** Queries sent to the context search, in order */
export function contextQueries(
  bugDescription: string,
  failures: readonly FailingTest[],
  maxFailureQueries: number,
): string[] {
  const messages = failures
    .slice(0, maxFailureQueries)
    .map((f) => f.message)
    .filter((m) => m.length > 0)
  return bugDescription.trim().length === 0 ? messages : [bugDescription, ...messages]
}

async function searchContext(
  search: ContextSearch,
  queries: readonly string[],
  options: AssembleContextOptions,
): Promise<Record<string, string>> {
  const context: Record<string, string> = {}
  for (const query of queries) {
    const hits = await search.search(query, options.settings.limit, options.settings.scoreThreshold)
    for (const hit of hits) {
      if (hit.filePath.length === 0 || hit.filePath in context) continue
      const content =
        hit.content !== undefined && hit.content.length > 0 ? hit.content : await options.reader.read(hit.filePath)
      if (content !== undefined) context[hit.filePath] = content
    }
  }
  return context
}

async function failureFiles(
  failures: readonly FailingTest[],
  reader: SourceReader,
): Promise<Record<string, string>> {
  const paths = new Set<string>()
  for (const failure of failures) {
    if (failure.sourceFile !== undefined && failure.sourceFile.length > 0) paths.add(failure.sourceFile)
    if (failure.file.length > 0) paths.add(failure.file)
  }

  const context: Record<string, string> = {}
  for (const path of paths) {
    const content = await reader.read(path)
    if (content !== undefined) context[path] = content
  }
  return context
}

/**
 * Collect file path → content for the failing tests. An empty map is a
 * valid result.
 */
export async function assembleContext(
  bugDescription: string,
  failures: readonly FailingTest[],
  options: AssembleContextOptions,
): Promise<Record<string, string>> {
  const queries = contextQueries(bugDescription, failures, options.settings.maxFailureQueries)

  if (options.search !== undefined && queries.length > 0) {
    try {
      const found = await searchContext(options.search, queries, options)
      if (Object.keys(found).length > 0) {
        options.logger.debug({ files: Object.keys(found) }, 'Context from search')
        return found
      }
    } catch (err) {
      options.logger.warn({ err }, 'Context search failed; loading failure files instead')
    }
  }

  const context = await failureFiles(failures, options.reader)
  options.logger.debug({ files: Object.keys(context) }, 'Context from failure records')
  return context
}
