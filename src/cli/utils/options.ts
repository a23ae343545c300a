/**
 * Commander option parsers shared by the CLI commands.
 *
 * Each parser throws commander's InvalidArgumentError, which commander
 * reports as a usage error.
 */

import { InvalidArgumentError } from 'commander'
import { PROVIDER_IDS } from '../../core/types.js'
import type { ProviderId } from '../../core/types.js'

export function parseFloatOption(value: string): number {
  const parsed = Number(value)
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`Expected a number, got "${value}".`)
  }
  return parsed
}

export function parseIntOption(value: string): number {
  const parsed = Number(value)
  if (!/^-?\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}".`)
  }
  return parsed
}

/** Build a parser that accepts one of `choices` */
export function parseChoice<T extends string>(choices: readonly T[]): (value: string) => T {
  return (value: string): T => {
    const found = choices.find((c) => c === value)
    if (found === undefined) {
      throw new InvalidArgumentError(`Allowed choices are ${choices.join(', ')}.`)
    }
    return found
  }
}

/** Parse a comma-separated provider list such as `gpt4,claude` */
export function parseProviderList(value: string): ProviderId[] {
  const parseId = parseChoice(PROVIDER_IDS)
  const ids = value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map(parseId)
  if (ids.length === 0) {
    throw new InvalidArgumentError('Expected at least one provider id.')
  }
  return [...new Set(ids)]
}
