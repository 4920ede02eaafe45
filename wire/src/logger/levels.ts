/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { LogLevel } from 'consola'

const LEVELS = new Map<string, LogLevel>([
  ['fatal', LogLevel.Fatal],
  ['error', LogLevel.Error],
  ['warn', LogLevel.Warn],
  ['info', LogLevel.Info],
  ['debug', LogLevel.Debug],
  ['trace', LogLevel.Trace],
  ['silent', LogLevel.Silent],
  ['verbose', LogLevel.Verbose],
])

export interface LogLevelOverride {
  /**
   * `*` for every tag
   */
  tag: string
  level: LogLevel
}

/**
 * Parses a comma separated list of `tag:level` entries, such as
 * `*:warn,leafhasher:debug`. An entry without a tag applies to every tag.
 */
export function parseLogLevels(config: string): LogLevelOverride[] {
  return config.split(',').map((entry) => {
    const parts = entry.trim().split(':')
    if (parts.length > 2) {
      throw new Error(`Log level ${entry} must have format tag:level`)
    }

    const [tag, name] = parts.length === 1 ? ['*', parts[0]] : [parts[0], parts[1]]

    const level = LEVELS.get(name.toLowerCase())
    if (level === undefined) {
      const names = [...LEVELS.keys()].join(', ')
      throw new Error(`Unknown log level ${name}, expected one of ${names}`)
    }

    return { tag: tag.toLowerCase(), level }
  })
}
