/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/* eslint-disable no-console */

import chalk from 'chalk'
import { ConsolaReporter, ConsolaReporterLogObject, LogLevel } from 'consola'
import { format } from 'date-fns'
import { LogLevelOverride } from './levels'

export type LogWriter = (level: LogLevel, args: unknown[]) => void

const writeToConsole: LogWriter = (level, args) => {
  if (level <= LogLevel.Error) {
    console.error(...args)
  } else if (level === LogLevel.Warn) {
    console.warn(...args)
  } else {
    console.log(...args)
  }
}

function colorLevel(level: LogLevel, text: string): string {
  if (level <= LogLevel.Error) {
    return chalk.red(text)
  }
  if (level === LogLevel.Warn) {
    return chalk.yellow(text)
  }
  if (level >= LogLevel.Debug) {
    return chalk.gray(text)
  }
  return chalk.cyan(text)
}

/**
 * Prints logs as `HH:mm:ss.SSS level [tag] message`, filtered by a level per
 * tag.
 */
export class WireReporter implements ConsolaReporter {
  defaultLevel: LogLevel = LogLevel.Info
  readonly overrides = new Map<string, LogLevel>()
  colorEnabled = false

  private readonly write: LogWriter

  constructor(write: LogWriter = writeToConsole) {
    this.write = write
  }

  /**
   * Replaces every level set so far
   */
  configure(levels: ReadonlyArray<LogLevelOverride>): void {
    this.defaultLevel = LogLevel.Info
    this.overrides.clear()

    for (const { tag, level } of levels) {
      if (tag === '*') {
        this.defaultLevel = level
      } else {
        this.overrides.set(tag, level)
      }
    }
  }

  levelFor(tag: string): LogLevel {
    // consola joins nested tags with ':', the innermost override wins
    const tags = tag.split(':').reverse()

    for (const t of tags) {
      const level = this.overrides.get(t)
      if (level !== undefined) {
        return level
      }
    }

    return this.defaultLevel
  }

  formatPrefix(logObj: ConsolaReporterLogObject): string {
    const time = format(logObj.date, 'HH:mm:ss.SSS')
    const tag = logObj.tag ? ` [${logObj.tag}]` : ''

    if (this.colorEnabled) {
      return `${chalk.gray(time)} ${colorLevel(logObj.level, logObj.type)}${tag}`
    }

    return `${time} ${logObj.type}${tag}`
  }

  log(logObj: ConsolaReporterLogObject): void {
    if (logObj.level > this.levelFor(logObj.tag)) {
      return
    }

    this.write(logObj.level, [this.formatPrefix(logObj), ...logObj.args])
  }
}
