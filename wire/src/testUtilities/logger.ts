/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import consola, { ConsolaReporterLogObject, LogLevel } from 'consola'
import { Logger } from '../logger'

/**
 * A logger that keeps every log object instead of printing it
 */
export function createTestLogger(): { logger: Logger; logs: ConsolaReporterLogObject[] } {
  const logs: ConsolaReporterLogObject[] = []

  const logger = consola.create({
    reporters: [
      {
        log: (logObj: ConsolaReporterLogObject) => {
          logs.push(logObj)
        },
      },
    ],
    level: LogLevel.Verbose,
  })

  return { logger, logs }
}
