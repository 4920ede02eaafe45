/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { Consola } from 'consola'
import consola, { LogLevel } from 'consola'
import { parseLogLevels } from './levels'
import { WireReporter } from './reporter'
export * from './levels'
export * from './reporter'

export type Logger = Consola

export const WireReporterInstance = new WireReporter()

/**
 * @param config formatted like `*:warn,leafhasher:debug`
 */
export function setLogLevels(config: string): void {
  WireReporterInstance.configure(parseLogLevels(config))
}

export function setLogColorEnabled(enabled: boolean): void {
  WireReporterInstance.colorEnabled = enabled
}

export function createRootLogger(): Logger {
  return consola.create({
    reporters: [WireReporterInstance],
    // the reporter filters per tag
    level: LogLevel.Verbose,
  })
}
