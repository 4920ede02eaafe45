/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import * as yup from 'yup'
import { parseLogLevels, setLogColorEnabled, setLogLevels } from './logger'
import { YupUtils } from './utils/yup'

export type ConfigOptions = {
  /**
   * Log levels are formatted like so:
   * `*:warn,tag:info`
   *
   * ex: `warn` or `*:warn` displays only logs that are warns or errors.
   *
   * ex: `*:warn,leafhasher:debug` displays warns and errors, as well as every
   *     hashed leaf.
   */
  logLevel: string
  enableLogColor: boolean
}

export const ConfigOptionsSchema: yup.ObjectSchema<Partial<ConfigOptions>, unknown> = yup
  .object({
    logLevel: yup
      .string()
      .test('logLevel', 'logLevel must be formatted as tag:level,...', (value) => {
        if (value === undefined) {
          return true
        }

        try {
          parseLogLevels(value)
          return true
        } catch {
          return false
        }
      }),
    enableLogColor: yup.boolean(),
  })
  .defined()

export function getDefaultConfig(): ConfigOptions {
  return {
    logLevel: '*:info',
    enableLogColor: false,
  }
}

/**
 * Validates `overrides` and lays them over the defaults. Unknown keys are
 * dropped.
 */
export async function loadConfig(overrides: unknown = {}): Promise<ConfigOptions> {
  const validation = await YupUtils.tryValidate(ConfigOptionsSchema, overrides)

  if (validation.error !== null) {
    throw new Error(`Invalid config: ${validation.error.message}`)
  }

  const result = validation.result
  const defaults = getDefaultConfig()

  return {
    logLevel: result.logLevel ?? defaults.logLevel,
    enableLogColor: result.enableLogColor ?? defaults.enableLogColor,
  }
}

export function applyLoggerConfig(config: ConfigOptions): void {
  setLogLevels(config.logLevel)
  setLogColorEnabled(config.enableLogColor)
}
