/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { LogLevel } from 'consola'
import { parseLogLevels } from './levels'

describe('parseLogLevels', () => {
  it('parses comma separated entries', () => {
    expect(parseLogLevels('*:warn, leafhasher:debug')).toEqual([
      { tag: '*', level: LogLevel.Warn },
      { tag: 'leafhasher', level: LogLevel.Debug },
    ])
  })

  it('ignores case', () => {
    expect(parseLogLevels('LeafHasher:InFo')).toEqual([
      { tag: 'leafhasher', level: LogLevel.Info },
    ])
  })

  it('applies an entry without a tag to every tag', () => {
    expect(parseLogLevels('error')).toEqual([{ tag: '*', level: LogLevel.Error }])
  })

  it('throws on an unknown level', () => {
    expect(() => parseLogLevels('leafhasher:loud')).toThrow(
      'Unknown log level loud, expected one of fatal, error, warn, info, debug, trace, silent, verbose',
    )
  })

  it('throws when an entry has too many colons', () => {
    expect(() => parseLogLevels('leafhasher::warn')).toThrow(
      'Log level leafhasher::warn must have format tag:level',
    )
  })
})
