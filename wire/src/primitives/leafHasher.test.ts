/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { LogLevel } from 'consola'
import { createTestLogger } from '../testUtilities/logger'
import { HashUtils } from '../utils/hash'
import { LeafData } from './leafData'
import { LeafHasher } from './leafHasher'

function createLeaf(hashByte: number, height: number): LeafData {
  return new LeafData({
    blockHash: Buffer.alloc(32),
    outpoint: { hash: Buffer.alloc(32, hashByte), index: 1 },
    height,
    isCoinbase: false,
    amount: 5000000000n,
    pkScript: Buffer.from('76a914', 'hex'),
  })
}

describe('LeafHasher', () => {
  it('returns the leaf hash', () => {
    const { logger } = createTestLogger()
    const leaf = createLeaf(0xab, 5)

    const hash = new LeafHasher({ logger }).hash(leaf)

    expect(hash.toString('hex')).toEqual(
      '196663bcecbd8cd140a5b021e66bb3a15674ad59012ca7d780d3f3878308cc5f',
    )
  })

  it('logs each hash at debug level', () => {
    const { logger, logs } = createTestLogger()
    const leaf = createLeaf(0xab, 5)

    const hash = new LeafHasher({ logger }).hash(leaf)

    expect(logs).toHaveLength(1)
    expect(logs[0].tag).toEqual('leafhasher')
    expect(logs[0].level).toBe(LogLevel.Debug)
    expect(logs[0].args).toEqual([
      `Hashed leaf ${'ab'.repeat(32)}:1 at height 5: ${HashUtils.renderHash(hash)}`,
    ])
  })

  it('hashes leaves in order', () => {
    const { logger, logs } = createTestLogger()
    const leaves = [createLeaf(1, 10), createLeaf(2, 20)]

    const hashes = new LeafHasher({ logger }).hashAll(leaves)

    expect(hashes).toHaveLength(2)
    expect(hashes[0].equals(leaves[0].hash())).toBe(true)
    expect(hashes[1].equals(leaves[1].hash())).toBe(true)
    expect(logs).toHaveLength(2)
  })

  it('does not log when the leaf is rejected', () => {
    const { logger, logs } = createTestLogger()

    expect(() => new LeafHasher({ logger }).hash(LeafData.empty())).toThrow(
      'writeLeafData: outpoint hash is the zero hash',
    )
    expect(logs).toHaveLength(0)
  })
})
