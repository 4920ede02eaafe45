/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import bufio from 'bufio'
import { readVarBytes } from './varBytes'

describe('readVarBytes', () => {
  it('reads a length prefixed byte string', () => {
    const reader = bufio.read(Buffer.from('03616263ff', 'hex'))

    expect(readVarBytes(reader, 3, 'test').toString()).toEqual('abc')
    expect(reader.left()).toBe(1)
  })

  it('does not share memory with the input', () => {
    const buffer = Buffer.from('03616263', 'hex')
    const bytes = readVarBytes(bufio.read(buffer, true), 3, 'test')

    buffer.fill(0x11)

    expect(bytes.toString()).toEqual('abc')
  })

  it('reads an empty byte string', () => {
    const reader = bufio.read(Buffer.from('00', 'hex'))
    expect(readVarBytes(reader, 0, 'test').byteLength).toBe(0)
  })

  it('throws when the length is larger than the max', () => {
    const reader = bufio.read(Buffer.from('03616263', 'hex'))
    expect(() => readVarBytes(reader, 2, 'test')).toThrow(
      'readVarBytes: test is larger than the max allowed size [count 3, max 2]',
    )
  })

  it('throws when the payload is shorter than its length', () => {
    const reader = bufio.read(Buffer.from('05616263', 'hex'))
    expect(() => readVarBytes(reader, 10, 'test')).toThrow()
  })
})
