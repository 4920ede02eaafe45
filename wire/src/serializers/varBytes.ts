/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import bufio from 'bufio'
import { MessageFormatError } from '../errors'
import { readBigVarint } from './varint'

/**
 * Reads a length prefixed byte string, refusing lengths above `maxLength`
 * before any of the payload is read. The bytes are copied out of the reader.
 *
 * @param label names the field in the error message
 */
export function readVarBytes(
  reader: bufio.BufferReader,
  maxLength: number,
  label: string,
): Buffer {
  const count = readBigVarint(reader)

  if (count > BigInt(maxLength)) {
    throw new MessageFormatError(
      'readVarBytes',
      `${label} is larger than the max allowed size [count ${count}, max ${maxLength}]`,
    )
  }

  return Buffer.from(reader.readBytes(Number(count)))
}
