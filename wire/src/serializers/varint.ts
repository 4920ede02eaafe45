/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import bufio from 'bufio'
import { MessageFormatError } from '../errors'

/*
 * Bitcoin style variable length integers (CompactSize). bufio already covers
 * values that fit in a javascript number, these helpers cover the rest of the
 * unsigned 64 bit range.
 *
 * Value                  Encoding
 * < 0xfd                 [value]                  1 byte
 * <= 0xffff              [0xfd, u16le]            3 bytes
 * <= 0xffffffff          [0xfe, u32le]            5 bytes
 * <= 0xffffffffffffffff  [0xff, u64le]            9 bytes
 */

export const MAX_UINT64 = 0xffffffffffffffffn

const MAX_UINT16 = 0xffffn
const MAX_UINT32 = 0xffffffffn

export function sizeBigVarint(value: bigint): number {
  if (value < 0xfdn) {
    return 1
  }
  if (value <= MAX_UINT16) {
    return 3
  }
  if (value <= MAX_UINT32) {
    return 5
  }
  return 9
}

export function writeBigVarint(
  bw: bufio.StaticWriter | bufio.BufferWriter,
  value: bigint,
): bufio.StaticWriter | bufio.BufferWriter {
  if (value < 0n || value > MAX_UINT64) {
    throw new MessageFormatError('writeVarint', `${value} is not an unsigned 64 bit integer`)
  }

  if (value < 0xfdn) {
    bw.writeU8(Number(value))
  } else if (value <= MAX_UINT16) {
    bw.writeU8(0xfd)
    bw.writeU16(Number(value))
  } else if (value <= MAX_UINT32) {
    bw.writeU8(0xfe)
    bw.writeU32(Number(value))
  } else {
    bw.writeU8(0xff)
    bw.writeBigU64(value)
  }

  return bw
}

/**
 * Reads a varint and rejects encodings that use more bytes than the value
 * needs, so every value has exactly one valid encoding.
 */
export function readBigVarint(reader: bufio.BufferReader): bigint {
  const discriminant = reader.readU8()

  let value: bigint
  let min: bigint

  switch (discriminant) {
    case 0xff:
      value = reader.readBigU64()
      min = MAX_UINT32 + 1n
      break
    case 0xfe:
      value = BigInt(reader.readU32())
      min = MAX_UINT16 + 1n
      break
    case 0xfd:
      value = BigInt(reader.readU16())
      min = 0xfdn
      break
    default:
      return BigInt(discriminant)
  }

  if (value < min) {
    throw new MessageFormatError(
      'readVarint',
      `non-canonical varint ${value.toString(16)} - discriminant ${discriminant.toString(
        16,
      )} must encode a value greater than ${(min - 1n).toString(16)}`,
    )
  }

  return value
}

/**
 * Reads a varint that must fit in an unsigned 32 bit integer
 */
export function readVarintU32(reader: bufio.BufferReader, label: string): number {
  const value = readBigVarint(reader)

  if (value > MAX_UINT32) {
    throw new MessageFormatError(
      'readVarint',
      `${label} ${value} is larger than the max allowed value ${MAX_UINT32}`,
    )
  }

  return Number(value)
}
