/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
declare module 'bufio' {
  class StaticWriter {
    render(): Buffer
    slice(): Buffer
    writeU8(value: number): StaticWriter
    writeU16(value: number): StaticWriter
    writeU32(value: number): StaticWriter
    writeBigU64(value: bigint): StaticWriter
    writeVarint(value: number): StaticWriter
    writeVarBytes(value: Buffer): StaticWriter
    writeBytes(value: Buffer): StaticWriter
    writeHash(value: Buffer | string): StaticWriter
    getSize(): number
  }

  class BufferWriter {
    render(): Buffer
    slice(): Buffer
    writeU8(value: number): BufferWriter
    writeU16(value: number): BufferWriter
    writeU32(value: number): BufferWriter
    writeBigU64(value: bigint): BufferWriter
    writeVarint(value: number): BufferWriter
    writeVarBytes(value: Buffer): BufferWriter
    writeBytes(value: Buffer): BufferWriter
    writeHash(value: Buffer | string): BufferWriter
    getSize(): number
  }

  class BufferReader {
    offset: number

    seek(offset: number): BufferReader
    left(): number
    readU8(): number
    readU16(): number
    readU32(): number
    readBigU64(): bigint
    readVarint(): number
    readBytes(size: number, zeroCopy?: boolean): Buffer
    readVarBytes(): Buffer

    readHash(enc: BufferEncoding): string
    readHash(enc?: null): Buffer
  }

  export function write(size?: number): StaticWriter | BufferWriter
  export function read(data: Buffer, zeroCopy?: boolean): BufferReader

  export function sizeVarint(value: number): number
  export function sizeVarBytes(value: Buffer): number

  class EncodingError extends Error {}
}
