/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import bufio, { sizeVarint } from 'bufio'
import crypto from 'crypto'
import { InvariantViolationError, MessageFormatError } from '../errors'
import {
  readBigVarint,
  readVarBytes,
  readVarintU32,
  sizeBigVarint,
  writeBigVarint,
} from '../serializers'
import { BlockHash, HASH_SIZE, isZeroHash } from './hash'
import { emptyOutpoint, MAX_OUTPOINT_INDEX, Outpoint, renderOutpoint } from './outpoint'

/**
 * The largest pkScript a leaf may carry, in bytes
 */
export const MAX_SCRIPT_SIZE = 10000

export const MAX_HEIGHT = 0x7fffffff

const MIN_AMOUNT = -(2n ** 63n)
const MAX_AMOUNT = 2n ** 63n - 1n

/**
 * SHA-512/256 rather than SHA-256, so a leaf hash can never be mistaken for
 * an interior node of the accumulator. Changing this changes every leaf.
 */
export const LEAF_HASH_ALGORITHM = 'sha512-256'

export type LeafHash = Buffer

/**
 * The part of a leaf that cannot be recovered from the spending transaction
 */
export interface CompactLeafData {
  height: number
  isCoinbase: boolean
  amount: bigint
  pkScript: Buffer
}

export interface RawLeafData extends CompactLeafData {
  /**
   * Not serialized yet, so it is not part of the leaf hash either
   */
  blockHash: BlockHash
  outpoint: Outpoint
}

/*
 * Full serialization, everything the leaf hash commits to:
 *
 * Field              Type       Size
 * outpoint           -          33-37
 *   tx hash          [32]byte   32
 *   index            varint     variable
 * stxo               -          variable
 *   header code      varint     variable
 *   amount           varint     variable
 *   pkscript length  varint     variable
 *   pkscript         []byte     variable
 *
 * Compact serialization is just the stxo, the outpoint is taken from the
 * input spending it.
 *
 * The header code packs the height and the coinbase flag:
 *   bit 0     - set if the output was created by a coinbase
 *   bits 1-32 - height of the block that created the output
 */

export function getHeaderCode(height: number, isCoinbase: boolean): number {
  // multiply instead of shifting, heights above 2^30 overflow a 32 bit shift
  return height * 2 + (isCoinbase ? 1 : 0)
}

export function splitHeaderCode(code: number): { height: number; isCoinbase: boolean } {
  return { height: Math.floor(code / 2), isCoinbase: code % 2 === 1 }
}

function validateCompactLeafData(func: string, leaf: CompactLeafData): void {
  if (!Number.isInteger(leaf.height) || leaf.height < 0 || leaf.height > MAX_HEIGHT) {
    throw new MessageFormatError(func, `height ${leaf.height} is out of range`)
  }

  if (leaf.amount < MIN_AMOUNT || leaf.amount > MAX_AMOUNT) {
    throw new MessageFormatError(func, `amount ${leaf.amount} is out of range`)
  }

  if (leaf.pkScript.byteLength > MAX_SCRIPT_SIZE) {
    throw new MessageFormatError(func, 'pkScript too long')
  }
}

function validateOutpoint(func: string, outpoint: Outpoint): void {
  if (isZeroHash(outpoint.hash)) {
    throw new InvariantViolationError(func, 'outpoint hash is the zero hash')
  }

  if (outpoint.hash.byteLength !== HASH_SIZE) {
    throw new MessageFormatError(
      func,
      `outpoint hash has ${outpoint.hash.byteLength} bytes, expected ${HASH_SIZE}`,
    )
  }

  validateOutpointIndex(func, outpoint.index)
}

function validateOutpointIndex(func: string, index: number): void {
  if (!Number.isInteger(index) || index < 0 || index > MAX_OUTPOINT_INDEX) {
    throw new MessageFormatError(func, `outpoint index ${index} is out of range`)
  }
}

function validateLeafData(func: string, leaf: RawLeafData): void {
  validateOutpoint(func, leaf.outpoint)
  validateCompactLeafData(func, leaf)
}

/**
 * @throws MessageFormatError if a field does not fit the format
 */
export function getCompactLeafDataSize(leaf: CompactLeafData): number {
  validateCompactLeafData('getCompactLeafDataSize', leaf)

  let size = 0
  size += sizeVarint(getHeaderCode(leaf.height, leaf.isCoinbase))
  size += sizeBigVarint(BigInt.asUintN(64, leaf.amount))
  size += sizeVarint(leaf.pkScript.byteLength)
  size += leaf.pkScript.byteLength
  return size
}

export function getLeafDataSize(leaf: RawLeafData): number {
  validateOutpointIndex('getLeafDataSize', leaf.outpoint.index)

  let size = 0
  size += HASH_SIZE
  size += sizeVarint(leaf.outpoint.index)
  size += getCompactLeafDataSize(leaf)
  return size
}

function writeCompactFields(
  bw: bufio.StaticWriter | bufio.BufferWriter,
  leaf: CompactLeafData,
): void {
  bw.writeVarint(getHeaderCode(leaf.height, leaf.isCoinbase))
  writeBigVarint(bw, BigInt.asUintN(64, leaf.amount))
  bw.writeVarBytes(leaf.pkScript)
}

function readCompactFields(reader: bufio.BufferReader): CompactLeafData {
  const { height, isCoinbase } = splitHeaderCode(readVarintU32(reader, 'header code'))
  const amount = BigInt.asIntN(64, readBigVarint(reader))
  const pkScript = readVarBytes(reader, MAX_SCRIPT_SIZE, 'pkScript size')

  return { height, isCoinbase, amount, pkScript }
}

/**
 * Writes the full serialization. Nothing is written if the leaf is rejected.
 *
 * @throws InvariantViolationError if the outpoint hash is the zero hash
 * @throws MessageFormatError if a field does not fit the format
 */
export function writeLeafData(
  bw: bufio.StaticWriter | bufio.BufferWriter,
  leaf: RawLeafData,
): bufio.StaticWriter | bufio.BufferWriter {
  validateLeafData('writeLeafData', leaf)

  bw.writeHash(leaf.outpoint.hash)
  bw.writeVarint(leaf.outpoint.index)
  writeCompactFields(bw, leaf)
  return bw
}

export function readLeafData(reader: bufio.BufferReader): LeafData {
  try {
    // copied so the leaf does not change when the caller reuses its buffer
    const hash = Buffer.from(reader.readHash())
    const index = readVarintU32(reader, 'outpoint index')
    const compact = readCompactFields(reader)

    return LeafData.fromCompact(compact, { hash, index })
  } catch (e: unknown) {
    throw MessageFormatError.wrap('readLeafData', e)
  }
}

export function writeCompactLeafData(
  bw: bufio.StaticWriter | bufio.BufferWriter,
  leaf: CompactLeafData,
): bufio.StaticWriter | bufio.BufferWriter {
  validateCompactLeafData('writeCompactLeafData', leaf)

  writeCompactFields(bw, leaf)
  return bw
}

export function readCompactLeafData(reader: bufio.BufferReader): CompactLeafData {
  try {
    return readCompactFields(reader)
  } catch (e: unknown) {
    throw MessageFormatError.wrap('readCompactLeafData', e)
  }
}

function assertConsumed(func: string, reader: bufio.BufferReader): void {
  const left = reader.left()
  if (left !== 0) {
    throw new MessageFormatError(func, `${left} unexpected trailing bytes`)
  }
}

/**
 * A spent output as committed to by a leaf of the utxo accumulator
 */
export class LeafData implements RawLeafData {
  blockHash: BlockHash
  outpoint: Outpoint
  height: number
  isCoinbase: boolean
  amount: bigint
  pkScript: Buffer

  constructor(leaf: RawLeafData) {
    this.blockHash = leaf.blockHash
    this.outpoint = leaf.outpoint
    this.height = leaf.height
    this.isCoinbase = leaf.isCoinbase
    this.amount = leaf.amount
    this.pkScript = leaf.pkScript
  }

  /**
   * A zeroed out leaf. It has to be filled in before it can be serialized.
   */
  static empty(): LeafData {
    return new LeafData({
      blockHash: Buffer.alloc(HASH_SIZE),
      outpoint: emptyOutpoint(),
      height: 0,
      isCoinbase: false,
      amount: 0n,
      pkScript: Buffer.alloc(0),
    })
  }

  static fromCompact(
    compact: CompactLeafData,
    outpoint: Outpoint,
    blockHash: BlockHash = Buffer.alloc(HASH_SIZE),
  ): LeafData {
    return new LeafData({
      blockHash,
      outpoint,
      height: compact.height,
      isCoinbase: compact.isCoinbase,
      amount: compact.amount,
      pkScript: compact.pkScript,
    })
  }

  static deserialize(buffer: Buffer): LeafData {
    const reader = bufio.read(buffer, true)
    const leaf = readLeafData(reader)
    assertConsumed('LeafData.deserialize', reader)
    return leaf
  }

  static deserializeCompact(buffer: Buffer): CompactLeafData {
    const reader = bufio.read(buffer, true)
    const compact = readCompactLeafData(reader)
    assertConsumed('LeafData.deserializeCompact', reader)
    return compact
  }

  getSize(): number {
    return getLeafDataSize(this)
  }

  getCompactSize(): number {
    return getCompactLeafDataSize(this)
  }

  serialize(): Buffer {
    validateLeafData('writeLeafData', this)
    const bw = bufio.write(this.getSize())
    writeLeafData(bw, this)
    return bw.render()
  }

  serializeCompact(): Buffer {
    validateCompactLeafData('writeCompactLeafData', this)
    const bw = bufio.write(this.getCompactSize())
    writeCompactLeafData(bw, this)
    return bw.render()
  }

  toCompact(): CompactLeafData {
    return {
      height: this.height,
      isCoinbase: this.isCoinbase,
      amount: this.amount,
      pkScript: this.pkScript,
    }
  }

  /**
   * The accumulator leaf for this output, SHA-512/256 of the full serialization
   */
  hash(): LeafHash {
    return crypto.createHash(LEAF_HASH_ALGORITHM).update(this.serialize()).digest()
  }

  toString(): string {
    let s = ''
    s += `BlockHash:${this.blockHash.toString('hex')},`
    s += `OutPoint:${renderOutpoint(this.outpoint)},`
    s += `Amount:${this.amount},`
    s += `PkScript:${this.pkScript.toString('hex')},`
    s += `BlockHeight:${this.height},`
    s += `IsCoinBase:${String(this.isCoinbase)},`
    s += `LeafHash:${this.hash().toString('hex')},`
    s += `Size:${this.getSize()}`
    return s
  }
}
