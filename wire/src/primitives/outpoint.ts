/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { HASH_SIZE, TransactionHash } from './hash'

/**
 * Points at a single output of a previous transaction
 */
export interface Outpoint {
  hash: TransactionHash
  index: number
}

export const MAX_OUTPOINT_INDEX = 0xffffffff

export function emptyOutpoint(): Outpoint {
  return { hash: Buffer.alloc(HASH_SIZE), index: 0 }
}

export function outpointEquals(a: Outpoint, b: Outpoint): boolean {
  return a.index === b.index && a.hash.equals(b.hash)
}

/**
 * Renders the outpoint as `txid:index`, where the txid is the hash in
 * reversed byte order the way block explorers display it.
 */
export function renderOutpoint(outpoint: Outpoint): string {
  const txid = Buffer.from(outpoint.hash).reverse().toString('hex')
  return `${txid}:${outpoint.index}`
}
