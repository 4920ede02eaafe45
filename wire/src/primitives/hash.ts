/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

export const HASH_SIZE = 32

export type BlockHash = Buffer
export type TransactionHash = Buffer

export const ZERO_HASH: Buffer = Buffer.alloc(HASH_SIZE)

export function isZeroHash(hash: Buffer): boolean {
  return hash.equals(ZERO_HASH)
}
