/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { createRootLogger, Logger } from '../logger'
import { HashUtils } from '../utils/hash'
import { LeafData, LeafHash } from './leafData'
import { renderOutpoint } from './outpoint'

export class LeafHasher {
  private readonly logger: Logger

  constructor(options: { logger?: Logger } = {}) {
    this.logger = (options.logger ?? createRootLogger()).withTag('leafhasher')
  }

  hash(leaf: LeafData): LeafHash {
    const hash = leaf.hash()

    this.logger.debug(
      `Hashed leaf ${renderOutpoint(leaf.outpoint)} at height ${leaf.height}: ${HashUtils.renderHash(
        hash,
      )}`,
    )

    return hash
  }

  hashAll(leaves: ReadonlyArray<LeafData>): LeafHash[] {
    return leaves.map((leaf) => this.hash(leaf))
  }
}
