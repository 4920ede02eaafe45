/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { LeafData } from '../primitives/leafData'
import { outpointEquals } from '../primitives/outpoint'
import { Serde } from './Serde'

/**
 * Stores leaves in their full serialization. The block hash is compared by
 * `equals` but does not survive a serialize/deserialize round trip.
 */
export class LeafDataSerde implements Serde<LeafData, Buffer> {
  equals(element1: LeafData, element2: LeafData): boolean {
    return (
      element1.blockHash.equals(element2.blockHash) &&
      outpointEquals(element1.outpoint, element2.outpoint) &&
      element1.height === element2.height &&
      element1.isCoinbase === element2.isCoinbase &&
      element1.amount === element2.amount &&
      element1.pkScript.equals(element2.pkScript)
    )
  }

  serialize(element: LeafData): Buffer {
    return element.serialize()
  }

  deserialize(data: Buffer): LeafData {
    return LeafData.deserialize(data)
  }
}

export const LeafDataSerdeInstance = new LeafDataSerde()
