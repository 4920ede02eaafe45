/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Interface for objects that can be serialized, deserialized, and compared for equality.
 */
export interface Serde<E, SE> {
  /** Determine whether two elements should be considered equal */
  equals(element1: E, element2: E): boolean
  /**
   * Convert an element to a serialized form suitable for storage or
   * to be sent over the network.
   */
  serialize(element: E): SE
  /**
   * Convert serialized data back to an element.
   *
   * May throw an error if the data cannot be deserialized.
   */
  deserialize(data: SE): E
}
