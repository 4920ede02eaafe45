/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import { ErrorUtils } from './utils/error'

/**
 * Thrown when bytes being read or a value being written do not fit the wire
 * format. Callers are expected to catch this and discard the record.
 */
export class MessageFormatError extends Error {
  name = this.constructor.name
  readonly func: string
  readonly description: string
  wrappedError: unknown | null

  constructor(func: string, description: string, wrappedError?: unknown) {
    super(`${func}: ${description}`)
    this.func = func
    this.description = description
    this.wrappedError = wrappedError ?? null
  }

  /**
   * Converts a failure from the underlying reader into a format error. Format
   * errors and fatal errors are returned untouched.
   */
  static wrap(func: string, error: unknown): Error {
    if (error instanceof MessageFormatError || ErrorUtils.isFatalError(error)) {
      return error
    }

    return new MessageFormatError(func, ErrorUtils.renderError(error), error)
  }
}

/**
 * Thrown when a caller hands the codec a record that can never be valid,
 * such as an outpoint with the zero hash. Nothing in this package catches it.
 */
export class InvariantViolationError extends Error {
  name = this.constructor.name
  readonly fatal = true
  readonly func: string

  constructor(func: string, description: string) {
    super(`${func}: ${description}`)
    this.func = func
  }
}
