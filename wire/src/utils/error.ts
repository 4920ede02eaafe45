/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * This is used to unwrap a message from an error
 *
 * Falls back to JSON.stringify the error if we cannot get the message
 */
export function renderError(error: unknown, stack = false): string {
  if (!error) {
    return ''
  }

  if (stack && error instanceof Error && error.stack) {
    // stack also contains the error message
    return error.stack
  }

  if (error instanceof Error) {
    return error.message
  }

  if (typeof error === 'string') {
    return error
  }

  return JSON.stringify(error)
}

/**
 * Errors carrying `fatal: true` mean a caller broke the codec's contract and
 * must not be recovered from.
 */
function isFatalError(error: unknown): error is Error & { fatal: true } {
  return error instanceof Error && 'fatal' in error && error['fatal'] === true
}

export const ErrorUtils = {
  renderError,
  isFatalError,
}
