/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

function renderHashHex(hashHex: string | null | undefined): string {
  if (!hashHex) {
    return ''
  }

  /* Chop off leading zeroes of the hash */
  let n = 0
  while (hashHex.charAt(n) === '0') {
    n++
  }

  /* Overflow check on string end */
  if (n + 5 > hashHex.length) {
    /* Past the end of the string, so it is all zeroes anyway */
    n = 0
  }

  return `${hashHex.slice(n, n + 5)}...${hashHex.slice(-5)}`
}

function renderHash(hash: Buffer | null | undefined): string {
  if (!hash) {
    return ''
  }
  return renderHashHex(hash.toString('hex'))
}

export const HashUtils = {
  renderHashHex,
  renderHash,
}
