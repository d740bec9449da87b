/**
 * MurmurHash3 (x86, 32-bit) over the UTF-8 bytes of a string.
 *
 * Used to hash canonical point keys; equal key sequences always hash alike.
 */

const C1 = 0xcc9e2d51
const C2 = 0x1b873593

/** Keys never contain it, so joined sequences stay unambiguous. */
const KEY_SEPARATOR = '|'

const encoder = new TextEncoder()

const rotl = (x: number, r: number): number => (x << r) | (x >>> (32 - r))

const scramble = (k: number): number => Math.imul(rotl(Math.imul(k, C1), 15), C2)

function avalanche(h: number, length: number): number {
  let x = h ^ length
  x ^= x >>> 16
  x = Math.imul(x, 0x85ebca6b)
  x ^= x >>> 13
  x = Math.imul(x, 0xc2b2ae35)
  x ^= x >>> 16
  return x >>> 0
}

export function murmurHash3_32(key: string, seed = 0): number {
  const bytes = encoder.encode(key)
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  const blockEnd = bytes.length & ~3

  let h = seed | 0
  for (let i = 0; i < blockEnd; i += 4) {
    h ^= scramble(view.getUint32(i, true))
    h = (Math.imul(rotl(h, 13), 5) + 0xe6546b64) | 0
  }

  // 1 to 3 trailing bytes, little-endian
  if (blockEnd < bytes.length) {
    let tail = 0
    for (let i = bytes.length - 1; i >= blockEnd; i--) tail = (tail << 8) | bytes[i]
    h ^= scramble(tail)
  }

  return avalanche(h, bytes.length)
}

/** Hash a sequence of canonical keys as one separator-joined string. */
export function hashKeys(keys: readonly string[], seed = 0): number {
  return murmurHash3_32(keys.join(KEY_SEPARATOR), seed)
}
