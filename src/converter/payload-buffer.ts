import type { StreamPayload } from '../types/records'

/**
 * StreamPayload over a byte array with a read position.
 *
 * The wrapped array is not copied; callers that hand one out should not
 * rely on it staying untouched.
 */
export class PayloadBuffer implements StreamPayload {
  private readonly bytes: Uint8Array
  private position = 0

  constructor(bytes: Uint8Array) {
    this.bytes = bytes
  }

  get remaining(): number {
    return this.bytes.length - this.position
  }

  get(target: Uint8Array): void {
    if (target.length > this.remaining) {
      throw new RangeError(
        `Cannot read ${target.length} bytes, only ${this.remaining} remaining`
      )
    }
    target.set(this.bytes.subarray(this.position, this.position + target.length))
    this.position += target.length
  }
}

/**
 * Wrap bytes as a single-read payload
 */
export function wrapPayload(bytes: Uint8Array): PayloadBuffer {
  return new PayloadBuffer(bytes)
}
