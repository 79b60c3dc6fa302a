export const MAX_UINT256 = (1n << 256n) - 1n;

export function isUint256(value: bigint): boolean {
  return value >= 0n && value <= MAX_UINT256;
}

/** Out-of-range integers are programming errors, not business rejections. */
export function assertUint256(value: bigint, label: string): void {
  if (!isUint256(value)) {
    throw new RangeError(`${label} must be an unsigned 256-bit integer, got ${value}`);
  }
}
