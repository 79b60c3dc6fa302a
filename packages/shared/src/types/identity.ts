import { ZeroAddress, getAddress, isAddress } from "ethers";

/** Checksummed account address. */
export type Identity = string;

export const NULL_IDENTITY: Identity = ZeroAddress;

/**
 * Any casing of an address maps to the same checksummed identity, so
 * `0xabc…` and `0xABC…` are one account.
 */
export function parseIdentity(value: unknown): Identity | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  if (!isAddress(trimmed)) return null;
  return getAddress(trimmed);
}

/** For read paths that have no result channel. */
export function toIdentity(value: string): Identity {
  const identity = parseIdentity(value);
  if (!identity) {
    throw new TypeError(`'${value}' is not an account address`);
  }
  return identity;
}

export function isNullIdentity(identity: Identity): boolean {
  return identity === NULL_IDENTITY;
}
