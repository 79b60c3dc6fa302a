import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { getAddress } from "ethers";
import type { Identity } from "@holderpass/shared";
import {
  LocalTokenIssuer,
  type BalanceOracle,
  type TokenIssuer,
} from "../core/collaborators.js";
import { IssuanceCoordinator, type GenesisConfig } from "../core/coordinator.js";
import { SqliteIssuanceStore } from "../storage/issuance-store.js";

export const FIXED_NOW = "2026-03-01T12:00:00.000Z";

/** Digit-only addresses are their own checksum form. */
export function addr(n: number): Identity {
  return `0x${String(n).padStart(40, "0")}`;
}

export const NULL_ADDRESS = addr(0);
export const OWNER = addr(1);
export const ADMIN_A = addr(2);
export const ADMIN_B = addr(3);
export const USER_1 = addr(11);
export const USER_2 = addr(12);
export const USER_3 = addr(13);
export const USER_4 = addr(14);
export const ASSET = addr(9001);
export const OTHER_ASSET = addr(9002);

/** Checksummed form mixes cases, unlike the digit-only fixtures above. */
export const MIXED_CASE = getAddress("0xabcdef0123456789abcdef0123456789abcdabcd");
export const MIXED_CASE_LOWER = MIXED_CASE.toLowerCase();
export const MIXED_CASE_OTHER = getAddress("0xfedcba9876543210fedcba9876543210fedcfedc");

export function createTempDbPath() {
  const dir = mkdtempSync(join(tmpdir(), "holderpass-issuance-"));
  return {
    dir,
    dbPath: join(dir, "issuance.db"),
  };
}

export class InMemoryBalanceOracle implements BalanceOracle {
  private readonly balances = new Map<string, bigint>();
  failing = false;
  /** Resolve on a later tick so concurrent callers really interleave. */
  delayMs = 0;

  setBalance(asset: Identity, holder: Identity, amount: bigint): void {
    this.balances.set(`${asset}:${holder}`, amount);
  }

  async balanceOf(asset: Identity, holder: Identity): Promise<bigint> {
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    if (this.failing) {
      throw new Error("rpc endpoint unreachable");
    }
    return this.balances.get(`${asset}:${holder}`) ?? 0n;
  }
}

/** Delegates to the local token book but refuses selected recipients or token ids. */
export class SelectiveTokenIssuer implements TokenIssuer {
  readonly refused = new Set<Identity>();
  readonly refusedTokenIds = new Set<bigint>();

  constructor(private readonly inner: TokenIssuer) {}

  async issue(to: Identity, tokenId: bigint, quantity: bigint, data: string): Promise<void> {
    if (this.refused.has(to)) {
      throw new Error(`execution reverted for ${to}`);
    }
    if (this.refusedTokenIds.has(tokenId)) {
      throw new Error(`execution reverted for token ${tokenId}`);
    }
    await this.inner.issue(to, tokenId, quantity, data);
  }

  async balanceOfToken(holder: Identity, tokenId: bigint): Promise<bigint> {
    return this.inner.balanceOfToken(holder, tokenId);
  }
}

export interface Fixture {
  coordinator: IssuanceCoordinator;
  store: SqliteIssuanceStore;
  oracle: InMemoryBalanceOracle;
  issuer: SelectiveTokenIssuer;
  cleanup(): void;
}

export function createFixture(genesis: Partial<GenesisConfig> = {}): Fixture {
  const temp = createTempDbPath();
  const store = new SqliteIssuanceStore(temp.dbPath);
  const oracle = new InMemoryBalanceOracle();
  const issuer = new SelectiveTokenIssuer(new LocalTokenIssuer(store));
  const coordinator = new IssuanceCoordinator({
    store,
    oracle,
    issuer,
    genesis: { owner: OWNER, asset: ASSET, ...genesis },
    now: () => FIXED_NOW,
  });
  return {
    coordinator,
    store,
    oracle,
    issuer,
    cleanup() {
      store.close();
      rmSync(temp.dir, { recursive: true, force: true });
    },
  };
}
