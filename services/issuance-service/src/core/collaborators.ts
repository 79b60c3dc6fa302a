import type { Identity } from "@holderpass/shared";
import type { IssuanceStore } from "../storage/issuance-store.js";

export interface BalanceOracle {
  balanceOf(asset: Identity, holder: Identity): Promise<bigint>;
}

export interface TokenIssuer {
  issue(to: Identity, tokenId: bigint, quantity: bigint, data: string): Promise<void>;
  balanceOfToken(holder: Identity, tokenId: bigint): Promise<bigint>;
}

export type Dependency = "balance_oracle" | "token_issuer";

/** A collaborator call failed; fatal for the operation that made it. */
export class DependencyError extends Error {
  readonly dependency: Dependency;

  constructor(dependency: Dependency, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DependencyError";
    this.dependency = dependency;
  }
}

function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function queryBalance(
  oracle: BalanceOracle,
  asset: Identity,
  holder: Identity,
): Promise<bigint> {
  try {
    return await oracle.balanceOf(asset, holder);
  } catch (error) {
    throw new DependencyError(
      "balance_oracle",
      `balance lookup for ${holder} failed: ${describeCause(error)}`,
      { cause: error },
    );
  }
}

export async function issueTokens(
  issuer: TokenIssuer,
  to: Identity,
  tokenId: bigint,
  quantity: bigint,
): Promise<void> {
  try {
    await issuer.issue(to, tokenId, quantity, "0x");
  } catch (error) {
    throw new DependencyError(
      "token_issuer",
      `issuing ${quantity} of token ${tokenId} to ${to} failed: ${describeCause(error)}`,
      { cause: error },
    );
  }
}

/** Keeps holder balances in the service's own database. */
export class LocalTokenIssuer implements TokenIssuer {
  constructor(private readonly store: IssuanceStore) {}

  async issue(to: Identity, tokenId: bigint, quantity: bigint): Promise<void> {
    this.store.creditTokenBalance(to, tokenId, quantity);
  }

  async balanceOfToken(holder: Identity, tokenId: bigint): Promise<bigint> {
    return this.store.getTokenBalance(holder, tokenId);
  }
}
