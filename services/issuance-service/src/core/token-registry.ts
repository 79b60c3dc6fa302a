import {
  fail,
  isNullIdentity,
  ok,
  parseIdentity,
  toIdentity,
  type Identity,
  type RecordedEvent,
  type Result,
  type TokenMintedEvent,
  type UriSetEvent,
} from "@holderpass/shared";
import type { IssuanceStore } from "../storage/issuance-store.js";
import type { AuthorizationRegistry, Clock } from "./authorization-registry.js";
import { DependencyError, issueTokens, type TokenIssuer } from "./collaborators.js";
import { assertUint256 } from "./units.js";

const METADATA_SUFFIX = ".json";

export interface DirectMintReport {
  minted: RecordedEvent[];
  /** Set when the issuer failed; entries after it were not attempted. */
  failed?: { tokenId: bigint; quantity: bigint; message: string };
}

export class TokenRegistry {
  constructor(
    private readonly store: IssuanceStore,
    private readonly authorization: AuthorizationRegistry,
    private readonly issuer: TokenIssuer,
    private readonly now: Clock,
  ) {}

  exists(tokenId: bigint): boolean {
    return this.store.tokenExists(tokenId);
  }

  markExists(tokenId: bigint): void {
    this.store.markTokenExists(tokenId, this.now());
  }

  uriPrefix(tokenId: bigint): string {
    return this.store.getUriPrefix(tokenId) ?? "";
  }

  /** Prefixes may be staged before the token is first issued. */
  setURI(caller: string, tokenId: bigint, prefix: string): Result<RecordedEvent> {
    assertUint256(tokenId, "tokenId");
    const gate = this.authorization.requireAuthorized(caller);
    if (!gate.ok) return gate;

    return this.store.transaction(() => {
      const occurredAt = this.now();
      this.store.setUriPrefix(tokenId, prefix, occurredAt);
      const event: UriSetEvent = {
        type: "URI_SET",
        occurredAt,
        tokenId: tokenId.toString(),
        uri: prefix,
      };
      return ok(this.store.appendEvent(event));
    });
  }

  resolveURI(tokenId: bigint): Result<string> {
    if (!this.exists(tokenId)) {
      return fail("UnknownToken", `token ${tokenId} has never been issued`);
    }
    return ok(`${this.uriPrefix(tokenId)}${tokenId.toString(10)}${METADATA_SUFFIX}`);
  }

  async balanceOf(holder: string, tokenId: bigint): Promise<bigint> {
    return this.issuer.balanceOfToken(toIdentity(holder), tokenId);
  }

  /**
   * Marks the token as existing and records the mint. Callers run this inside
   * their own transaction after the issuer has succeeded.
   */
  recordIssued(to: Identity, tokenId: bigint, quantity: bigint): RecordedEvent {
    this.markExists(tokenId);
    const event: TokenMintedEvent = {
      type: "TOKEN_MINTED",
      occurredAt: this.now(),
      to,
      tokenId: tokenId.toString(),
      quantity: quantity.toString(),
    };
    return this.store.appendEvent(event);
  }

  /** Direct issuance by owner or admin. An issuer failure changes nothing. */
  async mint(
    caller: string,
    rawTo: string,
    tokenId: bigint,
    quantity: bigint,
  ): Promise<Result<RecordedEvent>> {
    const checked = this.checkMint(caller, rawTo, [tokenId], [quantity]);
    if (!checked.ok) return checked;
    const to = checked.value;

    await issueTokens(this.issuer, to, tokenId, quantity);
    return ok(this.store.transaction(() => this.recordIssued(to, tokenId, quantity)));
  }

  /**
   * Every entry is validated before the first one is issued. Entries commit
   * one by one, so an issuer failure part-way keeps the earlier entries and
   * stops there.
   */
  async mintBatch(
    caller: string,
    rawTo: string,
    tokenIds: bigint[],
    quantities: bigint[],
  ): Promise<Result<DirectMintReport>> {
    const checked = this.checkMint(caller, rawTo, tokenIds, quantities);
    if (!checked.ok) return checked;
    const to = checked.value;

    const report: DirectMintReport = { minted: [] };
    for (let index = 0; index < tokenIds.length; index += 1) {
      const tokenId = tokenIds[index];
      const quantity = quantities[index];
      try {
        await issueTokens(this.issuer, to, tokenId, quantity);
      } catch (error) {
        if (!(error instanceof DependencyError)) throw error;
        report.failed = { tokenId, quantity, message: error.message };
        break;
      }
      report.minted.push(this.store.transaction(() => this.recordIssued(to, tokenId, quantity)));
    }
    return ok(report);
  }

  private checkMint(
    caller: string,
    rawTo: string,
    tokenIds: bigint[],
    quantities: bigint[],
  ): Result<Identity> {
    const gate = this.authorization.requireAuthorized(caller);
    if (!gate.ok) return gate;
    const to = parseIdentity(rawTo);
    if (!to) {
      return fail("InvalidAddress", `'${rawTo}' is not an account address`);
    }
    if (isNullIdentity(to)) {
      return fail("InvalidAddress", "cannot mint to the null address");
    }
    if (tokenIds.length !== quantities.length) {
      return fail(
        "LengthMismatch",
        `got ${tokenIds.length} token ids and ${quantities.length} quantities`,
      );
    }
    tokenIds.forEach((tokenId) => assertUint256(tokenId, "tokenId"));
    quantities.forEach((quantity) => assertUint256(quantity, "quantity"));
    if (quantities.some((quantity) => quantity === 0n)) {
      return fail("InvalidQuantity", "mint quantity must be at least 1");
    }
    return ok(to);
  }
}
