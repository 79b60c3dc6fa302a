import {
  fail,
  isNullIdentity,
  ok,
  parseIdentity,
  type Identity,
  type MintableTokenIdUpdatedEvent,
  type MintQuantityUpdatedEvent,
  type RecordedEvent,
  type Result,
} from "@holderpass/shared";
import type { IssuanceStore } from "../storage/issuance-store.js";
import type { AuthorizationRegistry, Clock } from "./authorization-registry.js";
import { DependencyError, issueTokens, type TokenIssuer } from "./collaborators.js";
import type { EligibilityGate } from "./eligibility-gate.js";
import type { TokenRegistry } from "./token-registry.js";
import { assertUint256 } from "./units.js";

export interface MintConfig {
  asset: Identity;
  requiredBalance: bigint;
  mintableTokenId: bigint;
  mintQuantity: bigint;
}

export interface MintReceipt {
  to: Identity;
  tokenId: bigint;
  quantity: bigint;
  event: RecordedEvent;
}

export interface BatchMintReport {
  minted: MintReceipt[];
  /** Recipients that had already minted, in input order. */
  skipped: Identity[];
  /** Set when the issuer failed; entries after it were not attempted. */
  failed?: { recipient: Identity; message: string };
}

/**
 * One-time issuance per identity. A recipient moves from never-minted to
 * minted exactly once; the flag and the issued total never go backwards.
 */
export class IssuanceLedger {
  constructor(
    private readonly store: IssuanceStore,
    private readonly authorization: AuthorizationRegistry,
    private readonly eligibility: EligibilityGate,
    private readonly tokens: TokenRegistry,
    private readonly issuer: TokenIssuer,
    private readonly now: Clock,
  ) {}

  mintableTokenId(): bigint {
    return BigInt(this.store.getSetting("mintable_token_id") ?? "0");
  }

  mintQuantity(): bigint {
    return BigInt(this.store.getSetting("mint_quantity") ?? "1");
  }

  totalIssued(): bigint {
    return BigInt(this.store.getSetting("total_issued") ?? "0");
  }

  config(): MintConfig {
    return {
      asset: this.eligibility.asset(),
      requiredBalance: this.eligibility.requiredBalance(),
      mintableTokenId: this.mintableTokenId(),
      mintQuantity: this.mintQuantity(),
    };
  }

  hasMinted(identity: string): boolean {
    const account = parseIdentity(identity);
    return account !== null && this.store.getMint(account) !== null;
  }

  async canSelfMint(identity: string): Promise<boolean> {
    const account = parseIdentity(identity);
    if (!account || this.hasMinted(account)) return false;
    return this.eligibility.hasSufficientBalance(account);
  }

  async selfMint(rawCaller: string): Promise<Result<MintReceipt>> {
    const caller = parseIdentity(rawCaller);
    if (!caller) {
      return fail("InvalidAddress", `'${rawCaller}' is not an account address`);
    }
    if (this.hasMinted(caller)) {
      return fail("AlreadyMinted", `${caller} has already minted`);
    }
    if (!(await this.eligibility.hasSufficientBalance(caller))) {
      return fail(
        "InsufficientBalance",
        `${caller} holds less than the required ${this.eligibility.requiredBalance()}`,
      );
    }
    return ok(await this.issueTo(caller));
  }

  /**
   * Owner-only issuance that bypasses the balance gate. Recipients that already
   * minted are skipped without an event. Each entry commits on its own, so an
   * issuer failure part-way leaves the earlier entries in place and stops there.
   */
  async batchMint(caller: string, rawRecipients: string[]): Promise<Result<BatchMintReport>> {
    const gate = this.authorization.requireOwner(caller);
    if (!gate.ok) return gate;
    const recipients: Identity[] = [];
    for (const [index, raw] of rawRecipients.entries()) {
      const recipient = parseIdentity(raw);
      if (!recipient) {
        return fail("InvalidAddress", `recipient at index ${index} is not an account address`);
      }
      if (isNullIdentity(recipient)) {
        return fail("InvalidAddress", `recipient at index ${index} is the null address`);
      }
      recipients.push(recipient);
    }

    const report: BatchMintReport = { minted: [], skipped: [] };
    for (const recipient of recipients) {
      if (this.hasMinted(recipient)) {
        report.skipped.push(recipient);
        continue;
      }
      try {
        report.minted.push(await this.issueTo(recipient));
      } catch (error) {
        if (!(error instanceof DependencyError)) throw error;
        report.failed = { recipient, message: error.message };
        break;
      }
    }
    return ok(report);
  }

  updateMintableTokenId(caller: string, tokenId: bigint): Result<RecordedEvent> {
    assertUint256(tokenId, "tokenId");
    const gate = this.authorization.requireOwner(caller);
    if (!gate.ok) return gate;

    return this.store.transaction(() => {
      const previous = this.mintableTokenId();
      this.store.setSetting("mintable_token_id", tokenId.toString());
      const event: MintableTokenIdUpdatedEvent = {
        type: "MINTABLE_TOKEN_ID_UPDATED",
        occurredAt: this.now(),
        previous: previous.toString(),
        next: tokenId.toString(),
      };
      return ok(this.store.appendEvent(event));
    });
  }

  updateMintQuantity(caller: string, quantity: bigint): Result<RecordedEvent> {
    assertUint256(quantity, "quantity");
    const gate = this.authorization.requireOwner(caller);
    if (!gate.ok) return gate;
    if (quantity === 0n) {
      return fail("InvalidQuantity", "mint quantity must be at least 1");
    }

    return this.store.transaction(() => {
      const previous = this.mintQuantity();
      this.store.setSetting("mint_quantity", quantity.toString());
      const event: MintQuantityUpdatedEvent = {
        type: "MINT_QUANTITY_UPDATED",
        occurredAt: this.now(),
        previous: previous.toString(),
        next: quantity.toString(),
      };
      return ok(this.store.appendEvent(event));
    });
  }

  private async issueTo(recipient: Identity): Promise<MintReceipt> {
    const tokenId = this.mintableTokenId();
    const quantity = this.mintQuantity();
    await issueTokens(this.issuer, recipient, tokenId, quantity);

    return this.store.transaction(() => {
      this.store.insertMint({ address: recipient, tokenId, quantity, mintedAt: this.now() });
      this.store.setSetting("total_issued", (this.totalIssued() + quantity).toString());
      const event = this.tokens.recordIssued(recipient, tokenId, quantity);
      return { to: recipient, tokenId, quantity, event };
    });
  }
}
