import {
  fail,
  isNullIdentity,
  ok,
  parseIdentity,
  toIdentity,
  type AssetUpdatedEvent,
  type Identity,
  type RecordedEvent,
  type Result,
  type ThresholdUpdatedEvent,
} from "@holderpass/shared";
import type { IssuanceStore } from "../storage/issuance-store.js";
import type { AuthorizationRegistry, Clock } from "./authorization-registry.js";
import { queryBalance, type BalanceOracle } from "./collaborators.js";
import { assertUint256 } from "./units.js";

export class EligibilityGate {
  constructor(
    private readonly store: IssuanceStore,
    private readonly authorization: AuthorizationRegistry,
    private readonly oracle: BalanceOracle,
    private readonly now: Clock,
  ) {}

  asset(): Identity {
    const asset = this.store.getSetting("eligibility_asset");
    if (!asset) {
      throw new Error("eligibility asset is not configured; store was not initialized");
    }
    return asset;
  }

  requiredBalance(): bigint {
    return BigInt(this.store.getSetting("required_balance") ?? "0");
  }

  async describeBalance(identity: string): Promise<bigint> {
    return queryBalance(this.oracle, this.asset(), toIdentity(identity));
  }

  /** Inclusive: holding exactly the threshold qualifies. */
  async hasSufficientBalance(identity: string): Promise<boolean> {
    const balance = await this.describeBalance(identity);
    return balance >= this.requiredBalance();
  }

  updateAsset(caller: string, rawAsset: string): Result<RecordedEvent> {
    const gate = this.authorization.requireOwner(caller);
    if (!gate.ok) return gate;
    const asset = parseIdentity(rawAsset);
    if (!asset) {
      return fail("InvalidAddress", `'${rawAsset}' is not a contract address`);
    }
    if (isNullIdentity(asset)) {
      return fail("InvalidAddress", "eligibility asset cannot be the null address");
    }

    return this.store.transaction(() => {
      const previous = this.asset();
      this.store.setSetting("eligibility_asset", asset);
      const event: AssetUpdatedEvent = {
        type: "ASSET_UPDATED",
        occurredAt: this.now(),
        previous,
        next: asset,
      };
      return ok(this.store.appendEvent(event));
    });
  }

  updateThreshold(caller: string, requiredBalance: bigint): Result<RecordedEvent> {
    assertUint256(requiredBalance, "requiredBalance");
    const gate = this.authorization.requireOwner(caller);
    if (!gate.ok) return gate;

    return this.store.transaction(() => {
      const previous = this.requiredBalance();
      this.store.setSetting("required_balance", requiredBalance.toString());
      const event: ThresholdUpdatedEvent = {
        type: "THRESHOLD_UPDATED",
        occurredAt: this.now(),
        previous: previous.toString(),
        next: requiredBalance.toString(),
      };
      return ok(this.store.appendEvent(event));
    });
  }
}
