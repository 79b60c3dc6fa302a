import {
  isNullIdentity,
  parseIdentity,
  type Identity,
  type RecordedEvent,
  type Result,
} from "@holderpass/shared";
import type { IssuanceStore } from "../storage/issuance-store.js";
import { AuthorizationRegistry, type Clock } from "./authorization-registry.js";
import type { BalanceOracle, TokenIssuer } from "./collaborators.js";
import { EligibilityGate } from "./eligibility-gate.js";
import {
  IssuanceLedger,
  type BatchMintReport,
  type MintConfig,
  type MintReceipt,
} from "./issuance-ledger.js";
import { SerialExecutor } from "./serial-executor.js";
import { TokenRegistry, type DirectMintReport } from "./token-registry.js";

export const DEFAULT_REQUIRED_BALANCE = 1010n * 10n ** 4n;
export const DEFAULT_MINTABLE_TOKEN_ID = 0n;
export const DEFAULT_MINT_QUANTITY = 1n;

export interface GenesisConfig {
  owner: Identity;
  asset: Identity;
  requiredBalance?: bigint;
  mintableTokenId?: bigint;
  mintQuantity?: bigint;
}

export interface CoordinatorOptions {
  store: IssuanceStore;
  oracle: BalanceOracle;
  issuer: TokenIssuer;
  /** Applied only when the store has no owner yet. */
  genesis?: GenesisConfig;
  now?: Clock;
}

function seedGenesis(store: IssuanceStore, genesis: GenesisConfig | undefined): void {
  if (store.getSetting("owner") !== null) return;
  if (!genesis) {
    throw new Error("store is empty: an initial owner and eligibility asset are required");
  }
  const owner = parseIdentity(genesis.owner);
  if (!owner || isNullIdentity(owner)) {
    throw new Error(`initial owner '${genesis.owner}' must be a non-null account address`);
  }
  const asset = parseIdentity(genesis.asset);
  if (!asset || isNullIdentity(asset)) {
    throw new Error(`eligibility asset '${genesis.asset}' must be a non-null contract address`);
  }
  const mintQuantity = genesis.mintQuantity ?? DEFAULT_MINT_QUANTITY;
  if (mintQuantity < 1n) {
    throw new Error("initial mint quantity must be at least 1");
  }
  store.seedSettings({
    owner,
    admin_count: "0",
    eligibility_asset: asset,
    required_balance: (genesis.requiredBalance ?? DEFAULT_REQUIRED_BALANCE).toString(),
    mintable_token_id: (genesis.mintableTokenId ?? DEFAULT_MINTABLE_TOKEN_ID).toString(),
    mint_quantity: mintQuantity.toString(),
    total_issued: "0",
  });
}

/**
 * Owns the four registries and is the only write path into them. Mutations
 * are queued on a single serial executor; reads go straight to the store.
 * Identity arguments may use any address casing.
 */
export class IssuanceCoordinator {
  readonly authorization: AuthorizationRegistry;
  readonly eligibility: EligibilityGate;
  readonly tokens: TokenRegistry;
  readonly ledger: IssuanceLedger;
  private readonly writer = new SerialExecutor();

  constructor(options: CoordinatorOptions) {
    const now = options.now ?? (() => new Date().toISOString());
    seedGenesis(options.store, options.genesis);

    this.authorization = new AuthorizationRegistry(options.store, now);
    this.eligibility = new EligibilityGate(options.store, this.authorization, options.oracle, now);
    this.tokens = new TokenRegistry(options.store, this.authorization, options.issuer, now);
    this.ledger = new IssuanceLedger(
      options.store,
      this.authorization,
      this.eligibility,
      this.tokens,
      options.issuer,
      now,
    );
  }

  addAdmin(caller: string, admin: string): Promise<Result<RecordedEvent>> {
    return this.writer.run(() => this.authorization.addAdmin(caller, admin));
  }

  removeAdmin(caller: string, admin: string): Promise<Result<RecordedEvent>> {
    return this.writer.run(() => this.authorization.removeAdmin(caller, admin));
  }

  transferOwnership(caller: string, newOwner: string): Promise<Result<RecordedEvent>> {
    return this.writer.run(() => this.authorization.transferOwnership(caller, newOwner));
  }

  updateAsset(caller: string, asset: string): Promise<Result<RecordedEvent>> {
    return this.writer.run(() => this.eligibility.updateAsset(caller, asset));
  }

  updateThreshold(caller: string, requiredBalance: bigint): Promise<Result<RecordedEvent>> {
    return this.writer.run(() => this.eligibility.updateThreshold(caller, requiredBalance));
  }

  setURI(caller: string, tokenId: bigint, prefix: string): Promise<Result<RecordedEvent>> {
    return this.writer.run(() => this.tokens.setURI(caller, tokenId, prefix));
  }

  mint(
    caller: string,
    to: string,
    tokenId: bigint,
    quantity: bigint,
  ): Promise<Result<RecordedEvent>> {
    return this.writer.run(() => this.tokens.mint(caller, to, tokenId, quantity));
  }

  mintBatch(
    caller: string,
    to: string,
    tokenIds: bigint[],
    quantities: bigint[],
  ): Promise<Result<DirectMintReport>> {
    return this.writer.run(() => this.tokens.mintBatch(caller, to, tokenIds, quantities));
  }

  selfMint(caller: string): Promise<Result<MintReceipt>> {
    return this.writer.run(() => this.ledger.selfMint(caller));
  }

  batchMint(caller: string, recipients: string[]): Promise<Result<BatchMintReport>> {
    return this.writer.run(() => this.ledger.batchMint(caller, recipients));
  }

  updateMintableTokenId(caller: string, tokenId: bigint): Promise<Result<RecordedEvent>> {
    return this.writer.run(() => this.ledger.updateMintableTokenId(caller, tokenId));
  }

  updateMintQuantity(caller: string, quantity: bigint): Promise<Result<RecordedEvent>> {
    return this.writer.run(() => this.ledger.updateMintQuantity(caller, quantity));
  }

  canSelfMint(identity: string): Promise<boolean> {
    return this.ledger.canSelfMint(identity);
  }

  config(): MintConfig {
    return this.ledger.config();
  }
}
