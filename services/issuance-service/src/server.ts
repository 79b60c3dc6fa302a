import Fastify from "fastify";
import type { FastifyReply, FastifyRequest } from "fastify";
import {
  authenticateGatewayRequest,
  isIssuanceEventType,
  parseIdentity,
  type AdminChangeRequest,
  type AdminChangeResponse,
  type AuthorizationCheckResponse,
  type AuthorizationResponse,
  type BatchMintRequest,
  type BatchMintResponse,
  type DirectMintResponse,
  type EligibilityConfigResponse,
  type EligibilityStatusResponse,
  type ErrorResponse,
  type Identity,
  type IssuanceError,
  type IssuanceErrorKind,
  type ListEventsResponse,
  type MintedTokenView,
  type MintStatsResponse,
  type RecordedEvent,
  type SelfMintResponse,
  type TokenBalanceResponse,
  type TokenInfoResponse,
  type TokenUriResponse,
  type TransferOwnershipResponse,
} from "@holderpass/shared";
import { buildChainCollaboratorsFromEnv } from "./chain.js";
import type { Clock } from "./core/authorization-registry.js";
import {
  DependencyError,
  LocalTokenIssuer,
  type BalanceOracle,
  type TokenIssuer,
} from "./core/collaborators.js";
import { IssuanceCoordinator, type GenesisConfig } from "./core/coordinator.js";
import type { MintReceipt } from "./core/issuance-ledger.js";
import { isUint256 } from "./core/units.js";
import { tryPublishEvents } from "./event-sink.js";
import { type IssuanceStore, SqliteIssuanceStore } from "./storage/issuance-store.js";

const DEFAULT_ISSUANCE_DB_PATH = "data/issuance-service.db";

const ERROR_RESPONSES: Record<IssuanceErrorKind, { status: number; error: string }> = {
  Unauthorized: { status: 403, error: "unauthorized" },
  InvalidAddress: { status: 400, error: "invalid_address" },
  AlreadyAdmin: { status: 409, error: "already_admin" },
  NotAdmin: { status: 409, error: "not_admin" },
  OwnerAlreadyAdmin: { status: 409, error: "owner_already_admin" },
  AlreadyMinted: { status: 409, error: "already_minted" },
  InsufficientBalance: { status: 403, error: "insufficient_balance" },
  InvalidQuantity: { status: 400, error: "invalid_quantity" },
  UnknownToken: { status: 404, error: "unknown_token" },
  LengthMismatch: { status: 400, error: "length_mismatch" },
};

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

/** Accepts a decimal string or a non-negative safe integer. */
function parseUint(value: unknown): bigint | null {
  let parsed: bigint;
  if (typeof value === "string" && /^\d+$/.test(value)) {
    parsed = BigInt(value);
  } else if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) {
    parsed = BigInt(value);
  } else {
    return null;
  }
  return isUint256(parsed) ? parsed : null;
}

function parseUintList(value: unknown): bigint[] | null {
  if (!Array.isArray(value)) return null;
  const parsed: bigint[] = [];
  for (const item of value) {
    const next = parseUint(item);
    if (next === null) return null;
    parsed.push(next);
  }
  return parsed;
}

function parseAdminChangeRequest(body: unknown): AdminChangeRequest | null {
  if (!isObject(body)) return null;
  const admin = parseIdentity(body.admin);
  if (!admin) return null;
  return { admin };
}

function parseIdentityField(body: unknown, field: string): Identity | null {
  if (!isObject(body)) return null;
  return parseIdentity(body[field]);
}

function parseUintField(body: unknown, field: string): bigint | null {
  if (!isObject(body)) return null;
  return parseUint(body[field]);
}

function parseBatchMintRequest(body: unknown): BatchMintRequest | null {
  if (!isObject(body) || !Array.isArray(body.recipients)) return null;
  const recipients: Identity[] = [];
  for (const item of body.recipients) {
    const recipient = parseIdentity(item);
    if (!recipient) return null;
    recipients.push(recipient);
  }
  return { recipients };
}

function parseDirectMintRequest(
  body: unknown,
): { to: Identity; tokenId: bigint; quantity: bigint } | null {
  if (!isObject(body)) return null;
  const to = parseIdentity(body.to);
  const tokenId = parseUint(body.tokenId);
  const quantity = parseUint(body.quantity);
  if (!to || tokenId === null || quantity === null) return null;
  return { to, tokenId, quantity };
}

function parseDirectMintBatchRequest(
  body: unknown,
): { to: Identity; tokenIds: bigint[]; quantities: bigint[] } | null {
  if (!isObject(body)) return null;
  const to = parseIdentity(body.to);
  const tokenIds = parseUintList(body.tokenIds);
  const quantities = parseUintList(body.quantities);
  if (!to || !tokenIds || !quantities) return null;
  return { to, tokenIds, quantities };
}

function parseSetUriRequest(body: unknown): { tokenId: bigint; prefix: string } | null {
  if (!isObject(body)) return null;
  const tokenId = parseUint(body.tokenId);
  if (tokenId === null || typeof body.prefix !== "string") return null;
  return { tokenId, prefix: body.prefix };
}

function toMintedView(receipt: MintReceipt): MintedTokenView {
  return {
    to: receipt.to,
    tokenId: receipt.tokenId.toString(),
    quantity: receipt.quantity.toString(),
  };
}

function toMintedViewFromEvent(recorded: RecordedEvent): MintedTokenView[] {
  const { event } = recorded;
  if (event.type !== "TOKEN_MINTED") return [];
  return [{ to: event.to, tokenId: event.tokenId, quantity: event.quantity }];
}

function sendIssuanceError(reply: FastifyReply, error: IssuanceError) {
  const mapped = ERROR_RESPONSES[error.kind];
  const body: ErrorResponse = { error: mapped.error, kind: error.kind, message: error.message };
  return reply.code(mapped.status).send(body);
}

function sendInvalidRequest(reply: FastifyReply, message: string) {
  const body: ErrorResponse = { error: "invalid_request", message };
  return reply.code(400).send(body);
}

export interface BuildServerOptions {
  issuanceStore?: IssuanceStore;
  dbPath?: string;
  balanceOracle?: BalanceOracle;
  tokenIssuer?: TokenIssuer;
  initialOwner?: string;
  eligibilityAsset?: string;
  eventSinkUrl?: string;
  serviceAuthToken?: string;
  now?: Clock;
}

function resolveGenesis(options: BuildServerOptions): GenesisConfig | undefined {
  const rawOwner = options.initialOwner ?? process.env.INITIAL_OWNER_ADDRESS;
  const rawAsset = options.eligibilityAsset ?? process.env.ELIGIBILITY_ASSET_ADDRESS;
  if (rawOwner === undefined || rawAsset === undefined) return undefined;

  const owner = parseIdentity(rawOwner);
  if (!owner) {
    throw new Error(`INITIAL_OWNER_ADDRESS '${rawOwner}' is not a valid address`);
  }
  const asset = parseIdentity(rawAsset);
  if (!asset) {
    throw new Error(`ELIGIBILITY_ASSET_ADDRESS '${rawAsset}' is not a valid address`);
  }
  return { owner, asset };
}

export async function buildServer(options: BuildServerOptions = {}) {
  const app = Fastify({ logger: true });
  const store =
    options.issuanceStore ||
    new SqliteIssuanceStore(
      options.dbPath || process.env.ISSUANCE_DB_PATH || DEFAULT_ISSUANCE_DB_PATH,
    );
  const ownStore = !options.issuanceStore;

  let coordinator: IssuanceCoordinator;
  try {
    const chain =
      options.balanceOracle && options.tokenIssuer
        ? { oracle: null, issuer: null }
        : buildChainCollaboratorsFromEnv();
    const oracle = options.balanceOracle ?? chain.oracle;
    if (!oracle) {
      throw new Error("CHAIN_RPC_URL is required (or pass balanceOracle in buildServer options)");
    }
    const issuer = options.tokenIssuer ?? chain.issuer ?? new LocalTokenIssuer(store);

    coordinator = new IssuanceCoordinator({
      store,
      oracle,
      issuer,
      genesis: resolveGenesis(options),
      now: options.now,
    });
  } catch (error) {
    if (ownStore) {
      store.close();
    }
    throw error;
  }
  const eventSinkUrl = options.eventSinkUrl ?? process.env.EVENT_SINK_URL;
  const serviceAuthToken = options.serviceAuthToken ?? process.env.SERVICE_AUTH_TOKEN;

  function authenticate(req: FastifyRequest, reply: FastifyReply): Identity | null {
    const auth = authenticateGatewayRequest(req.headers, serviceAuthToken);
    if (auth.ok) return auth.caller;
    const body: ErrorResponse = { error: auth.error, message: auth.message };
    reply.code(auth.status).send(body);
    return null;
  }

  function publish(req: FastifyRequest, events: RecordedEvent[]) {
    return tryPublishEvents(eventSinkUrl, events, serviceAuthToken, req.log);
  }

  app.setErrorHandler((error, req, reply) => {
    if (error instanceof DependencyError) {
      req.log.error({ err: error, dependency: error.dependency }, "collaborator call failed");
      return reply.code(502).send({
        error:
          error.dependency === "balance_oracle"
            ? "balance_oracle_unavailable"
            : "token_issuer_failed",
        message: error.message,
      });
    }
    return reply.send(error);
  });

  app.get("/health", async () => ({ ok: true, service: "issuance-service" }));

  app.get("/authorization", async () => {
    const response: AuthorizationResponse = {
      owner: coordinator.authorization.owner(),
      admins: coordinator.authorization.listAdmins(),
      adminCount: coordinator.authorization.adminCount(),
    };
    return response;
  });

  app.get<{ Params: { address: string } }>("/authorization/:address", async (req, reply) => {
    const address = parseIdentity(req.params.address);
    if (!address) {
      return reply.code(400).send({ error: "invalid_address_format" });
    }
    const response: AuthorizationCheckResponse = {
      address,
      isOwner: coordinator.authorization.isOwner(address),
      isAdmin: coordinator.authorization.isAdmin(address),
      isAuthorized: coordinator.authorization.isAuthorized(address),
    };
    return response;
  });

  app.post("/admins/add", async (req, reply) => {
    const caller = authenticate(req, reply);
    if (!caller) return;
    const parsed = parseAdminChangeRequest(req.body);
    if (!parsed) {
      return sendInvalidRequest(reply, "Expected admin address");
    }

    const result = await coordinator.addAdmin(caller, parsed.admin);
    if (!result.ok) return sendIssuanceError(reply, result.error);
    req.log.info({ admin: parsed.admin }, "admin added");
    await publish(req, [result.value]);
    const response: AdminChangeResponse = {
      admin: parsed.admin,
      adminCount: coordinator.authorization.adminCount(),
    };
    return reply.code(201).send(response);
  });

  app.post("/admins/remove", async (req, reply) => {
    const caller = authenticate(req, reply);
    if (!caller) return;
    const parsed = parseAdminChangeRequest(req.body);
    if (!parsed) {
      return sendInvalidRequest(reply, "Expected admin address");
    }

    const result = await coordinator.removeAdmin(caller, parsed.admin);
    if (!result.ok) return sendIssuanceError(reply, result.error);
    req.log.info({ admin: parsed.admin }, "admin removed");
    await publish(req, [result.value]);
    const response: AdminChangeResponse = {
      admin: parsed.admin,
      adminCount: coordinator.authorization.adminCount(),
    };
    return response;
  });

  app.post("/ownership/transfer", async (req, reply) => {
    const caller = authenticate(req, reply);
    if (!caller) return;
    const newOwner = parseIdentityField(req.body, "newOwner");
    if (!newOwner) {
      return sendInvalidRequest(reply, "Expected newOwner address");
    }

    const result = await coordinator.transferOwnership(caller, newOwner);
    if (!result.ok) return sendIssuanceError(reply, result.error);
    req.log.info({ previousOwner: caller, newOwner }, "ownership transferred");
    await publish(req, [result.value]);
    const response: TransferOwnershipResponse = { previousOwner: caller, owner: newOwner };
    return response;
  });

  app.get("/eligibility", async () => {
    const config = coordinator.config();
    const response: EligibilityConfigResponse = {
      asset: config.asset,
      requiredBalance: config.requiredBalance.toString(),
      mintableTokenId: config.mintableTokenId.toString(),
      mintQuantity: config.mintQuantity.toString(),
    };
    return response;
  });

  app.post("/eligibility/asset", async (req, reply) => {
    const caller = authenticate(req, reply);
    if (!caller) return;
    const asset = parseIdentityField(req.body, "asset");
    if (!asset) {
      return sendInvalidRequest(reply, "Expected asset address");
    }

    const result = await coordinator.updateAsset(caller, asset);
    if (!result.ok) return sendIssuanceError(reply, result.error);
    await publish(req, [result.value]);
    return { asset };
  });

  app.post("/eligibility/threshold", async (req, reply) => {
    const caller = authenticate(req, reply);
    if (!caller) return;
    const requiredBalance = parseUintField(req.body, "requiredBalance");
    if (requiredBalance === null) {
      return sendInvalidRequest(reply, "Expected requiredBalance as an unsigned integer");
    }

    const result = await coordinator.updateThreshold(caller, requiredBalance);
    if (!result.ok) return sendIssuanceError(reply, result.error);
    await publish(req, [result.value]);
    return { requiredBalance: requiredBalance.toString() };
  });

  app.get<{ Params: { address: string } }>("/eligibility/:address", async (req, reply) => {
    const address = parseIdentity(req.params.address);
    if (!address) {
      return reply.code(400).send({ error: "invalid_address_format" });
    }
    const balance = await coordinator.eligibility.describeBalance(address);
    const sufficientBalance = balance >= coordinator.eligibility.requiredBalance();
    const hasMinted = coordinator.ledger.hasMinted(address);
    const response: EligibilityStatusResponse = {
      address,
      balance: balance.toString(),
      sufficientBalance,
      hasMinted,
      canSelfMint: !hasMinted && sufficientBalance,
    };
    return response;
  });

  app.post("/mint/self", async (req, reply) => {
    const caller = authenticate(req, reply);
    if (!caller) return;

    const result = await coordinator.selfMint(caller);
    if (!result.ok) return sendIssuanceError(reply, result.error);
    const minted = toMintedView(result.value);
    req.log.info(minted, "credential self-minted");
    const response: SelfMintResponse = {
      minted,
      totalIssued: coordinator.ledger.totalIssued().toString(),
      eventPublishStatus: await publish(req, [result.value.event]),
    };
    return reply.code(201).send(response);
  });

  app.post("/mint/batch", async (req, reply) => {
    const caller = authenticate(req, reply);
    if (!caller) return;
    const parsed = parseBatchMintRequest(req.body);
    if (!parsed) {
      return sendInvalidRequest(reply, "Expected recipients as an array of addresses");
    }

    const result = await coordinator.batchMint(caller, parsed.recipients);
    if (!result.ok) return sendIssuanceError(reply, result.error);
    const report = result.value;
    req.log.info(
      { minted: report.minted.length, skipped: report.skipped.length },
      "batch mint processed",
    );
    if (report.failed) {
      req.log.warn(report.failed, "batch mint stopped at issuer failure");
    }

    const response: BatchMintResponse = {
      minted: report.minted.map(toMintedView),
      skipped: report.skipped,
      failed: report.failed,
      totalIssued: coordinator.ledger.totalIssued().toString(),
      eventPublishStatus: await publish(
        req,
        report.minted.map((receipt) => receipt.event),
      ),
    };
    return reply.code(report.failed ? 207 : 200).send(response);
  });

  app.post("/mint/token-id", async (req, reply) => {
    const caller = authenticate(req, reply);
    if (!caller) return;
    const tokenId = parseUintField(req.body, "tokenId");
    if (tokenId === null) {
      return sendInvalidRequest(reply, "Expected tokenId as an unsigned integer");
    }

    const result = await coordinator.updateMintableTokenId(caller, tokenId);
    if (!result.ok) return sendIssuanceError(reply, result.error);
    await publish(req, [result.value]);
    return { mintableTokenId: tokenId.toString() };
  });

  app.post("/mint/quantity", async (req, reply) => {
    const caller = authenticate(req, reply);
    if (!caller) return;
    const quantity = parseUintField(req.body, "quantity");
    if (quantity === null) {
      return sendInvalidRequest(reply, "Expected quantity as an unsigned integer");
    }

    const result = await coordinator.updateMintQuantity(caller, quantity);
    if (!result.ok) return sendIssuanceError(reply, result.error);
    await publish(req, [result.value]);
    return { mintQuantity: quantity.toString() };
  });

  app.get("/mint/stats", async () => {
    const response: MintStatsResponse = {
      totalIssued: coordinator.ledger.totalIssued().toString(),
      mintableTokenId: coordinator.ledger.mintableTokenId().toString(),
      mintQuantity: coordinator.ledger.mintQuantity().toString(),
    };
    return response;
  });

  app.post("/tokens/mint", async (req, reply) => {
    const caller = authenticate(req, reply);
    if (!caller) return;
    const parsed = parseDirectMintRequest(req.body);
    if (!parsed) {
      return sendInvalidRequest(reply, "Expected to, tokenId and quantity");
    }

    const result = await coordinator.mint(caller, parsed.to, parsed.tokenId, parsed.quantity);
    if (!result.ok) return sendIssuanceError(reply, result.error);
    const response: DirectMintResponse = {
      minted: toMintedViewFromEvent(result.value),
      eventPublishStatus: await publish(req, [result.value]),
    };
    return reply.code(201).send(response);
  });

  app.post("/tokens/mint-batch", async (req, reply) => {
    const caller = authenticate(req, reply);
    if (!caller) return;
    const parsed = parseDirectMintBatchRequest(req.body);
    if (!parsed) {
      return sendInvalidRequest(reply, "Expected to, tokenIds and quantities arrays");
    }

    const result = await coordinator.mintBatch(
      caller,
      parsed.to,
      parsed.tokenIds,
      parsed.quantities,
    );
    if (!result.ok) return sendIssuanceError(reply, result.error);
    const report = result.value;
    const failed = report.failed && {
      tokenId: report.failed.tokenId.toString(),
      quantity: report.failed.quantity.toString(),
      message: report.failed.message,
    };
    if (failed) {
      req.log.warn({ to: parsed.to, ...failed }, "direct batch mint stopped at issuer failure");
    }

    const response: DirectMintResponse = {
      minted: report.minted.flatMap(toMintedViewFromEvent),
      failed,
      eventPublishStatus: await publish(req, report.minted),
    };
    return reply.code(failed ? 207 : 201).send(response);
  });

  app.post("/tokens/uri", async (req, reply) => {
    const caller = authenticate(req, reply);
    if (!caller) return;
    const parsed = parseSetUriRequest(req.body);
    if (!parsed) {
      return sendInvalidRequest(reply, "Expected tokenId and prefix string");
    }

    const result = await coordinator.setURI(caller, parsed.tokenId, parsed.prefix);
    if (!result.ok) return sendIssuanceError(reply, result.error);
    await publish(req, [result.value]);
    return { tokenId: parsed.tokenId.toString(), uriPrefix: parsed.prefix };
  });

  app.get<{ Params: { tokenId: string } }>("/tokens/:tokenId", async (req, reply) => {
    const tokenId = parseUint(req.params.tokenId);
    if (tokenId === null) {
      return reply.code(400).send({ error: "invalid_token_id" });
    }
    const response: TokenInfoResponse = {
      tokenId: tokenId.toString(),
      exists: coordinator.tokens.exists(tokenId),
      uriPrefix: coordinator.tokens.uriPrefix(tokenId),
    };
    return response;
  });

  app.get<{ Params: { tokenId: string } }>("/tokens/:tokenId/uri", async (req, reply) => {
    const tokenId = parseUint(req.params.tokenId);
    if (tokenId === null) {
      return reply.code(400).send({ error: "invalid_token_id" });
    }
    const resolved = coordinator.tokens.resolveURI(tokenId);
    if (!resolved.ok) return sendIssuanceError(reply, resolved.error);
    const response: TokenUriResponse = { tokenId: tokenId.toString(), uri: resolved.value };
    return response;
  });

  app.get<{ Params: { tokenId: string; address: string } }>(
    "/tokens/:tokenId/balances/:address",
    async (req, reply) => {
      const tokenId = parseUint(req.params.tokenId);
      const address = parseIdentity(req.params.address);
      if (tokenId === null || !address) {
        return reply.code(400).send({ error: "invalid_request" });
      }
      const response: TokenBalanceResponse = {
        tokenId: tokenId.toString(),
        address,
        balance: (await coordinator.tokens.balanceOf(address, tokenId)).toString(),
      };
      return response;
    },
  );

  app.get<{ Querystring: { type?: string } }>("/events", async (req, reply) => {
    const { type } = req.query;
    if (type === undefined) {
      const response: ListEventsResponse = { events: store.listEvents() };
      return response;
    }
    if (!isIssuanceEventType(type)) {
      return reply.code(400).send({ error: "invalid_event_type" });
    }
    const response: ListEventsResponse = { events: store.listEvents(type) };
    return response;
  });

  app.addHook("onClose", async () => {
    if (ownStore) {
      store.close();
    }
  });

  return app;
}
