import type { IssuanceErrorKind } from "./errors.js";
import type { RecordedEvent } from "./events.js";

/** Decimal rendering of an unsigned integer (token ids, quantities, balances). */
export type DecimalString = string;

export interface ErrorResponse {
  error: string;
  kind?: IssuanceErrorKind;
  message?: string;
}

export interface AuthorizationResponse {
  owner: string;
  admins: string[];
  adminCount: number;
}

export interface AuthorizationCheckResponse {
  address: string;
  isOwner: boolean;
  isAdmin: boolean;
  isAuthorized: boolean;
}

export interface AdminChangeRequest {
  admin: string;
}

export interface AdminChangeResponse {
  admin: string;
  adminCount: number;
}

export interface TransferOwnershipResponse {
  previousOwner: string;
  owner: string;
}

export interface EligibilityConfigResponse {
  asset: string;
  requiredBalance: DecimalString;
  mintableTokenId: DecimalString;
  mintQuantity: DecimalString;
}

export interface EligibilityStatusResponse {
  address: string;
  balance: DecimalString;
  sufficientBalance: boolean;
  hasMinted: boolean;
  canSelfMint: boolean;
}

export interface MintedTokenView {
  to: string;
  tokenId: DecimalString;
  quantity: DecimalString;
}

export interface SelfMintResponse {
  minted: MintedTokenView;
  totalIssued: DecimalString;
  eventPublishStatus: EventPublishStatus;
}

export interface BatchMintRequest {
  recipients: string[];
}

export interface BatchMintResponse {
  minted: MintedTokenView[];
  skipped: string[];
  failed?: { recipient: string; message: string };
  totalIssued: DecimalString;
  eventPublishStatus: EventPublishStatus;
}

export interface MintStatsResponse {
  totalIssued: DecimalString;
  mintableTokenId: DecimalString;
  mintQuantity: DecimalString;
}

export interface DirectMintResponse {
  minted: MintedTokenView[];
  failed?: { tokenId: DecimalString; quantity: DecimalString; message: string };
  eventPublishStatus: EventPublishStatus;
}

export interface TokenInfoResponse {
  tokenId: DecimalString;
  exists: boolean;
  uriPrefix: string;
}

export interface TokenUriResponse {
  tokenId: DecimalString;
  uri: string;
}

export interface TokenBalanceResponse {
  tokenId: DecimalString;
  address: string;
  balance: DecimalString;
}

export interface ListEventsResponse {
  events: RecordedEvent[];
}

export type EventPublishStatus = "PUBLISHED" | "SKIPPED" | "FAILED";

export interface PublishEventsRequest {
  events: RecordedEvent[];
}
