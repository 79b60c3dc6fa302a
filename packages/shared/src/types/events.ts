export type IssuanceEventType =
  | "ADMIN_ADDED"
  | "ADMIN_REMOVED"
  | "OWNERSHIP_TRANSFERRED"
  | "TOKEN_MINTED"
  | "URI_SET"
  | "ASSET_UPDATED"
  | "THRESHOLD_UPDATED"
  | "MINTABLE_TOKEN_ID_UPDATED"
  | "MINT_QUANTITY_UPDATED";

export interface IssuanceEventBase {
  type: IssuanceEventType;
  occurredAt: string;   // ISO date
}

export interface AdminAddedEvent extends IssuanceEventBase {
  type: "ADMIN_ADDED";
  admin: string;
}

export interface AdminRemovedEvent extends IssuanceEventBase {
  type: "ADMIN_REMOVED";
  admin: string;
}

export interface OwnershipTransferredEvent extends IssuanceEventBase {
  type: "OWNERSHIP_TRANSFERRED";
  previousOwner: string;
  newOwner: string;
}

export interface TokenMintedEvent extends IssuanceEventBase {
  type: "TOKEN_MINTED";
  to: string;
  tokenId: string;      // decimal
  quantity: string;     // decimal
}

export interface UriSetEvent extends IssuanceEventBase {
  type: "URI_SET";
  tokenId: string;
  uri: string;
}

export interface AssetUpdatedEvent extends IssuanceEventBase {
  type: "ASSET_UPDATED";
  previous: string;
  next: string;
}

export interface ThresholdUpdatedEvent extends IssuanceEventBase {
  type: "THRESHOLD_UPDATED";
  previous: string;
  next: string;
}

export interface MintableTokenIdUpdatedEvent extends IssuanceEventBase {
  type: "MINTABLE_TOKEN_ID_UPDATED";
  previous: string;
  next: string;
}

export interface MintQuantityUpdatedEvent extends IssuanceEventBase {
  type: "MINT_QUANTITY_UPDATED";
  previous: string;
  next: string;
}

export type IssuanceEvent =
  | AdminAddedEvent
  | AdminRemovedEvent
  | OwnershipTransferredEvent
  | TokenMintedEvent
  | UriSetEvent
  | AssetUpdatedEvent
  | ThresholdUpdatedEvent
  | MintableTokenIdUpdatedEvent
  | MintQuantityUpdatedEvent;

export interface RecordedEvent {
  sequence: number;
  event: IssuanceEvent;
  eventHash: string;    // sha256Hex(canonicalJson(event))
}

const EVENT_TYPES: readonly IssuanceEventType[] = [
  "ADMIN_ADDED",
  "ADMIN_REMOVED",
  "OWNERSHIP_TRANSFERRED",
  "TOKEN_MINTED",
  "URI_SET",
  "ASSET_UPDATED",
  "THRESHOLD_UPDATED",
  "MINTABLE_TOKEN_ID_UPDATED",
  "MINT_QUANTITY_UPDATED",
];

export function isIssuanceEventType(value: unknown): value is IssuanceEventType {
  return typeof value === "string" && EVENT_TYPES.some((type) => type === value);
}
