export type IssuanceErrorKind =
  | "Unauthorized"
  | "InvalidAddress"
  | "AlreadyAdmin"
  | "NotAdmin"
  | "OwnerAlreadyAdmin"
  | "AlreadyMinted"
  | "InsufficientBalance"
  | "InvalidQuantity"
  | "UnknownToken"
  | "LengthMismatch";

export interface IssuanceError {
  kind: IssuanceErrorKind;
  message: string;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: IssuanceError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: IssuanceErrorKind, message: string): Result<T> {
  return { ok: false, error: { kind, message } };
}
