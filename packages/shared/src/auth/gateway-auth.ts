import { parseIdentity, type Identity } from "../types/identity.js";

export const SERVICE_AUTH_HEADER = "x-service-token";

/**
 * Set by the gateway in front of the service once it has authenticated the
 * account. Only trusted alongside a valid service token.
 */
export const CALLER_HEADER = "x-caller-address";

type HeaderValue = string | string[] | undefined;

export type GatewayAuthResult =
  | { ok: true; caller: Identity }
  | { ok: false; status: 401; error: "unauthorized_service" | "caller_required"; message: string };

function normalizeToken(token: string | undefined | null): string | null {
  if (typeof token !== "string") return null;
  const trimmed = token.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function firstValue(value: HeaderValue): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/** No configured token means the service runs open, as in local development. */
function hasServiceToken(provided: HeaderValue, expectedToken: string | undefined | null): boolean {
  const expected = normalizeToken(expectedToken);
  if (!expected) return true;
  if (Array.isArray(provided)) {
    return provided.some((value) => value === expected);
  }
  return provided === expected;
}

/** Service token first, then the acting account. */
export function authenticateGatewayRequest(
  headers: Readonly<Record<string, HeaderValue>>,
  expectedToken: string | undefined | null,
): GatewayAuthResult {
  if (!hasServiceToken(headers[SERVICE_AUTH_HEADER], expectedToken)) {
    return {
      ok: false,
      status: 401,
      error: "unauthorized_service",
      message: `Missing or invalid '${SERVICE_AUTH_HEADER}' header`,
    };
  }
  const caller = parseIdentity(firstValue(headers[CALLER_HEADER]));
  if (!caller) {
    return {
      ok: false,
      status: 401,
      error: "caller_required",
      message: `Missing or invalid '${CALLER_HEADER}' header`,
    };
  }
  return { ok: true, caller };
}

/** Headers for service-to-service calls that act as no particular account. */
export function buildServiceAuthHeaders(
  token: string | undefined | null,
): Record<string, string> {
  const normalized = normalizeToken(token);
  if (!normalized) return {};
  return { [SERVICE_AUTH_HEADER]: normalized };
}

/** Headers the gateway sets when it forwards a call on behalf of `caller`. */
export function buildGatewayHeaders(
  token: string | undefined | null,
  caller: string,
): Record<string, string> {
  return { ...buildServiceAuthHeaders(token), [CALLER_HEADER]: caller };
}
