export const LEDGER_CALLER_HEADER = "x-ledger-caller";
export const LEDGER_TOKEN_HEADER = "x-service-token";

const PRINCIPAL_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._:@-]{0,127}$/;

/**
 * Principals are opaque account references (chain addresses, DIDs, service
 * names). Only their shape is checked here.
 */
export function isPrincipal(value: unknown): value is string {
  return typeof value === "string" && PRINCIPAL_PATTERN.test(value);
}

export type LedgerCallDenial = "unauthorized_service" | "missing_caller";

export type LedgerCallAuthorization =
  | { ok: true; caller: string }
  | { ok: false; denial: LedgerCallDenial; header: string };

export type LedgerCallHeaders = Record<string, string | string[] | undefined>;

function headerValues(value: unknown): string[] {
  if (typeof value === "string") return [value];
  if (Array.isArray(value)) return value.filter((item): item is string => typeof item === "string");
  return [];
}

/** Blank or unset means no token is configured. */
export function resolveLedgerToken(token: string | undefined | null): string | null {
  const trimmed = typeof token === "string" ? token.trim() : "";
  return trimmed.length > 0 ? trimmed : null;
}

export function parseCallerHeader(value: unknown): string | null {
  const [first] = headerValues(value);
  if (first === undefined) return null;
  const trimmed = first.trim();
  return isPrincipal(trimmed) ? trimmed : null;
}

/**
 * Resolves who is making a mutating ledger call. The service token is checked
 * first, and only when one is configured; the caller principal is taken as
 * authenticated upstream.
 */
export function authorizeLedgerCall(
  headers: LedgerCallHeaders,
  expectedToken: string | undefined | null,
): LedgerCallAuthorization {
  const token = resolveLedgerToken(expectedToken);
  if (token !== null && !headerValues(headers[LEDGER_TOKEN_HEADER]).includes(token)) {
    return { ok: false, denial: "unauthorized_service", header: LEDGER_TOKEN_HEADER };
  }

  const caller = parseCallerHeader(headers[LEDGER_CALLER_HEADER]);
  if (caller === null) {
    return { ok: false, denial: "missing_caller", header: LEDGER_CALLER_HEADER };
  }
  return { ok: true, caller };
}
