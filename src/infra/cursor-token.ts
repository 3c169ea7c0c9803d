import { createHmac, timingSafeEqual } from "node:crypto";
import { AppError } from "./app-error.js";

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]+$/;
const POSITION_PATTERN = /^[A-Za-z0-9._:-]+$/;

/** Listings that hand out cursors; a cursor only decodes for the listing that issued it. */
export type CursorScope = "events" | "transactions" | "credentials";

interface CursorPayload {
  v: 1;
  s: CursorScope;
  c: string;
}

function invalidCursor(message: string): AppError {
  return new AppError(422, "invalid_cursor", message);
}

function isCursorPayload(value: unknown): value is CursorPayload {
  if (!value || typeof value !== "object") {
    return false;
  }
  return (
    "v" in value &&
    value.v === 1 &&
    "s" in value &&
    (value.s === "events" || value.s === "transactions" || value.s === "credentials") &&
    "c" in value &&
    typeof value.c === "string"
  );
}

/**
 * Opaque, signed pagination cursors. Rotation works by listing the previous
 * secret among the verification secrets.
 */
export class CursorTokenService {
  private readonly verificationSecrets: string[];

  constructor(
    private readonly signingSecret: string,
    verificationSecrets: string[] = [],
  ) {
    this.verificationSecrets = [...new Set([signingSecret, ...verificationSecrets])];
  }

  encode(scope: CursorScope, position: string): string {
    if (!POSITION_PATTERN.test(position)) {
      throw invalidCursor("cursor position contains invalid characters.");
    }
    const payload: CursorPayload = { v: 1, s: scope, c: position };
    const body = Buffer.from(JSON.stringify(payload), "utf8").toString("base64url");
    return `${body}.${this.sign(body, this.signingSecret)}`;
  }

  decode(scope: CursorScope, token: string): string {
    const [body, signature, extra] = token.split(".");
    if (!body || !signature || extra !== undefined) {
      throw invalidCursor("cursor token format is invalid.");
    }
    if (!BASE64URL_PATTERN.test(body) || !BASE64URL_PATTERN.test(signature)) {
      throw invalidCursor("cursor token contains invalid characters.");
    }
    if (!this.verificationSecrets.some((secret) => this.signatureMatches(body, signature, secret))) {
      throw invalidCursor("cursor token signature is invalid.");
    }

    let payload: unknown;
    try {
      payload = JSON.parse(Buffer.from(body, "base64url").toString("utf8"));
    } catch {
      throw invalidCursor("cursor token payload is invalid.");
    }
    if (!isCursorPayload(payload) || !POSITION_PATTERN.test(payload.c)) {
      throw invalidCursor("cursor token payload is invalid.");
    }
    if (payload.s !== scope) {
      throw invalidCursor(`cursor was issued for '${payload.s}', not '${scope}'.`);
    }
    return payload.c;
  }

  private signatureMatches(body: string, signature: string, secret: string): boolean {
    const provided = Buffer.from(signature, "utf8");
    const expected = Buffer.from(this.sign(body, secret), "utf8");
    return provided.length === expected.length && timingSafeEqual(provided, expected);
  }

  private sign(body: string, secret: string): string {
    return createHmac("sha256", secret).update(body).digest("base64url");
  }
}
