import { createHash, createHmac, timingSafeEqual } from "node:crypto";

export function signPayload(secret: string, timestamp: string, body: string): string {
  const signedPayload = `${timestamp}.${body}`;
  return createHmac("sha256", secret).update(signedPayload).digest("hex");
}

export function signatureKeyId(secret: string): string {
  const digest = createHash("sha256").update(secret).digest("hex");
  return `flk_${digest.slice(0, 12)}`;
}

export function signaturesMatch(expectedHex: string, providedHex: string): boolean {
  const expected = Buffer.from(expectedHex, "utf8");
  const provided = Buffer.from(providedHex.toLowerCase(), "utf8");
  return expected.length === provided.length && timingSafeEqual(expected, provided);
}
