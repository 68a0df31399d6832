import crypto from "crypto";

export function tokensMatch(expected: string, received: unknown): boolean {
  if (typeof received !== "string") return false;

  const a = Buffer.from(expected);
  const b = Buffer.from(received);
  if (a.length !== b.length) return false;

  return crypto.timingSafeEqual(a, b);
}
