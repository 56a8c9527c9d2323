import crypto from "crypto";

export function hashStringToSeed(seed: string): number {
  const hash = crypto.createHash("sha256").update(seed).digest("hex");

  // First 8 hex characters give a 32-bit numeric seed
  return parseInt(hash.slice(0, 8), 16);
}

export function generateRandomSeed(): string {
  return crypto.randomBytes(16).toString("hex");
}
