import { randomBytes } from "node:crypto";

/** Short opaque id (12 hex chars) for listings and trades. */
export function generateId(): string {
  return randomBytes(6).toString("hex");
}
