import { randomBytes, randomUUID } from "node:crypto";

export function generateShortId(): string {
  const chars = "abcdefghijklmnopqrstuvwxyz0123456789";
  let result = "";
  for (const byte of randomBytes(6)) {
    result += chars[byte % chars.length];
  }
  return result;
}

export function generateUUID(): string {
  return randomUUID();
}
