import { createHash, randomBytes } from "node:crypto";

export function sha256Base64Url(data: string | Buffer): string {
  return createHash("sha256").update(data).digest("base64url");
}

export function generateRandomString(length: number): string {
  return randomBytes(length).toString("base64url");
}
