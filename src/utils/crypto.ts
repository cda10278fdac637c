/**
 * Random identifiers and content digests
 */

import { createHash, randomInt } from "crypto";
import { API_KEY_LENGTH, FRIENDLY_ID_LENGTH } from "@core/constants";

const ALPHANUMERIC =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";
const UPPER_ALPHANUMERIC = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

/**
 * Random string drawn uniformly from `charset`
 */
export function randomString(length: number, charset: string): string {
  if (!Number.isInteger(length) || length < 0) {
    throw new Error(`Invalid length: ${length}`);
  }
  let result = "";
  for (let i = 0; i < length; i++) {
    result += charset[randomInt(charset.length)];
  }
  return result;
}

/**
 * API key handed to a device on first setup, `[A-Za-z0-9]{32}`
 */
export function generateApiKey(): string {
  return randomString(API_KEY_LENGTH, ALPHANUMERIC);
}

/**
 * Short identifier shown on screens, `[A-Z0-9]{6}`
 */
export function generateFriendlyId(): string {
  return randomString(FRIENDLY_ID_LENGTH, UPPER_ALPHANUMERIC);
}

/**
 * First `length` hex characters of the MD5 of `content`.
 * Used to tell generated filenames apart, not for security.
 */
export function contentDigest(content: string, length: number = 8): string {
  return createHash("md5").update(content, "utf8").digest("hex").slice(0, length);
}
