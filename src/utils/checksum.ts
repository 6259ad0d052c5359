import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";

export const CHECKSUM_ALGORITHM = "sha256";

export function checksumOf(data: Uint8Array): string {
  return createHash(CHECKSUM_ALGORITHM).update(data).digest("hex");
}

/**
 * Stream a file through the hash so large payloads are never fully buffered
 */
export async function checksumFile(path: string): Promise<string> {
  const hash = createHash(CHECKSUM_ALGORITHM);
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}
