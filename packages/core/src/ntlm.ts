import { Buffer } from "node:buffer";
import { createMD4, type IHasher } from "hash-wasm";

/**
 * NT hash (MD4 over UTF-16LE) of `text`, as lowercase hex.
 *
 * Node's OpenSSL 3 build no longer ships MD4, so the digest comes from
 * hash-wasm. One hasher instance is reused per `NtlmHasher`.
 */
export class NtlmHasher {
  private constructor(private readonly md4: IHasher) {}

  static async create(): Promise<NtlmHasher> {
    return new NtlmHasher(await createMD4());
  }

  hash(text: string): string {
    return this.md4.init().update(Buffer.from(text, "utf16le")).digest("hex");
  }
}

export async function ntlmHash(text: string): Promise<string> {
  const hasher = await NtlmHasher.create();
  return hasher.hash(text);
}
