import { readHashRecords } from "./hashes.js";
import { NtlmHasher } from "./ntlm.js";

/** "CORP\jdoe" -> "jdoe" */
export function bareAccountName(account: string): string {
  const idx = account.lastIndexOf("\\");
  return idx === -1 ? account : account.slice(idx + 1);
}

/**
 * Accounts whose NT hash is the hash of their own (domain-less) name, in
 * file order. Records without an NT hash are ignored.
 */
export async function detectUsernameAsPassword(path: string): Promise<string[]> {
  const hasher = await NtlmHasher.create();
  const matches: string[] = [];

  for await (const record of readHashRecords(path)) {
    const stored = record.ntHash.toLowerCase();
    if (stored === "") {
      continue;
    }
    const account = bareAccountName(record.account);
    if (hasher.hash(account) === stored) {
      matches.push(account);
    }
  }

  return matches;
}
