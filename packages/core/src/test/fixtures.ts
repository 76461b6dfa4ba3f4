import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

export type TempDir = {
  path: string;
  /** Write `lines` joined by "\n" (plus a trailing newline) and return the file path. */
  write(name: string, lines: readonly string[]): Promise<string>;
  cleanup(): Promise<void>;
};

export async function makeTempDir(): Promise<TempDir> {
  const path = await mkdtemp(join(tmpdir(), "pass-audit-"));
  return {
    path,
    async write(name, lines) {
      const file = join(path, name);
      await writeFile(file, lines.length ? `${lines.join("\n")}\n` : "", "utf8");
      return file;
    },
    cleanup: () => rm(path, { recursive: true, force: true }),
  };
}

export const DISABLED_LM = "aad3b435b51404eeaad3b435b51404ee";
export const EMPTY_NT = "31d6cfe0d16ae931b73c59d7e0c089c0";
/** NT hash of "admin" */
export const NT_ADMIN = "209c6174da490caeb422f3fa5a7ae634";
/** NT hash of "password" */
export const NT_PASSWORD = "8846f7eaee8fb117ad06bdd830b7586c";

export function pwdumpLine(account: string, rid: number, lm: string, nt: string): string {
  return `${account}:${rid}:${lm}:${nt}:::`;
}
