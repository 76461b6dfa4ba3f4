import { open, type FileHandle } from "node:fs/promises";
import Papa from "papaparse";
import { ioError } from "./errors.js";

async function openInput(path: string): Promise<FileHandle> {
  try {
    return await open(path, "r");
  } catch (error) {
    throw ioError(path, error);
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

/**
 * Lines of a UTF-8 file, read incrementally. Only "\n" ends a line; one
 * trailing "\r" is stripped, so a lone "\r" stays inside its line.
 */
export async function* readLines(path: string): AsyncGenerator<string> {
  const handle = await openInput(path);
  try {
    let pending = "";
    for await (const chunk of handle.createReadStream({ encoding: "utf8", autoClose: false })) {
      if (typeof chunk !== "string") {
        continue;
      }
      const parts = (pending + chunk).split("\n");
      pending = parts.pop() ?? "";
      for (const line of parts) {
        yield stripCarriageReturn(line);
      }
    }
    if (pending !== "") {
      yield stripCarriageReturn(pending);
    }
  } catch (error) {
    throw ioError(path, error);
  } finally {
    await handle.close();
  }
}

// Dump records are never quoted; a NUL quote char keeps a stray `"` in an
// account name from swallowing the following lines.
const NO_QUOTE = "\u0000";

function isFieldRow(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((field) => typeof field === "string");
}

/**
 * Colon-separated fields of every non-empty line, read incrementally through
 * papaparse. Each field is trimmed.
 */
export async function* readColonRecords(path: string): AsyncGenerator<string[]> {
  const handle = await openInput(path);
  const source = handle.createReadStream({ encoding: "utf8" });
  const parser = Papa.parse(Papa.NODE_STREAM_INPUT, {
    delimiter: ":",
    // Records end at "\n" only; a trailing "\r" is trimmed with the last field.
    newline: "\n",
    quoteChar: NO_QUOTE,
    escapeChar: NO_QUOTE,
    skipEmptyLines: true,
  });
  source.on("error", (error) => parser.destroy(error));
  source.pipe(parser);

  try {
    for await (const row of parser) {
      if (isFieldRow(row)) {
        yield row.map((field) => field.trim());
      }
    }
  } catch (error) {
    throw ioError(path, error);
  } finally {
    source.destroy();
    await handle.close();
  }
}
