import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "../../config/index.js";
import type { ProgramRecord } from "./program-formatter.js";

export type ParentDocumentIndex = ReadonlyMap<string, ProgramRecord>;

type ReadTextFile = (filePath: string, encoding: "utf8") => Promise<string>;

export interface ParentDocumentLoaderDependencies {
  readFile?: ReadTextFile;
  cwd?: () => string;
}

const parentDocumentsSchema = z.record(z.string(), z.record(z.string(), z.unknown()));

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error;

/**
 * Reads the offline-built `program_id -> program record` mapping.
 * A missing file is a deployment error; malformed content is not.
 */
export async function loadParentDocuments(
  filePath: string,
  dependencies: ParentDocumentLoaderDependencies = {}
): Promise<ParentDocumentIndex> {
  const read: ReadTextFile = dependencies.readFile ?? readFile;
  const cwd = dependencies.cwd ?? process.cwd;
  const resolved = path.isAbsolute(filePath) ? filePath : path.resolve(cwd(), filePath);

  let raw: string;
  try {
    raw = await read(resolved, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new ConfigurationError(`Configuration error: parent document file not found at ${resolved}.`);
    }
    throw error;
  }

  const parsed = parentDocumentsSchema.safeParse(JSON.parse(raw.replace(/^\uFEFF/, "")));
  if (!parsed.success) {
    throw new Error(`Parent document file ${resolved} is not an object of program records.`);
  }

  return new Map(Object.entries(parsed.data));
}
