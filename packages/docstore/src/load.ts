import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { fileURLToPath } from "node:url";
import { DocumentNotFoundError, DocumentUnreadableError } from "./errors";
import { DocumentStore } from "./store";

export const BUNDLED_DOCUMENT_PATH = fileURLToPath(
  new URL("../../../content/react-handbook.md", import.meta.url),
);

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export async function readDocumentSource(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new DocumentNotFoundError(path, error);
    }
    throw new DocumentUnreadableError(
      path,
      error instanceof Error ? error : new Error(String(error)),
    );
  }
}

export async function loadDocumentStore(
  path: string = BUNDLED_DOCUMENT_PATH,
): Promise<DocumentStore> {
  const source = await readDocumentSource(path);
  return DocumentStore.fromSource(source, { name: basename(path) });
}
