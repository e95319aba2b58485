import { isDocumentStoreError } from "@handbook/docstore";

import { type HandbookLogger, makeToolErrorResult } from "../shared";

/**
 * Runs a tool body and reports document store failures (unknown anchors,
 * ambiguous heading paths) as `isError` results. Anything else propagates
 * to the SDK, which answers with a JSON-RPC error.
 */
export function runDocumentTool<T>(
  toolName: string,
  logger: HandbookLogger,
  run: () => T,
): T | ReturnType<typeof makeToolErrorResult> {
  try {
    return run();
  } catch (error) {
    if (!isDocumentStoreError(error)) {
      throw error;
    }

    logger.warn(
      `[handbook-mcp] ${toolName} failed (${error.code}): ${error.message}`,
    );
    return makeToolErrorResult(error);
  }
}
