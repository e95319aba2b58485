import { startHandbookServer } from "./startup";

startHandbookServer().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[handbook-mcp] fatal: ${message}`);
  process.exitCode = 1;
});
