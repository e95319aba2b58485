import { BUNDLED_DOCUMENT_PATH } from "@handbook/docstore";

export interface ServerConfig {
  readonly documentPath: string;
  readonly strict: boolean;
}

export type EnvRecord = Readonly<Record<string, string | undefined>>;

const TRUTHY_FLAGS = new Set(["1", "true", "yes"]);

function readFlag(value: string | undefined): boolean {
  return value !== undefined && TRUTHY_FLAGS.has(value.trim().toLowerCase());
}

export function resolveServerConfig(env: EnvRecord = process.env): ServerConfig {
  const documentPath = env.HANDBOOK_DOCUMENT_PATH?.trim();
  return {
    documentPath:
      documentPath && documentPath.length > 0
        ? documentPath
        : BUNDLED_DOCUMENT_PATH,
    strict: readFlag(env.HANDBOOK_STRICT),
  };
}
