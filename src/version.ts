import { LATEST_PROTOCOL_VERSION } from "@modelcontextprotocol/sdk/types.js";

export const SERVER_NAME = "agent-orchestrator-mcp";

export const SERVER_VERSION = "1.0.0";

export interface VersionInfo {
  major: number;
  minor: number;
  patch: number;
  prerelease: string | null;
  build: string | null;
}

/** Splits a semantic version literal (`1.2.3-rc.1+sha`) into its components. */
export function parseVersion(version: string): VersionInfo {
  const match = /^(\d+)\.(\d+)\.(\d+)(?:-([0-9A-Za-z.-]+))?(?:\+([0-9A-Za-z.-]+))?$/.exec(version.trim());
  if (!match) {
    throw new Error(`Invalid semantic version '${version}'`);
  }
  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: Number(match[3]),
    prerelease: match[4] ?? null,
    build: match[5] ?? null,
  };
}

export const VERSION_INFO: VersionInfo = parseVersion(SERVER_VERSION);

export const MCP_PROTOCOL_VERSION = LATEST_PROTOCOL_VERSION;
