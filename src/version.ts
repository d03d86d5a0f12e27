// This module centralizes server identity values so protocol metadata and tools stay in sync.

export const MCP_SERVER_NAME = 'fileio-mcp';
export const MCP_SERVER_VERSION = '0.3.0';

// Versions are negotiated by exact match; the first entry is the preferred one.
export const SUPPORTED_PROTOCOL_VERSIONS = ['2025-11-25', '2025-06-18', '2025-03-26', '2024-11-05'] as const;

export type SupportedProtocolVersion = (typeof SUPPORTED_PROTOCOL_VERSIONS)[number];

// This helper narrows a client-supplied version string to one the server speaks.
export function isSupportedProtocolVersion(value: string): value is SupportedProtocolVersion {
  return SUPPORTED_PROTOCOL_VERSIONS.some((version) => version === value);
}
