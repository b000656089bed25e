// This module centralizes server identity values so protocol metadata and health output stay in sync.

export const MCP_SERVER_NAME = 'odoo-crm-mcp';
export const MCP_SERVER_VERSION = '0.1.0';

// This list is ordered oldest to newest; the last entry is offered when a client asks for an unknown version.
export const SUPPORTED_PROTOCOL_VERSIONS = ['2024-11-05', '2025-03-26'] as const;

export const LATEST_PROTOCOL_VERSION = SUPPORTED_PROTOCOL_VERSIONS[SUPPORTED_PROTOCOL_VERSIONS.length - 1];

// This helper picks the protocol version echoed back to a client during initialize.
export function negotiateProtocolVersion(requested: unknown): string {
  if (typeof requested === 'string') {
    const match = SUPPORTED_PROTOCOL_VERSIONS.find((version) => version === requested);
    if (match) {
      return match;
    }
  }

  return LATEST_PROTOCOL_VERSION;
}
