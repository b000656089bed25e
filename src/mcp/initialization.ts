// This module holds the process-wide initialize handshake state, written once and read-only afterwards.

import type { InitializeResult, ServerCapabilities } from '../types/mcp.js';
import { MCP_SERVER_NAME, MCP_SERVER_VERSION, negotiateProtocolVersion } from '../version.js';

const SERVER_CAPABILITIES: ServerCapabilities = {
  tools: { listChanged: false },
  resources: { listChanged: false }
};

export class InitializationState {
  private result: InitializeResult | null = null;

  public get initialized(): boolean {
    return this.result !== null;
  }

  public get protocolVersion(): string | null {
    return this.result?.protocolVersion ?? null;
  }

  // The first call fixes the negotiated version; later calls get the recorded result back unchanged.
  public initialize(requestedVersion: unknown): { result: InitializeResult; firstCall: boolean } {
    if (this.result) {
      return { result: this.result, firstCall: false };
    }

    this.result = {
      protocolVersion: negotiateProtocolVersion(requestedVersion),
      capabilities: SERVER_CAPABILITIES,
      serverInfo: {
        name: MCP_SERVER_NAME,
        version: MCP_SERVER_VERSION
      }
    };

    return { result: this.result, firstCall: true };
  }
}
