import type { ToolServerConfig } from "../config/toolServers.js";

/** Supplies the bearer credential sent to a tool server. */
export interface CredentialProvider {
  getCredential(server: ToolServerConfig): Promise<string | null>;
  /** Called once when a server rejects the current credential. */
  refresh(server: ToolServerConfig): Promise<string | null>;
}

export const DEFAULT_CREDENTIAL_ENV = "MCP_API_KEY";

/**
 * Reads credentials from the environment: the server's `credentialEnv`
 * variable, else `MCP_API_KEY`. A refresh simply re-reads the variable so a
 * rotated value is picked up without a restart.
 */
export class EnvCredentialProvider implements CredentialProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async getCredential(server: ToolServerConfig): Promise<string | null> {
    const value = this.env[server.credentialEnv ?? DEFAULT_CREDENTIAL_ENV]?.trim();
    return value ? value : null;
  }

  async refresh(server: ToolServerConfig): Promise<string | null> {
    return this.getCredential(server);
  }
}
