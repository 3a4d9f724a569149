/* src/runner/agent/connect.ts
 * Construct the Copilot Studio client from the environment.
 * The SDK is imported lazily so tests and `--help` never load it.
 */
import { CopilotStudioAgentClient } from './copilot-studio';
import type { AgentClient } from './types';

export class MissingTokenError extends Error {
  constructor(envName: string) {
    super(
      `no access token: set ${envName} to a bearer token for the Copilot Studio agent`,
    );
    this.name = 'MissingTokenError';
  }
}

/** Read the bearer token from `envName`; throws when it is unset or blank. */
export const readToken = (
  envName: string,
  env: NodeJS.ProcessEnv = process.env,
): string => {
  const token = env[envName]?.trim();
  if (!token) throw new MissingTokenError(envName);
  return token;
};

/**
 * Connection settings (environment id, agent identifier, tenant, cloud)
 * are read by the SDK from the process environment.
 */
export const connectCopilotStudio = async (
  tokenEnv: string,
): Promise<AgentClient> => {
  const token = readToken(tokenEnv);
  const sdk = await import('@microsoft/agents-copilotstudio-client');
  const settings = sdk.loadCopilotStudioConnectionSettingsFromEnv();
  return new CopilotStudioAgentClient(
    new sdk.CopilotStudioClient(settings, token),
  );
};
