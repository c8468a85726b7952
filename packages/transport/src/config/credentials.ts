/**
 * Where the endpoint and auth token come from. The environment-backed
 * implementations suit headless deployments where secrets are injected at
 * deploy time; the static ones suit tests and embedding apps.
 */
import { ConfigError } from '../errors';

export const TOKEN_ENV_VAR = 'TETHER_AUTH_TOKEN';
export const ENDPOINT_ENV_VAR = 'TETHER_ENDPOINT';

export interface CredentialSource {
  getToken(): Promise<string | null>;
}

export interface EndpointResolver {
  resolve(): Promise<string>;
}

export class StaticCredentialSource implements CredentialSource {
  constructor(private readonly token: string | null) {}

  async getToken(): Promise<string | null> {
    return this.token;
  }
}

export class EnvCredentialSource implements CredentialSource {
  constructor(
    private readonly variable: string = TOKEN_ENV_VAR,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  async getToken(): Promise<string | null> {
    const value = this.env[this.variable]?.trim();
    return value ? value : null;
  }
}

export class StaticEndpointResolver implements EndpointResolver {
  constructor(private readonly endpoint: string) {}

  async resolve(): Promise<string> {
    return this.endpoint;
  }
}

export class EnvEndpointResolver implements EndpointResolver {
  constructor(
    private readonly variable: string = ENDPOINT_ENV_VAR,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  async resolve(): Promise<string> {
    const value = this.env[this.variable]?.trim();
    if (!value) {
      throw new ConfigError(`Missing endpoint. Set the ${this.variable} environment variable.`);
    }
    return value;
  }
}

/** Anything with a `connect(endpoint, token)`, such as a Connection. */
export interface Connectable {
  connect(endpoint: string, token?: string | null): boolean;
}

export interface SessionSources {
  endpoint: EndpointResolver;
  credentials: CredentialSource;
}

/**
 * Resolves the endpoint and token, then connects. Rejects when either
 * collaborator fails; resolves to what `connect()` returned.
 */
export async function openSession(target: Connectable, sources: SessionSources): Promise<boolean> {
  const [endpoint, token] = await Promise.all([sources.endpoint.resolve(), sources.credentials.getToken()]);
  return target.connect(endpoint, token);
}
