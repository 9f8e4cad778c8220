/**
 * Credential sources backed by fixed values
 * @module credentials/static
 */

import { ConfigError } from '../errors/index.js';
import { NoopLogger, logCredentialsInvalid, type Logger } from '../observability/index.js';
import type { CredentialSource, Credentials } from './types.js';

/**
 * Static credential source using fixed credentials.
 *
 * It cannot refresh anything; invalidation is only logged.
 */
export class StaticCredentialSource implements CredentialSource {
  private readonly value: Credentials;
  private readonly logger: Logger;

  /**
   * @throws {ConfigError} If the access key ID or secret is empty
   */
  constructor(credentials: Credentials, logger: Logger = new NoopLogger()) {
    if (!credentials.accessKeyId || !credentials.secretAccessKey) {
      throw ConfigError.missingCredentials('accessKeyId and secretAccessKey are required');
    }
    this.value = { ...credentials };
    this.logger = logger;
  }

  async credentials(_scope: string): Promise<Credentials> {
    return this.value;
  }

  async credentialsInvalid(scope: string, _credentials: Credentials, reason: string): Promise<void> {
    logCredentialsInvalid(this.logger, scope, reason);
  }
}

/**
 * Environment-based credential source.
 *
 * Environment variables:
 * - AWS_ACCESS_KEY_ID (required)
 * - AWS_SECRET_ACCESS_KEY (required)
 * - AWS_SESSION_TOKEN (optional)
 *
 * Reads the environment on every call, so rotated values are picked up
 * after an invalidation.
 */
export class EnvironmentCredentialSource implements CredentialSource {
  private static readonly ENV_VARS = {
    ACCESS_KEY_ID: 'AWS_ACCESS_KEY_ID',
    SECRET_ACCESS_KEY: 'AWS_SECRET_ACCESS_KEY',
    SESSION_TOKEN: 'AWS_SESSION_TOKEN',
  } as const;

  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: Logger;

  constructor(env: NodeJS.ProcessEnv = process.env, logger: Logger = new NoopLogger()) {
    this.env = env;
    this.logger = logger;
  }

  /**
   * @throws {ConfigError} If required environment variables are missing
   */
  async credentials(_scope: string): Promise<Credentials> {
    const { ACCESS_KEY_ID, SECRET_ACCESS_KEY, SESSION_TOKEN } = EnvironmentCredentialSource.ENV_VARS;
    const accessKeyId = this.env[ACCESS_KEY_ID];
    const secretAccessKey = this.env[SECRET_ACCESS_KEY];
    const sessionToken = this.env[SESSION_TOKEN];

    if (!accessKeyId) {
      throw ConfigError.missingCredentials(`Missing required environment variable: ${ACCESS_KEY_ID}`);
    }

    if (!secretAccessKey) {
      throw ConfigError.missingCredentials(
        `Missing required environment variable: ${SECRET_ACCESS_KEY}`
      );
    }

    return sessionToken
      ? { accessKeyId, secretAccessKey, sessionToken }
      : { accessKeyId, secretAccessKey };
  }

  async credentialsInvalid(scope: string, _credentials: Credentials, reason: string): Promise<void> {
    logCredentialsInvalid(this.logger, scope, reason);
  }
}
