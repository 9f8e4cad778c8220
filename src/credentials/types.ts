/**
 * Credential type definitions
 * @module credentials/types
 */

/**
 * AWS access credentials.
 *
 * A snapshot handed out by a credential source for the duration of one
 * attempt. The signer borrows it; it never stores it.
 */
export interface Credentials {
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
  readonly sessionToken?: string;

  /**
   * Monotonic version assigned by a caching source. Two snapshots with the
   * same version are the same credentials.
   */
  readonly version?: number;
}

/**
 * Source of credentials for a credential scope (`<region>/<service>`).
 */
export interface CredentialSource {
  /**
   * Returns the credentials to use for the scope. May wait on a refresh.
   */
  credentials(scope: string): Promise<Credentials>;

  /**
   * Reports that the service rejected these credentials, so the next call
   * to `credentials()` should not hand them out again.
   */
  credentialsInvalid(scope: string, credentials: Credentials, reason: string): Promise<void>;
}
