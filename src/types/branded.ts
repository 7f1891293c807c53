/**
 * Branded types for security-critical strings
 */

/**
 * Brand type for nominal typing - creates distinct types from string
 */
declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

/** Access token subject in format `repo:<owner>/<name>`
 * @example "repo:octo-org/octo-repo"
 */
export type CredentialSubject = Brand<string, "CredentialSubject">;

/** Unique access token identifier (`jti`), a random UUID */
export type TokenId = Brand<string, "TokenId">;

/** Helper function to derive the access token subject from a repository */
export function createCredentialSubject(repository: string): CredentialSubject {
  if (repository.length === 0) {
    throw new Error("Invalid CredentialSubject: repository is empty");
  }
  return `repo:${repository}` as CredentialSubject;
}

/** Helper function to generate a fresh token identifier */
export function createTokenId(): TokenId {
  return crypto.randomUUID() as TokenId;
}
