export { createFakeClaims, FakeVerifier, type VerifyHandler } from "./fake-verifier";
export { JwksKeyCache, type JwksKeyCacheOptions } from "./key-cache";
export {
  type AssertionVerifier,
  GitHubActionsVerifier,
  type GitHubActionsVerifierOptions,
} from "./verifier";
