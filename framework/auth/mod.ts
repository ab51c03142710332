/**
 * Authentication
 *
 * HTTP Basic helpers for interceptors.
 */

export {
  authenticateBasic,
  decodeBasicCredentials,
  parseAuthorizationHeader,
  type BasicAuthOptions,
  type Credentials,
} from './basic.ts';
