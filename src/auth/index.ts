/**
 * Auth module exports
 */

export { JwtVerifier, type DecodedToken, type JwtVerifierConfig } from './jwt';
