import jwt, { JwtPayload } from 'jsonwebtoken';
import { FastifyRequest } from 'fastify';
import { AuthenticationError } from '../errors';

/**
 * Bearer token verifier (HS256 shared secret)
 */

export type DecodedToken = JwtPayload;

export interface JwtVerifierConfig {
  secret: string;
  issuer?: string;
  audience?: string;
}

export class JwtVerifier {
  constructor(private readonly config: JwtVerifierConfig) {}

  /**
   * Extract token from Authorization header
   */
  extractToken(request: FastifyRequest): string | null {
    const authHeader = request.headers.authorization;
    if (!authHeader) {
      return null;
    }

    const parts = authHeader.split(' ');
    if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
      return null;
    }
    return parts[1];
  }

  verifyToken(token: string): DecodedToken {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.config.secret, {
        algorithms: ['HS256'],
        issuer: this.config.issuer,
        audience: this.config.audience,
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new AuthenticationError('Token has expired');
      }
      if (error instanceof jwt.NotBeforeError) {
        throw new AuthenticationError('Token is not yet valid');
      }
      if (error instanceof jwt.JsonWebTokenError) {
        if (error.message.includes('audience')) {
          throw new AuthenticationError(`Invalid audience: expected ${this.config.audience}`);
        }
        if (error.message.includes('issuer')) {
          throw new AuthenticationError(`Invalid issuer: expected ${this.config.issuer}`);
        }
        if (error.message.includes('signature')) {
          throw new AuthenticationError('Invalid token signature');
        }
        throw new AuthenticationError(`Invalid token: ${error.message}`);
      }
      throw error;
    }

    if (typeof decoded === 'string') {
      throw new AuthenticationError('Invalid token payload');
    }
    return decoded;
  }

  /**
   * Validate token from request
   * Returns decoded token or throws AuthenticationError
   */
  validateRequest(request: FastifyRequest): DecodedToken {
    const token = this.extractToken(request);
    if (!token) {
      throw new AuthenticationError('Missing authorization header or invalid format');
    }
    return this.verifyToken(token);
  }
}
