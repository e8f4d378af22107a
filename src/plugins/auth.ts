import { FastifyInstance, FastifyRequest, preHandlerHookHandler } from 'fastify';
import fp from 'fastify-plugin';
import { JwtVerifier, DecodedToken } from '../auth';
import { ConfigurationError } from '../errors';
import { getCorrelationId } from '../utils/correlation-id';
import { AppConfig } from '../types';

/**
 * Fastify plugin for bearer JWT authentication
 */

declare module 'fastify' {
  interface FastifyRequest {
    user?: DecodedToken;
  }

  interface FastifyInstance {
    authenticate: preHandlerHookHandler;
  }
}

interface AuthPluginOptions {
  config: AppConfig;
}

async function authPlugin(fastify: FastifyInstance, options: AuthPluginOptions): Promise<void> {
  const { config } = options;
  const { jwtSecret, issuer, audience } = config.auth;

  let verifier: JwtVerifier | null = null;
  if (jwtSecret) {
    verifier = new JwtVerifier({ secret: jwtSecret, issuer, audience });
    fastify.log.info({ issuer, audience }, 'JWT verifier initialized');
  } else if (config.nodeEnv === 'production') {
    throw new ConfigurationError('JWT_SECRET is required in production');
  } else {
    fastify.log.warn('JWT_SECRET not set - authentication will be bypassed');
  }

  // Failures propagate to the error handler as AuthenticationError (401)
  const authenticate = async (request: FastifyRequest): Promise<void> => {
    if (!verifier) {
      return;
    }
    const decodedToken = verifier.validateRequest(request);
    request.user = decodedToken;
    request.log.debug({ correlationId: getCorrelationId(request), subject: decodedToken.sub }, 'Authentication successful');
  };

  fastify.decorate('authenticate', authenticate);
}

export default fp(authPlugin, {
  name: 'auth',
  fastify: '4.x',
});
