import type { LoginParams, LoginSource } from '../types.js';
import { InteractiveSource } from './interactive.js';
import type { AmbientCredentialFactory } from './interactive.js';
import { ServicePrincipalSource } from './service-principal.js';
import type { ServicePrincipalCredentialFactory } from './service-principal.js';

export { ManualTokenSource, MANUAL_TOKEN_ENV_VAR } from './manual.js';
export { ServicePrincipalSource, DEFAULT_AUTHORITY_HOST } from './service-principal.js';
export type { ServicePrincipalCredentialFactory } from './service-principal.js';
export { InteractiveSource } from './interactive.js';
export type { AmbientCredentialFactory } from './interactive.js';

export interface SourceFactoryOptions {
  authorityHost?: string;
  servicePrincipalCredential?: ServicePrincipalCredentialFactory;
  ambientCredential?: AmbientCredentialFactory;
}

export type SourceFactory = (params: LoginParams) => LoginSource;

/**
 * One variant per login kind; adding a source means adding a case here.
 */
export function createSourceFactory(options: SourceFactoryOptions = {}): SourceFactory {
  return (params) => {
    switch (params.kind) {
      case 'servicePrincipal':
        return new ServicePrincipalSource(params.config, {
          authorityHost: options.authorityHost,
          credentialFactory: options.servicePrincipalCredential,
        });
      case 'interactive':
        return new InteractiveSource(options.ambientCredential);
    }
  };
}
