export { RoleGrantResolver, DEFAULT_SUBJECT_NAMESPACE, type RoleGrantResolverOptions } from './role-grant-resolver.js';
export { AuthorizationComposer, AuthorizationBuilder, type AuthorizationComposerOptions } from './authorization-composer.js';
export { GrantErrors, type GrantWriteError, type GrantReadError, type TimeoutFailure } from './errors.js';
