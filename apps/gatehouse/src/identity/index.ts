export { IdentityResolver, type IdentityResolverOptions, type IdentityLookupCache } from './identity-resolver.js';
export {
	IdentityReconciler,
	type IdentityReconcilerOptions,
	type ReconcileOutcome,
	type RejectReason,
	type ProvisioningCache,
} from './identity-reconciler.js';
export { ReconcileErrors, type ReconcileError } from './errors.js';
export {
	createHeaderAttributeSource,
	AttributeHeaders,
	type AttributeSource,
	type HeaderAttributeSourceOptions,
} from './attribute-source.js';
