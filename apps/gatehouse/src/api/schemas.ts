import { Type, type Static } from '@sinclair/typebox';

export const ErrorResponseSchema = Type.Object({
	code: Type.String(),
	message: Type.String(),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;

export const HealthResponseSchema = Type.Object({
	status: Type.Literal('UP'),
	timestamp: Type.String({ format: 'date-time' }),
});

/**
 * Stored identity as returned by GET /user. Unset fields are omitted.
 */
export const IdentityResponseSchema = Type.Object({
	id: Type.String(),
	localKey: Type.Optional(Type.String()),
	username: Type.Optional(Type.String()),
	displayName: Type.Optional(Type.String()),
	email: Type.Optional(Type.String()),
	institutionalId: Type.Optional(Type.String()),
	roles: Type.Array(Type.String()),
});

export type IdentityResponse = Static<typeof IdentityResponseSchema>;
