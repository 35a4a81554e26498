import { CommonEnvSchemas, parseEnv, z, type ConfigType } from '@gatehouse/config';

/**
 * Gatehouse environment configuration
 */
export const envSchema = z.object({
	// Server
	PORT: CommonEnvSchemas.port.prefault('8080'),
	HOST: z.string().default('0.0.0.0'),
	NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

	// Logging
	LOG_LEVEL: CommonEnvSchemas.logLevel,

	// Backing store
	BACKING_STORE: z.enum(['memory', 'postgres']).default('memory'),
	DATABASE_URL: z.string().default('postgres://localhost:5432/gatehouse'),

	// Identity lookup cache
	IDENTITY_CACHE_CAPACITY: CommonEnvSchemas.positiveInt.prefault('100'),
	IDENTITY_CACHE_TTL_MS: CommonEnvSchemas.durationMs.prefault('600000'), // 10 minutes
	IDENTITY_LOOKUP_TIMEOUT_MS: CommonEnvSchemas.durationMs.optional(),
	GRANT_WRITE_TIMEOUT_MS: CommonEnvSchemas.durationMs.optional(),

	// Policy
	PRIVILEGED_AFFILIATION: z.string().trim().min(1).default('FACULTY'),
	ROLE_SUBJECT_NAMESPACE: z.string().trim().min(1).default('urn:gatehouse'),
	TRUST_ATTRIBUTE_HEADERS: CommonEnvSchemas.boolean,
});

export type Env = ConfigType<typeof envSchema>;

/**
 * Parse and validate the process environment.
 */
export function loadEnv(env: Record<string, string | undefined> = process.env): Env {
	return parseEnv(envSchema, env);
}
