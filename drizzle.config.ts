import { defineConfig } from 'drizzle-kit';

export default defineConfig({
	schema: './apps/gatehouse/src/infrastructure/persistence/schema/index.ts',
	out: './apps/gatehouse/drizzle',
	dialect: 'postgresql',
	dbCredentials: {
		url: process.env.DATABASE_URL ?? 'postgres://localhost:5432/gatehouse',
	},
});
