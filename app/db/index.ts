import { PostgresAdapter } from "./adapters/postgres";
import type { DatabaseAdapter } from "./adapters/types";

// Re-export types and schema
export * from "./schema";
export * from "./adapters/types";
export { PostgresAdapter } from "./adapters/postgres";

/**
 * Supported database providers
 * - postgres: Standard PostgreSQL via the postgres driver
 */
export type DatabaseProvider = "postgres";

/**
 * Configuration for database connection
 */
interface DatabaseConfig {
	provider: DatabaseProvider;
	connectionString: string;
}

function isDatabaseProvider(value: string): value is DatabaseProvider {
	return value === "postgres";
}

/**
 * Create a database adapter based on configuration
 */
export function createDatabaseAdapter(config: DatabaseConfig): DatabaseAdapter {
	switch (config.provider) {
		case "postgres":
			return new PostgresAdapter(config.connectionString);
	}
}

// Singleton instance for the application
let dbInstance: DatabaseAdapter | null = null;

/**
 * Get the database instance
 * Uses environment variables for configuration
 *
 * Required env vars:
 * - DATABASE_URL: PostgreSQL connection string
 * - DATABASE_PROVIDER: (optional) "postgres"
 */
export function getDatabase(): DatabaseAdapter {
	if (dbInstance) {
		return dbInstance;
	}

	const connectionString = process.env.DATABASE_URL;
	if (!connectionString) {
		throw new Error("DATABASE_URL environment variable is required");
	}

	const provider = process.env.DATABASE_PROVIDER || "postgres";
	if (!isDatabaseProvider(provider)) {
		throw new Error(`Unsupported database provider: ${provider}`);
	}

	dbInstance = createDatabaseAdapter({
		provider,
		connectionString,
	});

	return dbInstance;
}

/**
 * Install a specific adapter (tests use an in-memory one)
 */
export function setDatabase(adapter: DatabaseAdapter): void {
	dbInstance = adapter;
}

/**
 * Reset the database instance (useful for testing)
 */
export function resetDatabase(): void {
	dbInstance = null;
}
