import { z } from "zod";

/**
 * Configuration loaded from environment variables
 * This file should only be imported on the server side
 */
const envSchema = z.object({
	SITE_NAME: z.string().default("Council Portal"),
	SITE_DESCRIPTION: z.string().default("Council and group governance portal"),
	APP_URL: z.string().url().optional(),
	SESSION_SECRET: z.string().min(1).default("dev-secret-change-me"),
	PORT: z.coerce.number().int().positive().default(3000),
	CALENDAR_FALLBACK_HOST: z.string().min(1).default("localhost"),
	CALENDAR_FEED_LOOKBACK_DAYS: z.coerce.number().int().min(0).default(30),
	CALENDAR_PRODUCT_ID: z
		.string()
		.min(1)
		.default("-//Council Portal//Personal Calendar//EN"),
});

export type AppEnv = z.infer<typeof envSchema>;

/**
 * Parse the environment, treating empty strings as unset.
 * Throws with the offending variable names when a value is invalid.
 */
export function parseEnv(source: NodeJS.ProcessEnv): AppEnv {
	const present = Object.fromEntries(
		Object.entries(source).filter(
			(entry): entry is [string, string] =>
				typeof entry[1] === "string" && entry[1].trim() !== "",
		),
	);
	const result = envSchema.safeParse(present);
	if (!result.success) {
		const problems = result.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw new Error(`Invalid environment configuration - ${problems}`);
	}
	return result.data;
}

const env = parseEnv(process.env);

export const SITE_CONFIG = {
	name: env.SITE_NAME,
	description: env.SITE_DESCRIPTION,
	appUrl: env.APP_URL,
} as const;

export type SiteConfig = typeof SITE_CONFIG;

export const CALENDAR_CONFIG = {
	fallbackHost: env.CALENDAR_FALLBACK_HOST,
	feedLookbackDays: env.CALENDAR_FEED_LOOKBACK_DAYS,
	productId: env.CALENDAR_PRODUCT_ID,
} as const;

export const SERVER_CONFIG = {
	port: env.PORT,
	sessionSecret: env.SESSION_SECRET,
} as const;
