import { existsSync } from "node:fs";
import { readdir } from "node:fs/promises";
import { join } from "node:path";

let cachedLanguages: string[] | null = null;

export function getLocalesPath(): string {
	return join(process.cwd(), "public", "locales");
}

/**
 * Discover available languages by reading the public/locales directory
 * Each language must have a common.json file to be considered valid
 * Results are cached for the lifetime of the process
 */
export async function getAvailableLanguages(): Promise<string[]> {
	if (cachedLanguages !== null) {
		return cachedLanguages;
	}

	try {
		const localesPath = getLocalesPath();
		const entries = await readdir(localesPath, { withFileTypes: true });

		const languages: string[] = [];
		for (const entry of entries) {
			if (
				entry.isDirectory() &&
				existsSync(join(localesPath, entry.name, "common.json"))
			) {
				languages.push(entry.name);
			}
		}

		cachedLanguages = languages.sort();
		return cachedLanguages;
	} catch (error) {
		console.error("[i18n] Error reading locales directory:", error);
		return ["de", "en"];
	}
}
