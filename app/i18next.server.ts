import { join } from "node:path";
import { createInstance, type i18n as I18nInstance } from "i18next";
import Backend from "i18next-fs-backend";
import i18n from "./i18n";
import {
	getAvailableLanguages,
	getLocalesPath,
} from "./lib/languages.server";

export type Translate = (key: string) => string;

const instances = new Map<string, Promise<I18nInstance>>();

/**
 * Get supported languages dynamically from the filesystem
 */
export async function getSupportedLanguages(): Promise<string[]> {
	const languages = [...(await getAvailableLanguages())];
	// Ensure fallback language exists
	if (!languages.includes(i18n.fallbackLng)) {
		console.warn(
			`[i18n] Fallback language "${i18n.fallbackLng}" not found in available languages. Adding it.`,
		);
		languages.push(i18n.fallbackLng);
		languages.sort();
	}
	return languages;
}

/**
 * Pick the language to render in: the preferred one when it is available,
 * otherwise the fallback
 */
export async function resolveLanguage(preferred?: string | null): Promise<string> {
	const supported = await getSupportedLanguages();
	if (preferred && supported.includes(preferred)) {
		return preferred;
	}
	return i18n.fallbackLng;
}

async function createTranslatorInstance(lng: string): Promise<I18nInstance> {
	const instance = createInstance();
	await instance.use(Backend).init({
		...i18n,
		lng,
		backend: { loadPath: join(getLocalesPath(), "{{lng}}", "{{ns}}.json") },
	});
	return instance;
}

/**
 * Fixed translator for server-side code (calendar labels and the like)
 */
export async function getTranslator(preferred?: string | null): Promise<Translate> {
	const lng = await resolveLanguage(preferred);
	let pending = instances.get(lng);
	if (!pending) {
		pending = createTranslatorInstance(lng).catch((error: unknown) => {
			// A failed load must not stay cached
			instances.delete(lng);
			console.error(`[i18n] Failed to load translations for "${lng}":`, error);
			throw error;
		});
		instances.set(lng, pending);
	}
	const instance = await pending;
	const t = instance.getFixedT(lng);
	return (key) => {
		const value = t(key);
		return typeof value === "string" ? value : key;
	};
}
