// This is the language you want to use in case
// if the user language is not in the supported languages
const fallbackLng = "en";

export const config = {
	fallbackLng,
	// The default namespace of i18next is "translation", but you can customize it here
	defaultNS: "common",
	ns: ["common"],
	interpolation: { escapeValue: false },
};

export default config;
