/**
 * Localized API messages. Catalogues are nested JSON flattened to dotted
 * keys at load time; English fills any gap in another locale.
 */

import type { Context } from "hono";
import en from "../i18n/en.json" with { type: "json" };
import de from "../i18n/de.json" with { type: "json" };

export const SUPPORTED_LOCALES = ["en", "de"] as const;
export type SupportedLocale = (typeof SUPPORTED_LOCALES)[number];

const DEFAULT_LOCALE: SupportedLocale = "en";

function flatten(tree: Record<string, unknown>, prefix = "", into = new Map<string, string>()): Map<string, string> {
  for (const [name, value] of Object.entries(tree)) {
    const key = prefix ? `${prefix}.${name}` : name;
    if (typeof value === "string") into.set(key, value);
    else if (typeof value === "object" && value !== null && !Array.isArray(value)) {
      flatten(Object.fromEntries(Object.entries(value)), key, into);
    }
  }
  return into;
}

const catalogues: Record<SupportedLocale, Map<string, string>> = { en: flatten(en), de: flatten(de) };

function isSupported(locale: string): locale is SupportedLocale {
  return SUPPORTED_LOCALES.some((supported) => supported === locale);
}

const LANGUAGE_RANGE = /^([a-z]{1,8}|\*)(?:-[a-z0-9]{1,8})*(?:\s*;\s*q\s*=\s*([0-9.]+))?$/i;

/**
 * Highest-weighted supported language of an Accept-Language header.
 * Regions are ignored, q=0 excludes a language, ties keep header order.
 */
export function parseAcceptLanguage(header: string | undefined): SupportedLocale {
  if (!header) return DEFAULT_LOCALE;
  let best: { locale: SupportedLocale; q: number } | null = null;
  for (const range of header.split(",")) {
    const match = LANGUAGE_RANGE.exec(range.trim());
    if (!match) continue;
    const language = match[1].toLowerCase();
    const q = match[2] === undefined ? 1 : Number(match[2]);
    if (!isSupported(language) || !(q > 0)) continue;
    if (!best || q > best.q) best = { locale: language, q };
  }
  return best?.locale ?? DEFAULT_LOCALE;
}

/** ?lang= wins over Accept-Language. */
export function getLocale(c: Context): SupportedLocale {
  const override = c.req.query("lang")?.toLowerCase();
  if (override && isSupported(override)) return override;
  return parseAcceptLanguage(c.req.header("Accept-Language"));
}

/** Look up `key` and fill `{{name}}` placeholders; unknown keys come back as-is. */
export function t(locale: SupportedLocale, key: string, params: Record<string, string | number> = {}): string {
  const template = catalogues[locale].get(key) ?? catalogues.en.get(key) ?? key;
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, name: string) =>
    Object.hasOwn(params, name) ? String(params[name]) : placeholder,
  );
}
