/**
 * Link normalisation for outgoing mail: bare addresses become mailto:,
 * http becomes https, and known tracking parameters are dropped.
 */

import { TRACKING_PARAMS } from "@mailpaste/core";

const EMAIL_RE = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export function isBareEmail(value: string): boolean {
  return EMAIL_RE.test(value);
}

/**
 * Clean one href. Returns the input string untouched whenever nothing
 * needs to change, so harmless links keep their exact spelling.
 */
export function cleanUrl(href: string): string {
  if (isBareEmail(href)) return `mailto:${href}`;

  let url: URL;
  try {
    url = new URL(href);
  } catch {
    // Relative links and fragments.
    return href;
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") return href;

  let changed = false;
  if (url.protocol === "http:") {
    url.protocol = "https:";
    changed = true;
  }
  for (const param of TRACKING_PARAMS) {
    if (url.searchParams.has(param)) {
      url.searchParams.delete(param);
      changed = true;
    }
  }
  return changed ? url.toString() : href;
}

const SCRIPT_SCHEME_RE = /^(javascript|vbscript):/i;

/** javascript: and vbscript: hrefs, ignoring the whitespace and control characters browsers skip. */
export function isScriptUrl(href: string): boolean {
  return SCRIPT_SCHEME_RE.test(href.replace(/[\u0000- ]/g, ""));
}
