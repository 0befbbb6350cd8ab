/**
 * The Gmail-safe HTML vocabulary.
 *
 * Webmail compose boxes drop <style> blocks and class-based CSS, so every
 * bit of presentation travels as a literal inline style. The server's
 * transformer and sanitizer both read these lists.
 */

export const GMAIL_SAFE_TAGS = [
  "div", "span", "br", "hr", "wbr",
  "p", "h1", "h2", "h3", "h4", "h5", "h6",
  "b", "strong", "i", "em", "u", "s", "strike", "del", "ins",
  "sub", "sup", "small", "big", "mark", "font", "center",
  "a", "img",
  "ul", "ol", "li", "dl", "dt", "dd",
  "blockquote", "q", "cite", "abbr",
  "code", "pre", "tt", "kbd",
  "table", "caption", "colgroup", "col", "thead", "tbody", "tfoot", "tr", "td", "th",
] as const;

export const GMAIL_SAFE_ATTRS: Record<string, string[]> = {
  "*": ["style", "class", "dir", "align", "title", "lang"],
  a: ["href", "target", "rel", "name"],
  img: ["src", "alt", "width", "height"],
  font: ["color", "face", "size"],
  table: ["width", "border", "cellpadding", "cellspacing", "bgcolor"],
  td: ["colspan", "rowspan", "valign", "width", "height", "bgcolor"],
  th: ["colspan", "rowspan", "valign", "width", "height", "bgcolor"],
  col: ["span", "width"],
  ol: ["start", "type"],
};

/** Allowed URI schemes for href attributes. */
export const GMAIL_SAFE_SCHEMES = ["http", "https", "mailto", "tel"];

/**
 * Allowed schemes for <img src>. Images we could not rehost keep their
 * original source, so data:, blob: and cid: stay legal here.
 */
export const GMAIL_IMG_SCHEMES = ["https", "http", "data", "blob", "cid"];

/** Classes that survive sanitizing: Gmail keys quoting and signatures off these. */
export const GMAIL_CLASS_PREFIX = "gmail_";

const TEXT_STYLE =
  "color: rgb(34, 34, 34); font-family: Arial, Helvetica, sans-serif; font-style: normal; " +
  "font-variant-ligatures: normal; font-variant-caps: normal; letter-spacing: normal; orphans: 2; " +
  "text-align: start; text-indent: 0px; text-transform: none; widows: 2; word-spacing: 0px; " +
  "-webkit-text-stroke-width: 0px; white-space: normal; text-decoration-thickness: initial; " +
  "text-decoration-style: initial; text-decoration-color: initial;";

/** Inline style Gmail itself writes on body paragraphs. */
export const GMAIL_PARAGRAPH_STYLE = `${TEXT_STYLE} font-size: small; font-weight: 400;`;

/** Heading sizes, keyed by tag. Everything below h2 renders at body size. */
export const GMAIL_HEADING_SIZES: Record<string, string> = {
  h1: "large",
  h2: "medium",
  h3: "small",
  h4: "small",
  h5: "small",
  h6: "small",
};

export function gmailHeadingStyle(tag: string): string {
  const size = GMAIL_HEADING_SIZES[tag] ?? "small";
  return `${TEXT_STYLE} font-size: ${size}; font-weight: bold;`;
}

export const GMAIL_QUOTE_STYLE =
  `${GMAIL_PARAGRAPH_STYLE} margin: 0px 0px 0px 0.8ex; border-left: 1px solid rgb(204, 204, 204); padding-left: 1ex;`;

export const GMAIL_LINK_STYLE = "color: rgb(17, 85, 204);";

/** Applied to every rehosted <img>. */
export const GMAIL_IMAGE_STYLE = "max-width:100%;height:auto;display:block;";

/** Marker used to recognise a div that already carries the paragraph style. */
export const GMAIL_STYLE_MARKER = "color: rgb(34, 34, 34)";

/** Query parameters removed from every http(s) link. */
export const TRACKING_PARAMS = [
  "utm_source", "utm_medium", "utm_campaign", "utm_term", "utm_content",
  "gclid", "fbclid", "msclkid", "mc_cid", "mc_eid",
] as const;
