/**
 * @mailpaste/core: shared types and the Gmail-safe HTML vocabulary.
 */

export type {
  Asset,
  AssetMime,
  OutputFormat,
  SourceFormat,
  ProcessingDecision,
  TransformStats,
  TransformResult,
  BatchInput,
} from "./asset.js";
export {
  GMAIL_SAFE_TAGS,
  GMAIL_SAFE_ATTRS,
  GMAIL_SAFE_SCHEMES,
  GMAIL_IMG_SCHEMES,
  GMAIL_CLASS_PREFIX,
  GMAIL_PARAGRAPH_STYLE,
  gmailHeadingStyle,
  GMAIL_QUOTE_STYLE,
  GMAIL_LINK_STYLE,
  GMAIL_IMAGE_STYLE,
  GMAIL_STYLE_MARKER,
  TRACKING_PARAMS,
} from "./gmail.js";
