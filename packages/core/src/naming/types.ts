/**
 * Style-neutral metadata handed to naming styles.
 * Every field is already trimmed and lowercased; empty string means "absent".
 */
export type CanonicalMetadata = {
  readonly domain: string;
  readonly category: string;
  readonly doctype: string;
  readonly vendorName: string;
  readonly subject: string;
  readonly date: string;
  readonly version?: string;
};

export const NAMING_STYLE_NAMES = ['compact', 'descriptive'] as const;

export type NamingStyleName = (typeof NAMING_STYLE_NAMES)[number];

/**
 * A naming style decides folder components and filename composition.
 *
 * Styles only enforce rules intrinsic to the style (allowed characters, required fields,
 * date/version formats). Structural checks (depth, periods, total length) belong to the
 * path builder.
 */
export interface NamingStyle {
  readonly name: NamingStyleName;

  /** Folder names, outermost first, without separators. */
  folderComponents(metadata: CanonicalMetadata): string[];

  /** Basename plus `extension` (which includes its leading period). */
  filename(metadata: CanonicalMetadata, extension: string): string;

  allowedCharacters(): RegExp;
}
