import { RESERVED_VENDOR_NAMES } from '../config/constants';
import { PathBuildError } from '../errors';
import type { CanonicalMetadata, NamingStyle } from './types';
import { ALLOWED_CHARACTERS, classificationFolders, ensureAllowed, ensureDate } from './utils';

/**
 * CompactStyle - Domain/Category/Doctypes/vendor[_date].ext
 *
 * The folders carry the classification, so the filename only identifies the instance.
 * Subject and version are not used.
 */
export class CompactStyle implements NamingStyle {
  readonly name = 'compact' as const;

  allowedCharacters(): RegExp {
    return ALLOWED_CHARACTERS;
  }

  folderComponents(metadata: CanonicalMetadata): string[] {
    return classificationFolders(metadata, this.allowedCharacters(), this.name);
  }

  filename(metadata: CanonicalMetadata, extension: string): string {
    const vendor = metadata.vendorName;
    if (!vendor || RESERVED_VENDOR_NAMES.has(vendor.toLowerCase())) {
      throw new PathBuildError('invalid_vendor', `Invalid vendor for compact style: '${vendor}'`, {
        value: vendor,
      });
    }
    ensureAllowed(vendor, this.allowedCharacters(), 'vendorName');

    let base = vendor;
    if (metadata.date) {
      ensureDate(metadata.date, this.name);
      base = `${base}_${metadata.date}`;
    }
    return `${base}${extension}`;
  }
}
