import { PathBuildError } from '../errors';
import type { CanonicalMetadata, NamingStyle } from './types';
import {
  ALLOWED_CHARACTERS,
  VERSION_PATTERN,
  classificationFolders,
  ensureAllowed,
  ensureDate,
  requireField,
} from './utils';

/**
 * DescriptiveStyle - Domain/Category/Doctypes/doctype_vendor[_subject][_date][_version].ext
 *
 * Filenames stay meaningful when a file is moved out of its folder.
 */
export class DescriptiveStyle implements NamingStyle {
  readonly name = 'descriptive' as const;

  allowedCharacters(): RegExp {
    return ALLOWED_CHARACTERS;
  }

  folderComponents(metadata: CanonicalMetadata): string[] {
    return classificationFolders(metadata, this.allowedCharacters(), this.name);
  }

  filename(metadata: CanonicalMetadata, extension: string): string {
    const parts: string[] = [];

    for (const [field, value] of [
      ['doctype', metadata.doctype],
      ['vendorName', metadata.vendorName],
    ] as const) {
      requireField(value, field, this.name);
      ensureAllowed(value, this.allowedCharacters(), field);
      parts.push(value);
    }

    if (metadata.subject) {
      ensureAllowed(metadata.subject, this.allowedCharacters(), 'subject');
      parts.push(metadata.subject);
    }

    if (metadata.date) {
      ensureDate(metadata.date, this.name);
      parts.push(metadata.date);
    }

    if (metadata.version) {
      if (!VERSION_PATTERN.test(metadata.version)) {
        throw new PathBuildError(
          'invalid_version',
          `Invalid version for descriptive style: '${metadata.version}' (must be vNN, final, or draft)`,
          { value: metadata.version, pattern: VERSION_PATTERN.source }
        );
      }
      parts.push(metadata.version);
    }

    return `${parts.join('_')}${extension}`;
  }
}
