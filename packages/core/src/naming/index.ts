export type { CanonicalMetadata, NamingStyle, NamingStyleName } from './types';
export { NAMING_STYLE_NAMES } from './types';
export { CompactStyle } from './compact-style';
export { DescriptiveStyle } from './descriptive-style';
export { getNamingStyle } from './registry';
export {
  ALLOWED_CHARACTERS,
  DATE_PATTERN,
  VERSION_PATTERN,
  toTitleCase,
  pluralizeDoctype,
  ensureAllowed,
} from './utils';
