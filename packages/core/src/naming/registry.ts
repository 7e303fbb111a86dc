import { UnknownNamingStyleError } from '../errors';
import { CompactStyle } from './compact-style';
import { DescriptiveStyle } from './descriptive-style';
import { NAMING_STYLE_NAMES, type NamingStyle, type NamingStyleName } from './types';

// Styles are stateless, so one shared instance each.
const NAMING_STYLES: Record<NamingStyleName, NamingStyle> = {
  compact: new CompactStyle(),
  descriptive: new DescriptiveStyle(),
};

/**
 * Resolve a configured style name (case/whitespace-insensitive).
 * Throws UnknownNamingStyleError listing the allowed names.
 */
export function getNamingStyle(name: string): NamingStyle {
  const key = (name ?? '').trim().toLowerCase();
  const match = NAMING_STYLE_NAMES.find((candidate) => candidate === key);
  if (!match) {
    throw new UnknownNamingStyleError(name, [...NAMING_STYLE_NAMES].sort());
  }
  return NAMING_STYLES[match];
}
