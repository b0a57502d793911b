// !!! NOTE !!! if you change anything below, change DESIGN.md too
export interface Environment {
  /**
   * Advance of each character, in ems, used when the measurement provider has
   * no answer for a word
   */
  fallbackAdvance: number;
  /**
   * Advance of a space, in ems, used when the provider has no answer
   */
  fallbackSpaceAdvance: number;
  /**
   * Line metrics, in ems, used when the provider has no metrics for a font
   */
  fallbackAscent: number;
  fallbackDescent: number;
  fallbackLineHeight: number;
  /**
   * Distance between a list marker and the list item's content edge, in ems of
   * the marker's font
   */
  listMarkerGap: number;
  /**
   * Font size of the root element when no rule sets one
   */
  defaultFontSize: number;
}

export const defaultEnvironment: Readonly<Environment> = Object.freeze({
  fallbackAdvance: 0.5,
  fallbackSpaceAdvance: 0.25,
  fallbackAscent: 0.8,
  fallbackDescent: 0.2,
  fallbackLineHeight: 1.2,
  listMarkerGap: 0.5,
  defaultFontSize: 16
});

export function createEnvironment(overrides: Partial<Environment> = {}): Readonly<Environment> {
  return Object.freeze({...defaultEnvironment, ...overrides});
}
