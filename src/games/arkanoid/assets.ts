import { createLogger } from '../../core/logger';

const log = createLogger('arkanoid-assets');

export const FALLBACK_FONT_FAMILY = 'system-ui, sans-serif';

export interface FontAsset {
  family: string;
}

/** The slice of the CSS Font Loading API the loader needs. */
export interface FontSet {
  load(family: string, source: string): Promise<void>;
}

export const documentFontSet: FontSet = {
  async load(family, source) {
    const face = new FontFace(family, source);
    await face.load();
    document.fonts.add(face);
  },
};

/**
 * Loads a font face by family and CSS `src` (a `url(...)` or `local(...)`).
 * A failed load is logged and resolves to null; callers fall back to
 * FALLBACK_FONT_FAMILY and keep running.
 */
export async function loadFont(
  family: string,
  source: string,
  fonts: FontSet = documentFontSet
): Promise<FontAsset | null> {
  try {
    await fonts.load(family, source);
    log.debug(`Loaded font "${family}"`);
    return { family };
  } catch (err) {
    log.error('Font load failure', { family, source }, err);
    return null;
  }
}

export function fontFamilyOf(font: FontAsset | null): string {
  return font ? `"${font.family}", ${FALLBACK_FONT_FAMILY}` : FALLBACK_FONT_FAMILY;
}
