import type { DisplayPreferences, Theme } from "../types";

export const THEMES: readonly Theme[] = ["light", "dark", "system"];
export const MIN_FONT_SIZE = 12;
export const MAX_FONT_SIZE = 32;
export const FONT_SIZE_STEP = 2;

export const DEFAULT_PREFERENCES: Readonly<DisplayPreferences> = {
  theme: "system",
  fontSize: 18,
};

/** Raised for a preference value outside its accepted set. */
export class InvalidPreferenceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidPreferenceError";
  }
}

export function isTheme(value: unknown): value is Theme {
  return typeof value === "string" && THEMES.some((t) => t === value);
}

/** Snap to the nearest even size inside [12, 32]. */
export function clampFontSize(size: number): number {
  if (!Number.isFinite(size)) return DEFAULT_PREFERENCES.fontSize;
  const stepped = Math.round(size / FONT_SIZE_STEP) * FONT_SIZE_STEP;
  return Math.min(MAX_FONT_SIZE, Math.max(MIN_FONT_SIZE, stepped));
}

/** Line spacing the reader renders with for a given font size. */
export function lineSpacingFor(fontSize: number): number {
  return fontSize * 0.3;
}

/**
 * Apply a partial update on top of `current`.
 * @throws {InvalidPreferenceError} For an unknown theme or a non-numeric font size.
 */
export function applyPreferences(
  current: DisplayPreferences,
  patch: { theme?: unknown; fontSize?: unknown },
): DisplayPreferences {
  const next = { ...current };
  if (patch.theme !== undefined) {
    if (!isTheme(patch.theme)) {
      throw new InvalidPreferenceError(`theme must be one of: ${THEMES.join(", ")}`);
    }
    next.theme = patch.theme;
  }
  if (patch.fontSize !== undefined) {
    if (typeof patch.fontSize !== "number" || !Number.isFinite(patch.fontSize)) {
      throw new InvalidPreferenceError("fontSize must be a number");
    }
    next.fontSize = clampFontSize(patch.fontSize);
  }
  return next;
}

/** Coerce persisted (untrusted) preferences, falling back to defaults field by field. */
export function parsePreferences(raw: unknown): DisplayPreferences {
  if (!raw || typeof raw !== "object") return { ...DEFAULT_PREFERENCES };
  const theme = "theme" in raw ? raw.theme : undefined;
  const fontSize = "fontSize" in raw ? raw.fontSize : undefined;
  return {
    theme: isTheme(theme) ? theme : DEFAULT_PREFERENCES.theme,
    fontSize: typeof fontSize === "number" ? clampFontSize(fontSize) : DEFAULT_PREFERENCES.fontSize,
  };
}
