import { RGB, StandardFonts, rgb } from "pdf-lib";
import { ValidationError } from "../../util/errors";

export const PAGE_WIDTH = 595.28;
export const PAGE_HEIGHT = 841.89;

const CM = 28.35;

export const THEME_NAMES = ["default", "minimal", "professional"] as const;
export type ThemeName = (typeof THEME_NAMES)[number];

export interface PdfTheme {
  name: ThemeName;
  margin: number;
  fonts: {
    body: StandardFonts;
    bold: StandardFonts;
    heading: StandardFonts;
    mono: StandardFonts;
  };
  bodySize: number;
  lineHeight: number;
  /** Font sizes for heading levels 1..6 */
  headingSizes: [number, number, number, number, number, number];
  /** Heading levels that get an accent rule underneath */
  ruledLevels: number[];
  colors: {
    text: RGB;
    heading: RGB;
    subheading: RGB;
    accent: RGB;
    muted: RGB;
    rule: RGB;
    codeBg: RGB;
    tableHead: RGB;
  };
  /** Running header band with the document title on content pages */
  headerBand: boolean;
}

export function hex(input: string): RGB {
  const raw = input.replace("#", "");
  const r = Number.parseInt(raw.slice(0, 2), 16) / 255;
  const g = Number.parseInt(raw.slice(2, 4), 16) / 255;
  const b = Number.parseInt(raw.slice(4, 6), 16) / 255;
  return rgb(r, g, b);
}

const DEFAULT_THEME: PdfTheme = {
  name: "default",
  margin: 2 * CM,
  fonts: {
    body: StandardFonts.Helvetica,
    bold: StandardFonts.HelveticaBold,
    heading: StandardFonts.HelveticaBold,
    mono: StandardFonts.Courier,
  },
  bodySize: 10.5,
  lineHeight: 1.6,
  headingSizes: [22, 17, 13.5, 12, 11, 10.5],
  ruledLevels: [1, 2],
  colors: {
    text: hex("#333333"),
    heading: hex("#2C3E50"),
    subheading: hex("#2C3E50"),
    accent: hex("#3498DB"),
    muted: hex("#7F8C8D"),
    rule: hex("#BDC3C7"),
    codeBg: hex("#F4F6F7"),
    tableHead: hex("#ECF0F1"),
  },
  headerBand: false,
};

const MINIMAL_THEME: PdfTheme = {
  name: "minimal",
  margin: 1.5 * CM,
  fonts: {
    body: StandardFonts.Helvetica,
    bold: StandardFonts.HelveticaBold,
    heading: StandardFonts.HelveticaBold,
    mono: StandardFonts.Courier,
  },
  bodySize: 10,
  lineHeight: 1.5,
  headingSizes: [18, 14, 12, 10, 10, 10],
  ruledLevels: [],
  colors: {
    text: hex("#000000"),
    heading: hex("#000000"),
    subheading: hex("#000000"),
    accent: hex("#000000"),
    muted: hex("#555555"),
    rule: hex("#CCCCCC"),
    codeBg: hex("#F5F5F5"),
    tableHead: hex("#EEEEEE"),
  },
  headerBand: false,
};

const PROFESSIONAL_THEME: PdfTheme = {
  name: "professional",
  margin: 2.5 * CM,
  fonts: {
    body: StandardFonts.TimesRoman,
    bold: StandardFonts.TimesRomanBold,
    heading: StandardFonts.HelveticaBold,
    mono: StandardFonts.Courier,
  },
  bodySize: 11,
  lineHeight: 1.6,
  headingSizes: [22, 17, 13.5, 12, 11, 11],
  ruledLevels: [1, 2],
  colors: {
    text: hex("#2C3E50"),
    heading: hex("#1A252F"),
    subheading: hex("#34495E"),
    accent: hex("#3498DB"),
    muted: hex("#7F8C8D"),
    rule: hex("#7FB3D3"),
    codeBg: hex("#F4F6F7"),
    tableHead: hex("#DFE6EE"),
  },
  headerBand: true,
};

const THEMES: Record<ThemeName, PdfTheme> = {
  default: DEFAULT_THEME,
  minimal: MINIMAL_THEME,
  professional: PROFESSIONAL_THEME,
};

export function isThemeName(value: string): value is ThemeName {
  return THEME_NAMES.some((name) => name === value);
}

/**
 * Looks up a built-in theme; unknown names raise ValidationError.
 */
export function resolveTheme(name: string | undefined): PdfTheme {
  const key = (name ?? "default").trim().toLowerCase();
  if (!isThemeName(key)) {
    throw new ValidationError(
      `Unknown theme "${name}". Use one of: ${THEME_NAMES.join(", ")}`,
      { theme: name }
    );
  }
  return THEMES[key];
}
