import { StandardFonts } from "pdf-lib";
import { resolveTheme, THEME_NAMES } from "../pdf/themes";

describe("themes", () => {
  it("resolves every built-in theme by name", () => {
    expect(THEME_NAMES.map((name) => resolveTheme(name).name)).toEqual([
      "default",
      "minimal",
      "professional",
    ]);
    expect(resolveTheme(undefined).name).toBe("default");
    expect(resolveTheme(" Professional ").name).toBe("professional");
  });

  it("differs in margins, body font and rules", () => {
    const [base, minimal, professional] = THEME_NAMES.map(resolveTheme);
    expect(base.margin).toBeCloseTo(56.7);
    expect(minimal.margin).toBeCloseTo(42.525);
    expect(professional.margin).toBeCloseTo(70.875);
    expect(professional.fonts.body).toBe(StandardFonts.TimesRoman);
    expect(minimal.ruledLevels).toEqual([]);
    expect(professional.headerBand).toBe(true);
  });

  it("rejects unknown names", () => {
    expect(() => resolveTheme("neon")).toThrow(
      'Unknown theme "neon". Use one of: default, minimal, professional'
    );
  });
});
