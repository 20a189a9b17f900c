import { describe, it, expect } from "vitest";
import { createGuiFixture } from "../testing/guiFixture";
import { Color4 } from "./Color4";
import { createTheme, DEFAULT_THEME_COLORS } from "./Theme";

describe("createTheme", () => {
  it("merges overrides over the default colors", () => {
    const { font } = createGuiFixture();

    const theme = createTheme(font, { labelColor: Color4.RED, padding: 8 });

    expect(theme.font).toBe(font);
    expect(theme.labelColor).toBe(Color4.RED);
    expect(theme.padding).toBe(8);
    expect(theme.buttonFillColor).toBe(DEFAULT_THEME_COLORS.buttonFillColor);
  });
});
