import { assert, describe, test } from "@termloom/testkit";
import { parseHexColor, rgb, rgbB, rgbG, rgbR } from "../color.js";
import { defaultTheme } from "../defaultTheme.js";
import { createTheme, resolveColor } from "../theme.js";

describe("colors", () => {
  test("rgb packs and clamps channels", () => {
    assert.equal(rgb(255, 128, 0), 0xff8000);
    assert.equal(rgb(-5, 300, 12.6), 0x00ff0d);
    assert.equal(rgb(Number.NaN, 1, 2), 0x000102);
    const c = rgb(10, 20, 30);
    assert.deepEqual([rgbR(c), rgbG(c), rgbB(c)], [10, 20, 30]);
  });

  test("parseHexColor", () => {
    assert.equal(parseHexColor("#1e90FF"), 0x1e90ff);
    assert.equal(parseHexColor("000000"), 0);
    assert.equal(parseHexColor("#fff"), null);
    assert.equal(parseHexColor("#12345g"), null);
  });
});

describe("themes", () => {
  test("createTheme overrides only the given slots", () => {
    const theme = createTheme({ colors: { primary: rgb(1, 2, 3) } });
    assert.equal(theme.colors.primary, 0x010203);
    assert.equal(theme.colors.bg, defaultTheme.colors.bg);
    assert.ok(Object.isFrozen(theme.colors));
  });

  test("resolveColor maps names and passes packed colors through", () => {
    assert.equal(resolveColor(defaultTheme, "danger"), rgb(220, 53, 69));
    assert.equal(resolveColor(defaultTheme, 0x123456), 0x123456);
  });
});
