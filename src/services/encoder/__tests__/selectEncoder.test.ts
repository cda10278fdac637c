const mockDetect = jest.fn();

jest.mock("@utils/imagemagick", () => ({
  ...jest.requireActual("@utils/imagemagick"),
  detectImageMagick: () => mockDetect(),
}));

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

import { selectEncoder } from "../selectEncoder";
import { MagickMonochromeEncoder } from "../MagickMonochromeEncoder";
import { SharpMonochromeEncoder } from "../SharpMonochromeEncoder";

describe("selectEncoder", () => {
  it("should use ImageMagick when a binary is found", async () => {
    mockDetect.mockResolvedValue("convert");

    const encoder = await selectEncoder(10000);

    expect(encoder).toBeInstanceOf(MagickMonochromeEncoder);
    expect(encoder.name).toBe("imagemagick");
  });

  it("should fall back to sharp when none is found", async () => {
    mockDetect.mockResolvedValue(null);

    const encoder = await selectEncoder(10000);

    expect(encoder).toBeInstanceOf(SharpMonochromeEncoder);
    expect(encoder.name).toBe("sharp");
  });
});
