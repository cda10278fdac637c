jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    time: jest.fn(),
    timeEnd: jest.fn(),
  }),
}));

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import sharp from "sharp";
import { ImageStore, deriveFilename, isValidFilename } from "../ImageStore";
import { SharpMonochromeEncoder } from "@services/encoder/SharpMonochromeEncoder";
import { BitmapUtils } from "@services/canvas/BitmapUtils";
import { IMonochromeEncoder } from "@core/interfaces";
import { Canvas, failure, success } from "@core/types";
import { RenderError, StorageErrorCode } from "@core/errors";

const NOW = new Date(Date.UTC(2024, 2, 9, 7, 5, 1));

const canvas = (): Canvas => ({
  kind: "mono",
  bitmap: BitmapUtils.createBlankBitmap(8, 8),
});

describe("ImageStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "image-store-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe("deriveFilename", () => {
    it("should combine the UTC stamp and the content digest", () => {
      expect(deriveFilename("hello", NOW)).toBe("generated-2024-03-09-T07-05-01Z-5d41402a");
    });

    it("should hash 'default' when there is no content", () => {
      expect(deriveFilename(undefined, NOW)).toBe("generated-2024-03-09-T07-05-01Z-c21f969b");
      expect(deriveFilename("", NOW)).toBe("generated-2024-03-09-T07-05-01Z-c21f969b");
    });
  });

  describe("isValidFilename", () => {
    it.each(["my-file", "t1", "screen_2024.v2", "_x"])("should accept %p", (name) => {
      expect(isValidFilename(name)).toBe(true);
    });

    it.each(["", ".hidden", "../etc/passwd", "a/b", "with space", "naïve"])(
      "should reject %p",
      (name) => {
        expect(isValidFilename(name)).toBe(false);
      },
    );
  });

  describe("initialize", () => {
    it("should create the directory with its parents", async () => {
      const nested = path.join(dir, "static", "images");
      const store = new ImageStore(nested, new SharpMonochromeEncoder());

      const result = await store.initialize();

      expect(result.success).toBe(true);
      expect((await fs.stat(nested)).isDirectory()).toBe(true);
    });
  });

  describe("save", () => {
    it("should write <filename>.png as a valid PNG", async () => {
      const store = new ImageStore(dir, new SharpMonochromeEncoder());

      const result = await store.save(canvas(), { filename: "my-file" });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.filename).toBe("my-file");
      expect(result.data.path).toBe(path.join(dir, "my-file.png"));
      expect(result.data.path.endsWith("my-file.png")).toBe(true);
      expect((await sharp(result.data.path).metadata()).format).toBe("png");
      await expect(fs.access(path.join(dir, "my-file.png"))).resolves.toBeUndefined();
    });

    it("should derive a filename when none is given", async () => {
      const encoder: IMonochromeEncoder = {
        name: "fake",
        encode: jest.fn().mockResolvedValue(success(undefined)),
      };
      const store = new ImageStore(dir, encoder, () => NOW);

      const result = await store.save(canvas(), { content: "hello" });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.filename).toBe("generated-2024-03-09-T07-05-01Z-5d41402a");
      }
      expect(encoder.encode).toHaveBeenCalledWith(
        expect.objectContaining({ kind: "mono" }),
        path.join(dir, "generated-2024-03-09-T07-05-01Z-5d41402a.png"),
      );
    });

    it("should overwrite an existing file with the same name", async () => {
      const store = new ImageStore(dir, new SharpMonochromeEncoder());
      await store.save(canvas(), { filename: "same" });

      const wide: Canvas = { kind: "mono", bitmap: BitmapUtils.createBlankBitmap(24, 8) };
      const result = await store.save(wide, { filename: "same" });

      expect(result.success).toBe(true);
      expect((await sharp(path.join(dir, "same.png")).metadata()).width).toBe(24);
    });

    it("should reject filenames that leave the directory", async () => {
      const encoder: IMonochromeEncoder = { name: "fake", encode: jest.fn() };
      const store = new ImageStore(dir, encoder);

      const result = await store.save(canvas(), { filename: "../escape" });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toHaveProperty("code", StorageErrorCode.INVALID_FILENAME);
      }
      expect(encoder.encode).not.toHaveBeenCalled();
    });

    it("should pass encoder failures through", async () => {
      const error = RenderError.encodeFailed("x.png", new Error("disk full"));
      const encoder: IMonochromeEncoder = {
        name: "fake",
        encode: jest.fn().mockResolvedValue(failure(error)),
      };
      const store = new ImageStore(dir, encoder);

      const result = await store.save(canvas(), { filename: "x" });

      expect(result).toEqual({ success: false, error });
    });
  });
});
