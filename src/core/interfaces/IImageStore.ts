import { Canvas, RenderedArtifact, Result } from "@core/types";
import { StorageError } from "@core/errors";

export type SaveOptions = {
  /** Filename without extension; derived from the content when omitted */
  filename?: string;

  /** Content the image was rendered from, hashed into derived filenames */
  content?: string;
};

/**
 * Image Store Interface
 *
 * Persists rendered canvases as `<directory>/<filename>.png`.
 */
export interface IImageStore {
  /**
   * Create the output directory (with parents)
   */
  initialize(): Promise<Result<void, StorageError>>;

  /**
   * Encode and write a canvas. An existing file with the same name is
   * overwritten.
   */
  save(canvas: Canvas, options?: SaveOptions): Promise<Result<RenderedArtifact>>;

  /**
   * Absolute path a filename is (or would be) stored at
   */
  resolvePath(filename: string): string;
}
