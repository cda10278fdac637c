import * as fs from "fs/promises";
import * as path from "path";
import { IImageStore, IMonochromeEncoder, SaveOptions } from "@core/interfaces";
import { Canvas, RenderedArtifact, Result, failure, success } from "@core/types";
import { StorageError } from "@core/errors";
import { getLogger } from "@utils/logger";
import { contentDigest } from "@utils/crypto";
import { formatFilenameStamp } from "@utils/time";
import { toError } from "@utils/typeGuards";

const logger = getLogger("ImageStore");

const FILENAME_PATTERN = /^[A-Za-z0-9_-][A-Za-z0-9._-]*$/;

/**
 * Whether a caller-supplied filename stays inside the image directory
 */
export function isValidFilename(filename: string): boolean {
  return FILENAME_PATTERN.test(filename);
}

/**
 * `generated-<UTC stamp>-<md5 prefix>`; content-less renders hash "default"
 */
export function deriveFilename(content: string | undefined, now: Date): string {
  const digest = contentDigest(content && content.length > 0 ? content : "default");
  return `generated-${formatFilenameStamp(now)}-${digest}`;
}

/**
 * Image Store Implementation
 *
 * Writes canvases as `<directory>/<filename>.png` through the selected
 * monochrome encoder. Saving twice under one name overwrites.
 */
export class ImageStore implements IImageStore {
  private readonly directory: string;

  constructor(
    directory: string,
    private readonly encoder: IMonochromeEncoder,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.directory = path.resolve(directory);
  }

  async initialize(): Promise<Result<void, StorageError>> {
    try {
      await fs.mkdir(this.directory, { recursive: true });
      logger.info(`Image directory: ${this.directory}`);
      return success(undefined);
    } catch (error) {
      logger.error(`Failed to create ${this.directory}: ${toError(error).message}`);
      return failure(StorageError.directoryCreateFailed(this.directory, toError(error)));
    }
  }

  async save(canvas: Canvas, options: SaveOptions = {}): Promise<Result<RenderedArtifact>> {
    const filename = options.filename ?? deriveFilename(options.content, this.now());
    if (!isValidFilename(filename)) {
      return failure(StorageError.invalidFilename(filename));
    }

    const filePath = this.resolvePath(filename);
    logger.time(`save ${filename}`);
    const encoded = await this.encoder.encode(canvas, filePath);
    logger.timeEnd(`save ${filename}`);

    if (!encoded.success) {
      return encoded;
    }

    logger.info(`Saved ${filename}.png`);
    return success({ filename, path: filePath });
  }

  resolvePath(filename: string): string {
    return path.join(this.directory, `${filename}.png`);
  }
}
