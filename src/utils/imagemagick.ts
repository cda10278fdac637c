/**
 * Native ImageMagick CLI wrapper
 *
 * Runs the system ImageMagick through child_process. ImageMagick 7 installs
 * a `magick` binary, ImageMagick 6 only `convert`; the probe picks whichever
 * answers first.
 *
 * Requires ImageMagick on the host:
 * - Linux: apt install imagemagick
 * - macOS: brew install imagemagick
 */

import { execFile } from "child_process";
import { promisify } from "util";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";

const execFileAsync = promisify(execFile);
const logger = getLogger("ImageMagick");

export type MagickCommand = "magick" | "convert";

const PROBE_ORDER: readonly MagickCommand[] = ["magick", "convert"];

/**
 * Find a working ImageMagick binary. Resolves to null when none runs.
 */
export async function detectImageMagick(): Promise<MagickCommand | null> {
  for (const command of PROBE_ORDER) {
    try {
      await execFileAsync(command, ["-version"]);
      logger.info(`Using ImageMagick binary '${command}'`);
      return command;
    } catch (error) {
      logger.debug(`'${command} -version' failed: ${toError(error).message}`);
    }
  }
  logger.warn("ImageMagick not found, falling back to sharp");
  return null;
}

/**
 * Run an ImageMagick command. Rejects when the process fails or runs
 * longer than `timeoutMs` (the process is then killed).
 */
export async function runMagick(
  command: MagickCommand,
  args: string[],
  timeoutMs: number,
): Promise<void> {
  logger.debug(`Executing: ${command} ${args.join(" ")}`);

  try {
    const { stderr } = await execFileAsync(command, args, {
      timeout: timeoutMs,
      maxBuffer: 10 * 1024 * 1024,
    });

    if (stderr && !stderr.toLowerCase().includes("warning")) {
      logger.warn(`ImageMagick stderr: ${stderr}`);
    }
  } catch (error) {
    const errorMsg = toError(error).message;
    logger.error(`ImageMagick ${command} failed: ${errorMsg}`);
    throw new Error(`ImageMagick ${command} failed: ${errorMsg}`);
  }
}

/**
 * Arguments that quantize `inputPath` to a stripped two-colour 1-bit PNG
 */
export function monochromeArgs(inputPath: string, outputPath: string): string[] {
  return [
    inputPath,
    "-monochrome",
    "-colors",
    "2",
    "-depth",
    "1",
    "-strip",
    `png:${outputPath}`,
  ];
}
