import { spawn } from "child_process";
import { mkdir } from "fs/promises";
import path from "path";
import { z } from "zod";
import { JOB_LIMITS } from "../config/jobs";
import { getInfoArgs, getMediaArgs, getVersionArgs } from "../config/yt-dlp";
import { SourceError } from "../utils/errors";

const TrackListSchema = z.record(
  z.string(),
  z.array(z.object({ ext: z.string().optional(), url: z.string() }))
);

const VideoInfoSchema = z.object({
  id: z.string(),
  title: z.string().optional(),
  duration: z.number().nullable().optional(),
  subtitles: TrackListSchema.nullable().optional(),
  automatic_captions: TrackListSchema.nullable().optional()
});

export type VideoInfo = z.infer<typeof VideoInfoSchema>;

// stderr fragments that mean retrying will not help
const PERMANENT_PATTERNS = [
  /Video unavailable/i,
  /Private video/i,
  /has been removed/i,
  /members-only/i,
  /Sign in to confirm your age/i,
  /Unsupported URL/i,
  /HTTP Error 404/i,
  /copyright/i
];

/**
 * Thin wrapper around the yt-dlp executable. Each call spawns one process, collects
 * its output and kills it if it outlives the timeout.
 */
export class YtDlpClient {
  constructor(
    private binaryPath: string = "yt-dlp",
    private timeoutMs: number = JOB_LIMITS.YT_DLP_TIMEOUT_MS,
    private infoTimeoutMs: number = JOB_LIMITS.YT_DLP_INFO_TIMEOUT_MS
  ) {}

  async version(): Promise<string> {
    const stdout = await this.run(getVersionArgs(), 10_000, "version");
    return stdout.trim();
  }

  /**
   * Reads a video's metadata and caption track listing without downloading it.
   * @throws SourceError if yt-dlp fails or prints something that is not video metadata
   */
  async fetchInfo(url: string): Promise<VideoInfo> {
    const stdout = await this.run(getInfoArgs(url), this.infoTimeoutMs, url);

    let raw: unknown;
    try {
      raw = JSON.parse(stdout);
    } catch (err: unknown) {
      throw new SourceError(`yt-dlp returned invalid JSON for ${url}`, "transient", {
        url,
        cause: err
      });
    }

    const result = VideoInfoSchema.safeParse(raw);
    if (!result.success) {
      throw new SourceError(`yt-dlp metadata for ${url} is missing fields`, "permanent", {
        url
      });
    }
    return result.data;
  }

  /**
   * Downloads the media file into `outputDir` as `{basename}.{ext}`.
   * @returns Path of the downloaded file
   */
  async downloadMedia(url: string, outputDir: string, basename: string): Promise<string> {
    await mkdir(outputDir, { recursive: true });
    const template = path.join(outputDir, `${basename}.%(ext)s`);

    const stdout = await this.run(getMediaArgs(url, template), this.timeoutMs, url);
    const filePath = stdout
      .split("\n")
      .map((line) => line.trim())
      .filter(Boolean)
      .pop();

    if (!filePath) {
      throw new SourceError(`yt-dlp finished without reporting a file for ${url}`, "transient", {
        url
      });
    }
    return filePath;
  }

  private run(args: string[], timeoutMs: number, label: string): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const child = spawn(this.binaryPath, args, { stdio: ["ignore", "pipe", "pipe"] });

      let stdout = "";
      let stderr = "";
      let timedOut = false;

      child.stdout.on("data", (data: Buffer) => {
        stdout += data.toString();
      });
      child.stderr.on("data", (data: Buffer) => {
        stderr += data.toString();
      });

      // Don't leave an orphaned download running if the Node process exits
      const killOnExit = () => {
        if (!child.killed) child.kill("SIGKILL");
      };
      process.on("exit", killOnExit);

      const timer = setTimeout(() => {
        timedOut = true;
        console.warn(`[yt-dlp] Killing process ${child.pid} for ${label} after ${timeoutMs}ms`);
        child.kill("SIGKILL");
      }, timeoutMs);

      const finish = () => {
        clearTimeout(timer);
        process.off("exit", killOnExit);
      };

      child.once("error", (err) => {
        finish();
        reject(
          new SourceError(`Failed to start yt-dlp (${this.binaryPath}): ${err.message}`, "transient", {
            cause: err
          })
        );
      });

      child.once("close", (code) => {
        finish();
        if (timedOut) {
          reject(new SourceError(`yt-dlp timed out for ${label}`, "transient"));
          return;
        }
        if (code !== 0) {
          reject(classifyFailure(code, stderr, label));
          return;
        }
        resolve(stdout);
      });
    });
  }
}

export function classifyFailure(code: number | null, stderr: string, label: string): SourceError {
  const lastLine =
    stderr
      .split("\n")
      .map((line) => line.trim())
      .filter(Boolean)
      .pop() ?? "no output";
  const permanent = PERMANENT_PATTERNS.some((pattern) => pattern.test(stderr));

  return new SourceError(
    `yt-dlp failed (code ${code}) for ${label}: ${lastLine}`,
    permanent ? "permanent" : "transient"
  );
}
